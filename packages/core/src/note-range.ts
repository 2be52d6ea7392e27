/**
 * Note Range - the query engine
 *
 * An immutable, ordered collection of note records. Every operation
 * returns a new value; iteration is restartable and always yields the
 * same sequence. Report renderers only ever use group, filter and
 * iteration.
 *
 * @packageDocumentation
 */

import type { TagRef } from '@shiplog/git';

import { resolveAttribute } from './attribute-path.js';
import type { NoteRecord } from './types.js';

export interface GroupOptions {
  /**
   * Unset: keys in first-encountered order.
   * true/false: keys sorted ascending/descending.
   */
  ascendingKeys?: boolean;
  /** Move the undefined bucket to the end, whatever the direction */
  noneKeyLast?: boolean;
  /** Move the undefined bucket to the front (wins over noneKeyLast) */
  noneKeyFirst?: boolean;
}

export interface MatchOptions {
  /** Treat the value as a regular expression matched from the start */
  match?: boolean;
}

export interface NoteGroup {
  readonly key: unknown;
  readonly notes: NoteRange;
}

function isTagRef(value: unknown): value is TagRef {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'date' in value &&
    value.date instanceof Date
  );
}

// undefined < booleans < numbers < strings < dates < tags < anything else
function kindRank(value: unknown): number {
  if (value === undefined) return 0;
  if (typeof value === 'boolean') return 1;
  if (typeof value === 'number' || typeof value === 'bigint') return 2;
  if (typeof value === 'string') return 3;
  if (value instanceof Date) return 4;
  if (isTagRef(value)) return 5;
  return 6;
}

function compareScalars<T extends string | number | bigint>(a: T, b: T): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Identity of a group key: equal keys share one bucket
 */
export function keyIdentity(value: unknown): string {
  if (value === undefined || value === null) return 'none';
  if (value instanceof Date) return `date:${value.getTime()}`;
  if (isTagRef(value)) return `tag:${value.name}`;
  if (typeof value === 'object') return `json:${JSON.stringify(value)}`;
  return `${typeof value}:${String(value)}`;
}

/**
 * Natural ordering of group keys
 *
 * Values of one kind compare by value (dates by time, tags by name);
 * different kinds compare by kind, with undefined smallest.
 */
export function compareKeys(a: unknown, b: unknown): number {
  const rankA = kindRank(a);
  const rankB = kindRank(b);
  if (rankA !== rankB) {
    return rankA - rankB;
  }

  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  if (typeof a === 'number' && typeof b === 'number') return compareScalars(a, b);
  if (typeof a === 'bigint' && typeof b === 'bigint') return compareScalars(a, b);
  if (typeof a === 'string' && typeof b === 'string') return compareScalars(a, b);
  if (a instanceof Date && b instanceof Date) return compareScalars(a.getTime(), b.getTime());
  if (isTagRef(a) && isTagRef(b)) return compareScalars(a.name, b.name);
  return compareScalars(keyIdentity(a), keyIdentity(b));
}

function matches(actual: unknown, expected: unknown, options: MatchOptions): boolean {
  if (options.match) {
    return (
      typeof actual === 'string' &&
      typeof expected === 'string' &&
      new RegExp(`^(?:${expected})`).test(actual)
    );
  }
  return keyIdentity(actual) === keyIdentity(expected);
}

/**
 * Ordered mapping from group key to the notes sharing it
 */
export class NoteGroups implements Iterable<NoteGroup> {
  private readonly groups: readonly NoteGroup[];

  constructor(groups: Iterable<NoteGroup>) {
    this.groups = Object.freeze([...groups]);
  }

  get size(): number {
    return this.groups.length;
  }

  keys(): unknown[] {
    return this.groups.map(group => group.key);
  }

  /** Notes keyed by a value equal to `key` */
  get(key: unknown): NoteRange | undefined {
    const identity = keyIdentity(key);
    return this.groups.find(group => keyIdentity(group.key) === identity)?.notes;
  }

  has(key: unknown): boolean {
    return this.get(key) !== undefined;
  }

  toArray(): NoteGroup[] {
    return [...this.groups];
  }

  [Symbol.iterator](): Iterator<NoteGroup> {
    return this.groups[Symbol.iterator]();
  }
}

/**
 * Immutable ordered sequence of note records with unique commits
 */
export class NoteRange implements Iterable<NoteRecord> {
  private readonly records: readonly NoteRecord[];

  /**
   * @throws Error if two records share a commit
   */
  constructor(records: Iterable<NoteRecord> = []) {
    this.records = Object.freeze([...records]);

    const seen = new Set<string>();
    for (const record of this.records) {
      if (seen.has(record.commit.sha)) {
        throw new Error(`Duplicate commit ${record.commit.sha} in note range`);
      }
      seen.add(record.commit.sha);
    }
  }

  get length(): number {
    return this.records.length;
  }

  isEmpty(): boolean {
    return this.records.length === 0;
  }

  at(index: number): NoteRecord | undefined {
    return this.records.at(index);
  }

  toArray(): NoteRecord[] {
    return [...this.records];
  }

  [Symbol.iterator](): Iterator<NoteRecord> {
    return this.records[Symbol.iterator]();
  }

  /**
   * Records satisfying the predicate, order preserved
   */
  filter(predicate: (record: NoteRecord, index: number) => boolean): NoteRange {
    return new NoteRange(this.records.filter(predicate));
  }

  /**
   * Records whose attribute equals `value` (or matches it as a pattern)
   *
   * @example
   * ```typescript
   * notes.where('type', 'bug');
   * notes.where('commit_tag', undefined); // unreleased
   * notes.where('summary', 'Fix', { match: true });
   * ```
   */
  where(path: string, value: unknown, options: MatchOptions = {}): NoteRange {
    return this.filter(record => matches(resolveAttribute(record, path), value, options));
  }

  /**
   * Records whose attribute does not equal (or match) `value`
   */
  exclude(path: string, value: unknown, options: MatchOptions = {}): NoteRange {
    return this.filter(record => !matches(resolveAttribute(record, path), value, options));
  }

  /**
   * Partition records by the value at `path`
   *
   * Each group keeps the relative order of its records. A record whose
   * path does not resolve lands in the undefined bucket.
   *
   * @example
   * ```typescript
   * for (const { key, notes } of range.group('type', { ascendingKeys: true, noneKeyLast: true })) {
   *   // 'bug', 'feature', undefined
   * }
   * ```
   */
  group(path: string, options: GroupOptions = {}): NoteGroups {
    const buckets = new Map<string, { key: unknown; records: NoteRecord[] }>();

    for (const record of this.records) {
      const key = resolveAttribute(record, path);
      const identity = keyIdentity(key);
      const bucket = buckets.get(identity);
      if (bucket) {
        bucket.records.push(record);
      } else {
        buckets.set(identity, { key, records: [record] });
      }
    }

    let ordered = [...buckets.values()];

    const { ascendingKeys } = options;
    if (ascendingKeys !== undefined) {
      const direction = ascendingKeys ? 1 : -1;
      ordered.sort((a, b) => direction * compareKeys(a.key, b.key));
    }

    const none = ordered.find(bucket => bucket.key === undefined);
    if (none && (options.noneKeyFirst || options.noneKeyLast)) {
      ordered = ordered.filter(bucket => bucket !== none);
      if (options.noneKeyFirst) {
        ordered.unshift(none);
      } else {
        ordered.push(none);
      }
    }

    return new NoteGroups(ordered.map(bucket => ({ key: bucket.key, notes: new NoteRange(bucket.records) })));
  }
}
