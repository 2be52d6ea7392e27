/**
 * Attribute path resolution
 *
 * The one lookup shared by grouping, filtering and rendering. The first
 * segment of a dotted path names a reserved commit attribute or a schema
 * field; the remaining segments walk own properties of the value found.
 * Missing paths resolve to undefined, never an error.
 */

import { isReservedAttributeName, type ReservedAttributeName } from '@shiplog/config';

import type { NoteRecord } from './types.js';

const RESERVED_ATTRIBUTES: Readonly<Record<ReservedAttributeName, (record: NoteRecord) => unknown>> = {
  commit_sha: record => record.commit.sha,
  commit_author_name: record => record.commit.author.name,
  commit_author_email: record => record.commit.author.email,
  commit_author_date: record => record.commit.author.date,
  commit_committer_name: record => record.commit.committer.name,
  commit_committer_email: record => record.commit.committer.email,
  commit_committer_date: record => record.commit.committer.date,
  commit_tag: record => record.tag,
  is_valid: record => record.isValid,
  validation_errors: record => record.validationErrors,
  path: record => record.path,
};

function ownProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !Object.hasOwn(value, key)) {
    return undefined;
  }
  const property: unknown = Reflect.get(value, key);
  return property;
}

/**
 * Resolve a dotted attribute path against a note record
 *
 * @example
 * ```typescript
 * resolveAttribute(record, 'type');            // 'feature'
 * resolveAttribute(record, 'commit_tag.date'); // Date of the attributed tag
 * resolveAttribute(record, 'nope.nested');     // undefined
 * ```
 */
export function resolveAttribute(record: NoteRecord, path: string): unknown {
  const [head = '', ...rest] = path.split('.');

  let value: unknown = isReservedAttributeName(head) ? RESERVED_ATTRIBUTES[head](record) : ownProperty(record.fields, head);

  for (const segment of rest) {
    if (value === undefined) break;
    value = ownProperty(value, segment);
  }

  return value ?? undefined;
}
