/**
 * Note pipeline
 *
 * resolve range -> scan notes -> load notes (bounded pool) -> attribute
 * tags -> Note Range. Every step receives the repository context
 * explicitly.
 *
 * @packageDocumentation
 */

import { loadConfig, loadNoteSchema, type NoteSchemaDescriptor, type ShiplogConfig } from '@shiplog/config';
import type { RepositoryContext, TagRef } from '@shiplog/git';
import { logDebug, mapConcurrent } from '@shiplog/utils';

import { toResolutionError } from './git-errors.js';
import { evaluateLint, type LintResult } from './lint.js';
import { NoteStore, loadNote } from './note-loader.js';
import { NoteRange } from './note-range.js';
import { createNoteValidator, type NoteValidator } from './note-validator.js';
import { resolveRange, type ResolvedRange } from './range-resolver.js';
import { attributeTag, buildTagReachability } from './tag-attributor.js';
import type { NoteRecord } from './types.js';

export interface LoadNoteRangeOptions {
  repo: RepositoryContext;
  /** Range expression; empty for the whole history of HEAD */
  range?: string;
  /** Project configuration (default: read from the repository root) */
  config?: ShiplogConfig;
  /** Note schema descriptor (default: read from config.schemaPath) */
  schema?: NoteSchemaDescriptor;
  /** Replaces the validator built from the schema */
  validator?: NoteValidator;
  /** Tag glob; overrides config.tagMatch */
  tagMatch?: string;
  before?: string;
  after?: string;
  reverse?: boolean;
  /** Environment holding the GitHub token (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface NoteRangeResult {
  range: ResolvedRange;
  notes: NoteRange;
}

export interface LintPipelineOptions extends LoadNoteRangeOptions {
  /** Overrides config.lint.requireEveryCommit */
  requireEveryCommit?: boolean;
}

export interface LintReport extends NoteRangeResult {
  result: LintResult;
}

async function resolveValidator(options: LoadNoteRangeOptions, config: ShiplogConfig): Promise<NoteValidator> {
  if (options.validator) {
    return options.validator;
  }
  const schema = options.schema ?? (await loadNoteSchema(config.schemaPath, options.repo.root));
  return createNoteValidator(schema);
}

/**
 * Load the note range of a range expression
 *
 * @throws ConfigurationError for missing credentials, config or schema
 * @throws ResolutionError if the range or tags cannot be read
 */
export async function loadNoteRange(options: LoadNoteRangeOptions): Promise<NoteRangeResult> {
  const { repo, before, after, reverse } = options;
  const config = options.config ?? (await loadConfig(repo.root));
  const validator = await resolveValidator(options, config);

  const range = await resolveRange(repo, options.range, {
    before,
    after,
    reverse,
    github: config.github,
    env: options.env,
  });

  if (range.commits.length === 0) {
    return { range, notes: new NoteRange() };
  }

  const store = NoteStore.scan(repo, range.revision, config.notesDir, { before, after });
  const loaded = await mapConcurrent(range.commits, config.concurrency, commit => loadNote(commit, store, validator));
  const records = loaded.filter((record): record is NoteRecord => record !== undefined);

  const tagMatch = options.tagMatch ?? config.tagMatch;
  let tags: TagRef[];
  try {
    tags = repo.listTags(tagMatch);
  } catch (error) {
    throw toResolutionError(error, `Could not list tags${tagMatch ? ` matching ${tagMatch}` : ''}`);
  }
  const reachability = buildTagReachability(repo, tags, records.map(record => record.commit.sha));

  const notes = new NoteRange(records.map(record => ({ ...record, tag: attributeTag(record.commit.sha, reachability) })));
  logDebug('notes', `Loaded ${notes.length} notes for ${range.commits.length} commits`);

  return { range, notes };
}

/**
 * Load a range's notes and lint them
 */
export async function lint(options: LintPipelineOptions): Promise<LintReport> {
  const config = options.config ?? (await loadConfig(options.repo.root));
  const { range, notes } = await loadNoteRange({ ...options, config });

  const result = evaluateLint(range.commits, notes, {
    requireEveryCommit: options.requireEveryCommit ?? config.lint.requireEveryCommit,
  });
  logDebug('lint', result.message, { reason: result.reason });

  return { range, notes, result };
}
