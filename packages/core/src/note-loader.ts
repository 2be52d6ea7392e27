/**
 * Note Loader
 *
 * Finds the note artifact each commit added and turns it into a note
 * record. Malformed documents and schema violations are recovered into
 * invalid records; only repository failures propagate.
 *
 * @packageDocumentation
 */

import { parse as parseYaml } from 'yaml';

import type { CommitRef, CommitSha, LogOptions, RepositoryContext } from '@shiplog/git';
import { ParseError, errorMessage, logDebug, logWarning } from '@shiplog/utils';

import { toResolutionError } from './git-errors.js';
import type { NoteValidator } from './note-validator.js';
import type { NoteRecord } from './types.js';

/**
 * Where the note artifacts of one resolved revision live
 *
 * Built with a single `git log --diff-filter=A` pass; contents are read
 * from the working tree on demand.
 */
export class NoteStore {
  private constructor(
    private readonly repo: RepositoryContext,
    private readonly artifacts: ReadonlyMap<CommitSha, readonly string[]>,
  ) {}

  /**
   * Scan a revision for note artifacts added under `notesDir`
   *
   * @throws ResolutionError if git cannot list the revision
   */
  static scan(
    repo: RepositoryContext,
    revision: readonly string[],
    notesDir: string,
    options: LogOptions = {},
  ): NoteStore {
    let added: Map<CommitSha, string[]>;
    try {
      added = repo.listAddedFiles(revision, notesDir, options);
    } catch (error) {
      throw toResolutionError(error, `Could not list notes in ${notesDir}`);
    }

    const artifacts = new Map<CommitSha, readonly string[]>();
    for (const [sha, files] of added) {
      if (files.length > 0) {
        artifacts.set(sha, [...files].sort());
      }
    }

    logDebug('notes', `Found note artifacts for ${artifacts.size} commits`, { notesDir });
    return new NoteStore(repo, artifacts);
  }

  /** Artifact paths a commit added, in path order */
  artifactsFor(sha: CommitSha): readonly string[] {
    return this.artifacts.get(sha) ?? [];
  }

  /** Working tree content of an artifact; undefined once deleted */
  read(path: string): Promise<string | undefined> {
    return this.repo.readWorkingTreeFile(path);
  }

  /** Number of commits with at least one artifact */
  get size(): number {
    return this.artifacts.size;
  }
}

function isFieldMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Parse a note document into its field mapping
 *
 * @returns undefined for an empty document
 * @throws ParseError if the document is not YAML or not a mapping
 */
export function parseNoteDocument(content: string, path: string): Record<string, unknown> | undefined {
  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error) {
    // yaml appends a source excerpt after the first line
    const [reason = 'invalid YAML'] = errorMessage(error).split('\n');
    throw new ParseError(reason, path, { cause: error });
  }

  if (document === null || document === undefined) {
    return undefined;
  }
  if (!isFieldMapping(document)) {
    throw new ParseError(`expected a mapping of fields, got ${Array.isArray(document) ? 'a list' : typeof document}`, path);
  }
  return document;
}

async function loadArtifact(
  commit: CommitRef,
  path: string,
  store: NoteStore,
  validator: NoteValidator,
): Promise<NoteRecord | undefined> {
  const content = await store.read(path);
  if (content === undefined) {
    logDebug('notes', `Note ${path} no longer exists in the working tree`);
    return undefined;
  }

  let document: Record<string, unknown> | undefined;
  try {
    document = parseNoteDocument(content, path);
  } catch (error) {
    if (!(error instanceof ParseError)) {
      throw error;
    }
    logDebug('notes', `Could not parse ${path}`, { reason: error.message });
    return {
      commit,
      path,
      fields: {},
      isValid: false,
      validationErrors: [`note: could not parse note document (${error.message})`],
    };
  }

  if (document === undefined) {
    logDebug('notes', `Note ${path} is empty`);
    return undefined;
  }

  const { fields, errors } = validator.validate(document);
  return {
    commit,
    path,
    fields,
    isValid: errors.length === 0,
    validationErrors: errors.map(error => error.message),
  };
}

/**
 * Load the note record of one commit
 *
 * A commit that added several artifacts still yields one record, built from
 * the first artifact in path order and marked invalid.
 *
 * @returns undefined when the commit has no note artifact
 */
export async function loadNote(
  commit: CommitRef,
  store: NoteStore,
  validator: NoteValidator,
): Promise<NoteRecord | undefined> {
  const paths = store.artifactsFor(commit.sha);
  const [path] = paths;
  if (path === undefined) {
    return undefined;
  }

  const record = await loadArtifact(commit, path, store, validator);
  if (paths.length === 1) {
    return record;
  }

  logWarning('notes', `Commit ${commit.sha} added several notes: ${paths.join(', ')}`);
  const error = `note: commit added several notes (${paths.join(', ')})`;
  if (record === undefined) {
    return { commit, path, fields: {}, isValid: false, validationErrors: [error] };
  }
  return { ...record, isValid: false, validationErrors: [error, ...record.validationErrors] };
}
