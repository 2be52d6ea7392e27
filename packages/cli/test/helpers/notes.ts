/**
 * Note fixtures for command and renderer tests
 */

import { NoteRange, type FieldValue, type NoteRecord } from '@shiplog/core';
import { isCommitSha, type CommitSha, type RepositoryContext, type TagRef } from '@shiplog/git';

export function sha(prefix: string): CommitSha {
  const value = prefix.padEnd(40, '0');
  if (!isCommitSha(value)) {
    throw new Error(`Bad sha prefix ${prefix}`);
  }
  return value;
}

export function tag(name: string, isoDate: string): TagRef {
  return { name, date: new Date(isoDate) };
}

export function note(
  shaPrefix: string,
  author: string,
  fields: Record<string, FieldValue>,
  extra: { tag?: TagRef; validationErrors?: string[] } = {},
): NoteRecord {
  const date = new Date('2024-03-01T09:30:00Z');
  const signature = { name: author, email: 'dev@example.com', date };
  const validationErrors = extra.validationErrors ?? [];
  return {
    commit: { sha: sha(shaPrefix), author: signature, committer: signature },
    tag: extra.tag,
    path: `.shiplog/notes/2024-03-01-${shaPrefix.slice(0, 6)}.yaml`,
    fields,
    isValid: validationErrors.length === 0,
    validationErrors,
  };
}

export function range(...records: NoteRecord[]): NoteRange {
  return new NoteRange(records);
}

/**
 * Repository context for commands whose pipeline calls are mocked
 */
export function stubRepository(root = '/repo'): RepositoryContext {
  const unexpected = (name: string) => (): never => {
    throw new Error(`Unexpected repository call: ${name}`);
  };
  return {
    root,
    listCommits: unexpected('listCommits'),
    listAddedFiles: unexpected('listAddedFiles'),
    listTags: unexpected('listTags'),
    listTagCommits: unexpected('listTagCommits'),
    readWorkingTreeFile: unexpected('readWorkingTreeFile'),
    getCurrentBranch: unexpected('getCurrentBranch'),
    getRemoteUrl: unexpected('getRemoteUrl'),
    fetchRemoteBranch: unexpected('fetchRemoteBranch'),
  };
}
