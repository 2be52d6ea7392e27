/**
 * Lint Evaluator
 *
 * Pass/fail decision over a resolved range and its notes. A range with no
 * commits passes; a range with commits but no notes fails.
 */

import type { CommitRef, CommitSha } from '@shiplog/git';

import type { NoteRange } from './note-range.js';

export type LintReason = 'no-commits' | 'no-notes' | 'invalid-notes' | 'missing-notes' | 'ok';

export interface LintFailure {
  sha: CommitSha;
  path: string;
  errors: readonly string[];
}

export interface LintResult {
  passed: boolean;
  reason: LintReason;
  message: string;
  /** Invalid notes, in range order */
  failures: LintFailure[];
  /** Commits without a note (only with requireEveryCommit) */
  missing: CommitSha[];
}

export interface LintOptions {
  /**
   * Also fail when a commit has no note.
   * Only applies when the commit list (not a count) is given.
   */
  requireEveryCommit?: boolean;
}

/**
 * Evaluate lint for a range
 *
 * @param commits - Resolved commits, or just their count
 */
export function evaluateLint(
  commits: number | readonly CommitRef[],
  notes: NoteRange,
  options: LintOptions = {},
): LintResult {
  const commitCount = typeof commits === 'number' ? commits : commits.length;

  if (commitCount === 0) {
    return { passed: true, reason: 'no-commits', message: 'No commits in range', failures: [], missing: [] };
  }

  if (notes.isEmpty()) {
    return { passed: false, reason: 'no-notes', message: 'Notes are required, none found', failures: [], missing: [] };
  }

  const failures: LintFailure[] = notes
    .filter(record => !record.isValid)
    .toArray()
    .map(record => ({ sha: record.commit.sha, path: record.path, errors: record.validationErrors }));

  if (failures.length > 0) {
    return {
      passed: false,
      reason: 'invalid-notes',
      message: `${failures.length} out of ${notes.length} notes have failed linting`,
      failures,
      missing: [],
    };
  }

  if (options.requireEveryCommit && typeof commits !== 'number') {
    const noted = new Set<string>(notes.toArray().map(record => record.commit.sha));
    const missing = commits.map(commit => commit.sha).filter(sha => !noted.has(sha));
    if (missing.length > 0) {
      return {
        passed: false,
        reason: 'missing-notes',
        message: `${missing.length} commits have no note`,
        failures: [],
        missing,
      };
    }
  }

  return { passed: true, reason: 'ok', message: `${notes.length} notes passed linting`, failures: [], missing: [] };
}
