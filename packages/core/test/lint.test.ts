import { describe, it, expect } from 'vitest';

import { evaluateLint } from '../src/lint.js';
import { NoteRange } from '../src/note-range.js';

import { commit, sha } from './helpers/fake-repository.js';
import { note } from './helpers/records.js';

describe('evaluateLint', () => {
  it('should pass when the range has no commits', () => {
    for (const notes of [new NoteRange(), new NoteRange([note(1, {}, { validationErrors: ['summary: Required'] })])]) {
      expect(evaluateLint(0, notes)).toEqual({
        passed: true,
        reason: 'no-commits',
        message: 'No commits in range',
        failures: [],
        missing: [],
      });
    }
  });

  it('should fail when commits have no notes', () => {
    for (const count of [1, 2, 50]) {
      const result = evaluateLint(count, new NoteRange());

      expect(result.passed).toBe(false);
      expect(result.reason).toBe('no-notes');
      expect(result.message).toBe('Notes are required, none found');
    }
  });

  it('should fail and list invalid notes', () => {
    const notes = new NoteRange([
      note(1, { type: 'bug' }, { validationErrors: ['summary: Required'] }),
      note(2, { type: 'feature', summary: 'Fine' }),
      note(3, {}, { validationErrors: ['type: Required', 'summary: Required'] }),
    ]);

    const result = evaluateLint(3, notes);

    expect(result.passed).toBe(false);
    expect(result.reason).toBe('invalid-notes');
    expect(result.message).toBe('2 out of 3 notes have failed linting');
    expect(result.failures).toEqual([
      { sha: sha(1), path: '.shiplog/notes/2024-01-01-000001.yaml', errors: ['summary: Required'] },
      { sha: sha(3), path: '.shiplog/notes/2024-01-03-000003.yaml', errors: ['type: Required', 'summary: Required'] },
    ]);
  });

  it('should pass when every note is valid, even if some commits have none', () => {
    const notes = new NoteRange([note(1, { type: 'feature' }), note(2, { type: 'bug' })]);

    const result = evaluateLint([commit(3), commit(2), commit(1)], notes);

    expect(result).toEqual({ passed: true, reason: 'ok', message: '2 notes passed linting', failures: [], missing: [] });
  });

  it('should name commits without a note when every commit needs one', () => {
    const notes = new NoteRange([note(1, { type: 'feature' }), note(2, { type: 'bug' })]);

    const result = evaluateLint([commit(3), commit(2), commit(1)], notes, { requireEveryCommit: true });

    expect(result).toEqual({
      passed: false,
      reason: 'missing-notes',
      message: '1 commits have no note',
      failures: [],
      missing: [sha(3)],
    });
  });

  it('should report invalid notes before missing ones', () => {
    const notes = new NoteRange([note(1, {}, { validationErrors: ['summary: Required'] })]);

    const result = evaluateLint([commit(2), commit(1)], notes, { requireEveryCommit: true });

    expect(result.reason).toBe('invalid-notes');
  });

  it('should ignore requireEveryCommit when only a count is given', () => {
    const notes = new NoteRange([note(1, { type: 'feature' })]);

    expect(evaluateLint(3, notes, { requireEveryCommit: true }).reason).toBe('ok');
  });
});
