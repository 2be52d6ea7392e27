import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { ShiplogConfigSchema, type NoteSchemaDescriptor } from '@shiplog/config';
import type { CommitSha } from '@shiplog/git';
import { ConfigurationError } from '@shiplog/utils';

import { lint, loadNoteRange } from '../src/pipeline.js';

import { FakeRepository, commit, sha } from './helpers/fake-repository.js';

const config = ShiplogConfigSchema.parse({});

const schema: NoteSchemaDescriptor = [
  { label: 'type', type: 'string', required: true, choices: ['bug', 'feature', 'trivial'] },
  { label: 'summary', type: 'string', required: true },
];

function notePath(seed: number): string {
  return `.shiplog/notes/2024-01-0${seed}-00000${seed}.yaml`;
}

/**
 * Three commits; 1 and 3 carry notes, 2 does not.
 * v1.0 (day 5) contains 1; v1.1 (day 10) contains 1 and 2.
 */
function history(files: Record<number, string>): FakeRepository {
  return new FakeRepository({
    commits: [commit(3), commit(2), commit(1)],
    ranges: { 'main..main': [], 'v1.0..': [sha(3), sha(2)] },
    added: Object.keys(files).map((seed): [CommitSha, string[]] => [sha(Number(seed)), [notePath(Number(seed))]]),
    files: Object.fromEntries(Object.entries(files).map(([seed, content]) => [notePath(Number(seed)), content])),
    tags: [
      { name: 'v1.1', date: new Date(Date.UTC(2024, 0, 10)), commits: [sha(2), sha(1)] },
      { name: 'v1.0', date: new Date(Date.UTC(2024, 0, 5)), commits: [sha(1)] },
    ],
  });
}

describe('loadNoteRange', () => {
  it('should load notes in commit order and attribute tags', async () => {
    const repo = history({
      1: 'type: feature\nsummary: Add export\n',
      3: 'type: bug\nsummary: Fix crash\n',
    });

    const { range, notes } = await loadNoteRange({ repo, config, schema });

    expect(range.commits).toHaveLength(3);
    expect(notes.toArray().map(record => [record.commit.sha, record.tag?.name, record.fields.type])).toEqual([
      [sha(3), undefined, 'bug'],
      [sha(1), 'v1.0', 'feature'],
    ]);
  });

  it('should keep commit order whatever the concurrency', async () => {
    const repo = history({
      1: 'type: feature\nsummary: One\n',
      2: 'type: bug\nsummary: Two\n',
      3: 'type: trivial\nsummary: Three\n',
    });

    for (const concurrency of [1, 2, 8]) {
      const { notes } = await loadNoteRange({ repo, config: { ...config, concurrency }, schema, reverse: true });

      expect(notes.toArray().map(record => record.fields.summary)).toEqual(['One', 'Two', 'Three']);
    }
  });

  it('should attribute a commit in two tags to the earlier one', async () => {
    const repo = history({ 1: 'type: feature\nsummary: Shipped early\n' });

    const { notes } = await loadNoteRange({ repo, config, schema });

    expect(notes.at(0)?.tag).toEqual({ name: 'v1.0', date: new Date(Date.UTC(2024, 0, 5)) });
  });

  it('should restrict candidate tags with tagMatch', async () => {
    const repo = history({ 1: 'type: feature\nsummary: Shipped early\n' });

    const { notes } = await loadNoteRange({ repo, config, schema, tagMatch: 'v1.1*' });

    expect(notes.at(0)?.tag?.name).toBe('v1.1');
  });

  it('should return an empty range without scanning notes when there are no commits', async () => {
    const repo = history({ 1: 'type: feature\nsummary: x\n' });
    const scan = vi.spyOn(repo, 'listAddedFiles');

    const { range, notes } = await loadNoteRange({ repo, config, schema, range: 'main..main' });

    expect(range.commits).toEqual([]);
    expect(notes.isEmpty()).toBe(true);
    expect(scan).not.toHaveBeenCalled();
  });

  it('should keep a note missing a required field as an invalid record', async () => {
    const repo = history({ 3: 'type: bug\n' });

    const { notes } = await loadNoteRange({ repo, config, schema });
    const record = notes.at(0);

    expect(record?.isValid).toBe(false);
    expect(record?.validationErrors).toEqual(['summary: Required']);
    expect(record?.fields).toEqual({ type: 'bug' });
    expect(notes.group('summary').keys()).toEqual([undefined]);
  });

  it('should use a supplied validator', async () => {
    const repo = history({ 1: 'anything: goes\n' });

    const { notes } = await loadNoteRange({
      repo,
      config,
      validator: { validate: document => ({ fields: { anything: String(document.anything) }, errors: [] }) },
    });

    expect(notes.at(0)?.fields).toEqual({ anything: 'goes' });
  });
});

describe('lint', () => {
  it('should pass a range with valid notes even when a commit has none', async () => {
    const repo = history({
      1: 'type: feature\nsummary: Add export\n',
      3: 'type: bug\nsummary: Fix crash\n',
    });

    const { result } = await lint({ repo, config, schema });

    expect(result.passed).toBe(true);
    expect(result.reason).toBe('ok');
  });

  it('should name the commit without a note when every commit needs one', async () => {
    const repo = history({
      1: 'type: feature\nsummary: Add export\n',
      3: 'type: bug\nsummary: Fix crash\n',
    });

    const { result } = await lint({ repo, config, schema, requireEveryCommit: true });

    expect(result.passed).toBe(false);
    expect(result.reason).toBe('missing-notes');
    expect(result.missing).toEqual([sha(2)]);
  });

  it('should take requireEveryCommit from the config', async () => {
    const repo = history({ 1: 'type: feature\nsummary: Add export\n' });

    const { result } = await lint({ repo, config: { ...config, lint: { requireEveryCommit: true } }, schema });

    expect(result.missing).toEqual([sha(3), sha(2)]);
  });

  it('should pass an empty range', async () => {
    const { result } = await lint({ repo: history({}), config, schema, range: 'main..main' });

    expect(result).toEqual({
      passed: true,
      reason: 'no-commits',
      message: 'No commits in range',
      failures: [],
      missing: [],
    });
  });

  it('should fail a range without notes', async () => {
    const { result } = await lint({ repo: history({}), config, schema, range: 'v1.0..' });

    expect(result.passed).toBe(false);
    expect(result.reason).toBe('no-notes');
  });

  it('should fail and list invalid notes', async () => {
    const repo = history({ 3: 'type: chore\nsummary: Bump\n', 1: '[not, a, mapping]\n' });

    const { result } = await lint({ repo, config, schema });

    expect(result.reason).toBe('invalid-notes');
    expect(result.failures).toEqual([
      { sha: sha(3), path: notePath(3), errors: ['type: Value "chore" is not one of: bug, feature, trivial'] },
      { sha: sha(1), path: notePath(1), errors: ['note: could not parse note document (expected a mapping of fields, got a list)'] },
    ]);
  });

  it('should fail a commit that added a second, invalid note', async () => {
    const second = '.shiplog/notes/2024-01-03-zzzzzz.yaml';
    const repo = new FakeRepository({
      commits: [commit(3)],
      added: [[sha(3), [second, notePath(3)]]],
      files: { [notePath(3)]: 'type: bug\nsummary: Fix crash\n', [second]: 'type: nonsense\n' },
    });

    const { notes, result } = await lint({ repo, config, schema });

    expect(notes.length).toBe(1);
    expect(result.reason).toBe('invalid-notes');
    expect(result.failures).toEqual([
      { sha: sha(3), path: notePath(3), errors: [`note: commit added several notes (${notePath(3)}, ${second})`] },
    ]);
  });
});

describe('loading configuration from the repository', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `shiplog-pipeline-test-${Date.now()}-${Math.random()}`);
    await mkdir(join(testDir, '.shiplog'), { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  function rooted(root: string): FakeRepository {
    return new FakeRepository({
      root,
      commits: [commit(1)],
      added: [[sha(1), [notePath(1)]]],
      files: { [notePath(1)]: 'summary: Hello\n' },
    });
  }

  it('should read the schema named by shiplog.config.yaml', async () => {
    await writeFile(join(testDir, 'shiplog.config.yaml'), 'schemaPath: .shiplog/fields.yaml\n');
    await writeFile(join(testDir, '.shiplog', 'fields.yaml'), '- label: summary\n');

    const { notes } = await loadNoteRange({ repo: rooted(testDir) });

    expect(notes.at(0)?.fields).toEqual({ summary: 'Hello' });
  });

  it('should fail when the note schema is missing', async () => {
    await expect(loadNoteRange({ repo: rooted(testDir) })).rejects.toThrow(ConfigurationError);
  });
});
