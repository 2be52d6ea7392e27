/**
 * Repository Context
 *
 * One explicit handle on the repository under inspection, created once per
 * pipeline run and passed to every component that reads history. There is
 * no ambient repository state anywhere in shiplog.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, join, normalize, sep } from 'node:path';

import { ConfigurationError, errorMessage } from '@shiplog/utils';

import {
  executeGitCommand,
  execGitCommand,
  validateGitRef,
  validateRefName,
  validateRevision,
  validateTagPattern,
} from './git-executor.js';
import { isCommitSha, type CommitRef, type CommitSha, type LogOptions, type TagRef } from './types.js';

const RECORD_SEPARATOR = '\x1e';
const UNIT_SEPARATOR = '\x1f';

/**
 * git log format producing one record per commit:
 * sha, author name/email/date, committer name/email/date
 */
const COMMIT_FORMAT = `--format=${['%x1e%H', '%an', '%ae', '%aI', '%cn', '%ce', '%cI'].join('%x1f')}`;

/**
 * Read-only operations the pipeline needs from version control
 */
export interface RepositoryContext {
  /** Absolute path of the working tree root */
  readonly root: string;

  /** Non-merge commits of a revision, most recent first unless reversed */
  listCommits(revision: readonly string[], options?: LogOptions): CommitRef[];

  /** Files each commit of the revision added under `directory` (repository-relative) */
  listAddedFiles(revision: readonly string[], directory: string, options?: LogOptions): Map<CommitSha, string[]>;

  /** Tags matching the glob (all tags when omitted) with their creation dates */
  listTags(pattern?: string): TagRef[];

  /** Every commit reachable from a tag */
  listTagCommits(tagName: string): CommitSha[];

  /** Working tree content of a repository-relative file, undefined when missing */
  readWorkingTreeFile(relativePath: string): Promise<string | undefined>;

  /** Current branch name */
  getCurrentBranch(): string;

  /** URL of a configured remote */
  getRemoteUrl(remote: string): string;

  /** Update the remote-tracking branch for one remote branch */
  fetchRemoteBranch(remote: string, branch: string): void;
}

function logArgs(options: LogOptions): string[] {
  const args: string[] = [];
  if (options.before) {
    args.push(`--before=${options.before}`);
  }
  if (options.after) {
    args.push(`--after=${options.after}`);
  }
  if (options.reverse) {
    args.push('--reverse');
  }
  return args;
}

function checkedRevision(revision: readonly string[]): string[] {
  for (const word of revision) {
    validateRevision(word);
  }
  return [...revision];
}

function parseSha(value: string | undefined): CommitSha {
  const sha = (value ?? '').trim();
  if (!isCommitSha(sha)) {
    throw new Error(`Unexpected git output: "${sha}" is not a commit SHA`);
  }
  return sha;
}

/**
 * Parse `git log` output produced with COMMIT_FORMAT
 */
export function parseCommitLog(stdout: string): CommitRef[] {
  const commits: CommitRef[] = [];

  for (const record of stdout.split(RECORD_SEPARATOR)) {
    if (!record.trim()) continue;

    const [sha, authorName, authorEmail, authorDate, committerName, committerEmail, committerDate] =
      record.trim().split(UNIT_SEPARATOR);

    commits.push({
      sha: parseSha(sha),
      author: { name: authorName ?? '', email: authorEmail ?? '', date: new Date(authorDate ?? '') },
      committer: { name: committerName ?? '', email: committerEmail ?? '', date: new Date(committerDate ?? '') },
    });
  }

  return commits;
}

const QUOTED_PATH_ESCAPES = new Map<string, number>([
  ['a', 0x07],
  ['b', 0x08],
  ['t', 0x09],
  ['n', 0x0a],
  ['v', 0x0b],
  ['f', 0x0c],
  ['r', 0x0d],
  ['"', 0x22],
  ['\\', 0x5c],
]);

/**
 * Undo git's C-style quoting of a path (`"caf\303\251.yaml"` -> `café.yaml`)
 *
 * Paths git left unquoted are returned as they are.
 */
export function unquoteGitPath(path: string): string {
  if (path.length < 2 || !path.startsWith('"') || !path.endsWith('"')) {
    return path;
  }

  const body = path.slice(1, -1);
  const bytes: number[] = [];
  let index = 0;
  while (index < body.length) {
    const char = String.fromCodePoint(body.codePointAt(index) ?? 0);
    if (char !== '\\') {
      bytes.push(...Buffer.from(char, 'utf8'));
      index += char.length;
      continue;
    }

    const octal = /^[0-7]{3}/.exec(body.slice(index + 1, index + 4));
    if (octal) {
      bytes.push(Number.parseInt(octal[0], 8));
      index += 4;
      continue;
    }

    const escaped = QUOTED_PATH_ESCAPES.get(body.charAt(index + 1));
    bytes.push(escaped ?? 0x5c);
    index += escaped === undefined ? 1 : 2;
  }

  return Buffer.from(bytes).toString('utf8');
}

/**
 * Parse `git log --format=%x1e%H --name-only` output into sha -> files
 */
export function parseAddedFiles(stdout: string): Map<CommitSha, string[]> {
  const added = new Map<CommitSha, string[]>();

  for (const record of stdout.split(RECORD_SEPARATOR)) {
    if (!record.trim()) continue;

    const [shaLine, ...fileLines] = record.split('\n');
    const files = fileLines.map(line => line.trim()).filter(Boolean).map(unquoteGitPath);
    added.set(parseSha(shaLine), files);
  }

  return added;
}

/**
 * Parse `git for-each-ref --format=%(refname)%09%(creatordate:iso-strict)` output
 */
export function parseTagList(stdout: string): TagRef[] {
  const tags: TagRef[] = [];

  for (const line of stdout.split('\n')) {
    if (!line.trim()) continue;

    const [refname, date] = line.split('\t');
    if (!refname) continue;

    tags.push({
      name: refname.replace(/^refs\/tags\//, ''),
      date: new Date(date ?? ''),
    });
  }

  return tags;
}

/**
 * RepositoryContext backed by the git CLI
 */
export class GitRepository implements RepositoryContext {
  private constructor(public readonly root: string) {}

  /**
   * Open the repository containing `cwd`
   *
   * @throws ConfigurationError if `cwd` is not inside a git working tree
   */
  static open(cwd: string = process.cwd()): GitRepository {
    const result = executeGitCommand(['rev-parse', '--show-toplevel'], {
      cwd,
      ignoreErrors: true,
    });

    if (!result.success || !result.stdout) {
      throw new ConfigurationError(
        `Not a git repository: ${cwd}${result.stderr ? `\n${result.stderr}` : ''}`
      );
    }

    return new GitRepository(result.stdout);
  }

  private git(args: string[]): string {
    return execGitCommand(args, { cwd: this.root });
  }

  listCommits(revision: readonly string[], options: LogOptions = {}): CommitRef[] {
    const stdout = this.git([
      '--no-pager',
      'log',
      ...checkedRevision(revision),
      '--no-merges',
      ...logArgs(options),
      COMMIT_FORMAT,
      '--',
    ]);
    return parseCommitLog(stdout);
  }

  listAddedFiles(revision: readonly string[], directory: string, options: LogOptions = {}): Map<CommitSha, string[]> {
    const stdout = this.git([
      '-c',
      'core.quotePath=false',
      '--no-pager',
      'log',
      ...checkedRevision(revision),
      '--no-merges',
      ...logArgs({ before: options.before, after: options.after }),
      '--format=%x1e%H',
      '--diff-filter=A',
      '--name-only',
      '--',
      directory,
    ]);
    return parseAddedFiles(stdout);
  }

  listTags(pattern?: string): TagRef[] {
    if (pattern !== undefined) {
      validateTagPattern(pattern);
    }

    const stdout = this.git([
      'for-each-ref',
      '--format=%(refname)%09%(creatordate:iso-strict)',
      pattern ? `refs/tags/${pattern}` : 'refs/tags',
    ]);
    return parseTagList(stdout);
  }

  listTagCommits(tagName: string): CommitSha[] {
    validateRefName(tagName);

    const stdout = this.git(['rev-list', `refs/tags/${tagName}`]);
    return stdout.split('\n').filter(Boolean).map(parseSha);
  }

  async readWorkingTreeFile(relativePath: string): Promise<string | undefined> {
    const normalized = normalize(relativePath);
    if (isAbsolute(normalized) || normalized.split(sep).includes('..')) {
      throw new Error(`Refusing to read outside the repository: ${relativePath}`);
    }

    try {
      return await readFile(join(this.root, normalized), 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      throw new Error(`Failed to read ${relativePath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  getCurrentBranch(): string {
    return this.git(['rev-parse', '--abbrev-ref', 'HEAD']);
  }

  getRemoteUrl(remote: string): string {
    validateGitRef(remote);
    return this.git(['remote', 'get-url', remote]);
  }

  fetchRemoteBranch(remote: string, branch: string): void {
    validateGitRef(remote);
    validateRefName(branch);
    this.git(['fetch', '--quiet', remote, branch]);
  }
}
