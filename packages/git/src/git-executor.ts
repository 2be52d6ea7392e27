/**
 * Secure Git Command Execution
 *
 * Centralized, secure execution of git commands.
 * ALL git command execution in shiplog MUST go through this module.
 *
 * Security principles:
 * 1. Use spawnSync with array arguments (never string interpolation)
 * 2. Validate all user-controlled inputs
 * 3. No shell piping or heredocs
 * 4. Explicit argument construction
 *
 * @packageDocumentation
 */

import { spawnSync, type SpawnSyncOptions } from 'node:child_process';

import { logDebug } from '@shiplog/utils';

const GIT_TIMEOUT = 30000; // 30 seconds

export interface GitExecutionOptions {
  /**
   * Working directory for the command
   * @default process.cwd()
   */
  cwd?: string;

  /**
   * Maximum time to wait for git command (ms)
   * @default 30000
   */
  timeout?: number;

  /**
   * Whether to ignore errors (return the failed result instead of throwing)
   * @default false
   */
  ignoreErrors?: boolean;
}

/**
 * Result of a git command execution
 */
export interface GitExecutionResult {
  /** Standard output from the command */
  stdout: string;
  /** Standard error from the command */
  stderr: string;
  /** Exit code (0 for success) */
  exitCode: number;
  /** Whether the command succeeded */
  success: boolean;
}

/**
 * Error thrown when a git command fails
 */
export class GitCommandError extends Error {
  constructor(
    message: string,
    /** Exit code from the git command */
    public readonly exitCode: number,
    /** Standard error output */
    public readonly stderr: string,
    /** Standard output */
    public readonly stdout: string,
  ) {
    super(message);
    this.name = 'GitCommandError';
  }
}

/**
 * Execute a git command securely using spawnSync with array arguments
 *
 * This is the ONLY function that should execute git commands. All other
 * git operations must go through this function or higher-level abstractions.
 *
 * @param args - Git command arguments (e.g., ['rev-parse', '--show-toplevel'])
 * @throws GitCommandError if command fails and ignoreErrors is false
 *
 * @example
 * ```typescript
 * const result = executeGitCommand(['log', '--format=%H', 'main..'], { cwd: root });
 * console.log(result.stdout.split('\n'));
 * ```
 */
export function executeGitCommand(
  args: string[],
  options: GitExecutionOptions = {}
): GitExecutionResult {
  const {
    cwd,
    timeout = GIT_TIMEOUT,
    ignoreErrors = false,
  } = options;

  if (!Array.isArray(args) || args.length === 0) {
    throw new Error('Git command arguments must be a non-empty array');
  }

  const spawnOptions: SpawnSyncOptions = {
    cwd,
    encoding: 'utf8',
    timeout,
    maxBuffer: 64 * 1024 * 1024, // Full-history logs can be large
    stdio: ['ignore', 'pipe', 'pipe'],
  };

  logDebug('git', `git ${args.join(' ')}`, cwd ? { cwd } : undefined);

  const result = spawnSync('git', args, spawnOptions);

  const stdout = (result.stdout?.toString() || '').trim();
  const stderr = (result.stderr?.toString() || '').trim();
  const exitCode = result.status ?? 1;
  const success = exitCode === 0;

  if (!success && !ignoreErrors) {
    const errorMessage = stderr || stdout || result.error?.message || 'Git command failed';
    throw new GitCommandError(
      `Git command failed: git ${args.join(' ')}\n${errorMessage}`,
      exitCode,
      stderr,
      stdout,
    );
  }

  return {
    stdout,
    stderr,
    exitCode,
    success,
  };
}

/**
 * Execute a git command and return stdout, throwing on error
 *
 * @returns Command stdout, trimmed
 * @throws GitCommandError if command fails
 */
export function execGitCommand(args: string[], options: GitExecutionOptions = {}): string {
  return executeGitCommand(args, options).stdout;
}

/**
 * Validate that a string is safe to use as a git ref
 *
 * Git refs must:
 * - Not contain special shell characters
 * - Not start with a dash (looks like an option)
 * - Not contain path traversal sequences
 * - Match git's ref format rules
 *
 * @throws Error if ref is invalid
 */
export function validateGitRef(ref: string): void {
  if (typeof ref !== 'string' || ref.length === 0) {
    throw new Error('Git ref must be a non-empty string');
  }

  if (/[;&|`$(){}[\]<>!\\"]/.test(ref)) {
    throw new Error(`Invalid git ref: contains shell special characters: ${ref}`);
  }

  if (ref.startsWith('-')) {
    throw new Error(`Invalid git ref: starts with dash: ${ref}`);
  }

  if (ref.includes('..') || ref.includes('//')) {
    throw new Error(`Invalid git ref: contains path traversal: ${ref}`);
  }

  if (ref.includes('\0')) {
    throw new Error('Invalid git ref: contains null byte');
  }

  if (ref.includes('\n') || ref.includes('\r')) {
    throw new Error('Invalid git ref: contains newline');
  }
}

/**
 * Validate a ref name git itself reported (a tag from `for-each-ref`, the
 * base branch of a pull request)
 *
 * Such names already satisfy git's ref format and are passed as array
 * arguments, so punctuation like `release(1)` or `v1!` is allowed. Only
 * option-like and control characters are refused.
 *
 * @throws Error if the name is invalid
 */
export function validateRefName(name: string): void {
  if (typeof name !== 'string' || name.length === 0) {
    throw new Error('Ref name must be a non-empty string');
  }

  if (name.startsWith('-')) {
    throw new Error(`Invalid ref name: starts with dash: ${name}`);
  }

  if (/[\0\n\r]/.test(name)) {
    throw new Error(`Invalid ref name: contains control characters: ${JSON.stringify(name)}`);
  }
}

/**
 * Validate one word of a revision range expression (`main..`, `v1.0...v2.0`,
 * `HEAD~3..HEAD`)
 *
 * Unlike refs, revision words may contain `..`, `~`, `^` and `@{...}`.
 * They must never look like an option.
 *
 * @throws Error if the word is invalid
 */
export function validateRevision(revision: string): void {
  if (typeof revision !== 'string' || revision.length === 0) {
    throw new Error('Revision must be a non-empty string');
  }

  if (revision.startsWith('-')) {
    throw new Error(`Invalid revision: starts with dash: ${revision}`);
  }

  if (/[\0\n\r]/.test(revision)) {
    throw new Error(`Invalid revision: contains control characters: ${JSON.stringify(revision)}`);
  }
}

/**
 * Validate a tag glob pattern (`v*`, `release-[0-9]*`)
 *
 * @throws Error if the pattern is invalid
 */
export function validateTagPattern(pattern: string): void {
  if (typeof pattern !== 'string' || pattern.length === 0) {
    throw new Error('Tag pattern must be a non-empty string');
  }

  if (pattern.startsWith('-')) {
    throw new Error(`Invalid tag pattern: starts with dash: ${pattern}`);
  }

  if (pattern.includes('..') || /[\0\n\r]/.test(pattern)) {
    throw new Error(`Invalid tag pattern: ${JSON.stringify(pattern)}`);
  }
}
