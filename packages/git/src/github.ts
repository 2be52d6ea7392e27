/**
 * GitHub pull request access
 *
 * Resolves the open pull request of the current branch (for the `:github/pr`
 * range token and output target) and posts comments on it. Every call
 * receives its `Octokit` through `createGitHubClient` so tests can replace
 * the module.
 *
 * @packageDocumentation
 */

import { Octokit } from '@octokit/rest';

import { ConfigurationError, ResolutionError, logDebug } from '@shiplog/utils';

/**
 * Reserved range expression / output target meaning
 * "the open pull request of the current branch"
 */
export const GITHUB_PR = ':github/pr';

/**
 * Environment variables holding the bearer token, in lookup order
 */
export const GITHUB_TOKEN_VARIABLES = ['GITHUB_API_TOKEN', 'GITHUB_TOKEN'] as const;

export const DEFAULT_GITHUB_TIMEOUT_MS = 10000;

export interface GitHubRepositorySlug {
  owner: string;
  repo: string;
}

export interface PullRequestSummary {
  number: number;
  url: string;
  baseRef: string;
  headRef: string;
}

export type GitHubApiErrorCode =
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'TIMEOUT';

/**
 * Typed error for GitHub API calls
 */
export class GitHubApiError extends Error {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: GitHubApiErrorCode,
    /** HTTP status code (if applicable) */
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'GitHubApiError';
  }
}

/**
 * Checks if an error is an Octokit RequestError (duck-typing)
 */
function isOctokitRequestError(error: unknown): error is Error & { status: number } {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}

const ABORT_ERROR_NAMES = new Set(['AbortError', 'TimeoutError']);

/**
 * Whether a request ended because its abort signal fired
 *
 * Octokit rethrows a fetch aborted by `AbortSignal.timeout` as a RequestError
 * with status 500, keeping only the message of the abort.
 */
function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (ABORT_ERROR_NAMES.has(error.name)) {
    return true;
  }
  if (error.cause instanceof Error && ABORT_ERROR_NAMES.has(error.cause.name)) {
    return true;
  }
  return isOctokitRequestError(error) && error.status === 500 && /\b(aborted|timeout)\b/i.test(error.message);
}

/**
 * Maps Octokit RequestError (and unknown errors) to GitHubApiError
 *
 * @param timeoutMs - Timeout the request ran under, reported when it expired
 */
export function mapOctokitError(error: unknown, context: string, timeoutMs?: number): GitHubApiError {
  if (isAbortError(error)) {
    const limit = timeoutMs === undefined ? '' : ` after ${timeoutMs}ms`;
    return new GitHubApiError(`Timed out${limit}: ${context}`, 'TIMEOUT');
  }

  if (isOctokitRequestError(error)) {
    const status = error.status;

    if (status === 401 || status === 403) {
      return new GitHubApiError(`Permission denied: ${context}`, 'PERMISSION_DENIED', status);
    }
    if (status === 404) {
      return new GitHubApiError(`Not found: ${context}`, 'NOT_FOUND', status);
    }
    return new GitHubApiError(`GitHub API error (${status}): ${context}`, 'SERVER_ERROR', status);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new GitHubApiError(`Network error: ${context}: ${message}`, 'NETWORK_ERROR');
}

/**
 * Read the bearer token from the environment
 *
 * @throws ConfigurationError if no token variable is set
 */
export function readGitHubToken(env: NodeJS.ProcessEnv = process.env): string {
  for (const name of GITHUB_TOKEN_VARIABLES) {
    const value = env[name];
    if (value) {
      return value;
    }
  }

  throw new ConfigurationError(
    `A GitHub token is required for ${GITHUB_PR}. Set ${GITHUB_TOKEN_VARIABLES.join(' or ')}.`
  );
}

/**
 * Parse `owner/repo` out of a GitHub remote URL
 *
 * Accepts https, ssh (`git@github.com:owner/repo.git`) and `ssh://` forms.
 *
 * @returns The slug, or undefined if the URL is not a github.com remote
 */
export function parseGitHubRemote(url: string): GitHubRepositorySlug | undefined {
  const match = /github\.com[:/]([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/.exec(url.trim());
  if (!match?.[1] || !match[2]) {
    return undefined;
  }
  return { owner: match[1], repo: match[2] };
}

/**
 * Parse an explicit `owner/repo` setting
 */
export function parseRepositorySlug(value: string): GitHubRepositorySlug | undefined {
  const match = /^([\w.-]+)\/([\w.-]+)$/.exec(value.trim());
  if (!match?.[1] || !match[2]) {
    return undefined;
  }
  return { owner: match[1], repo: match[2] };
}

export interface GitHubClientOptions {
  token: string;
  /** Per-request timeout; requests are never retried */
  timeoutMs?: number;
}

/**
 * Pull request operations against one GitHub API connection
 */
export class GitHubPullRequests {
  private readonly octokit: Octokit;
  private readonly timeoutMs: number;

  constructor(options: GitHubClientOptions) {
    this.octokit = new Octokit({ auth: options.token });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GITHUB_TIMEOUT_MS;
  }

  /**
   * Find the single open pull request whose head is `branch`
   *
   * @throws ResolutionError if the lookup fails or does not find exactly one
   */
  async findOpenPullRequest(slug: GitHubRepositorySlug, branch: string): Promise<PullRequestSummary> {
    const context = `open pull requests for ${slug.owner}/${slug.repo}:${branch}`;
    logDebug('github', `Looking up ${context}`);

    let pulls: Array<{ number: number; html_url: string; base: { ref: string }; head: { ref: string } }>;
    try {
      const response = await this.octokit.rest.pulls.list({
        owner: slug.owner,
        repo: slug.repo,
        head: `${slug.owner}:${branch}`,
        state: 'open',
        request: { signal: AbortSignal.timeout(this.timeoutMs) },
      });
      pulls = response.data;
    } catch (error) {
      const mapped = mapOctokitError(error, context, this.timeoutMs);
      throw new ResolutionError(mapped.message, { cause: mapped });
    }

    if (pulls.length === 0) {
      throw new ResolutionError(`No open pull request found for branch "${branch}" in ${slug.owner}/${slug.repo}`);
    }
    if (pulls.length > 1) {
      const numbers = pulls.map(pull => `#${pull.number}`).join(', ');
      throw new ResolutionError(`Multiple open pull requests found for branch "${branch}": ${numbers}`);
    }

    const [pull] = pulls;
    return {
      number: pull.number,
      url: pull.html_url,
      baseRef: pull.base.ref,
      headRef: pull.head.ref,
    };
  }

  /**
   * Post a comment on a pull request
   *
   * @returns URL of the created comment
   * @throws GitHubApiError if the request fails
   */
  async comment(slug: GitHubRepositorySlug, pullNumber: number, body: string): Promise<string> {
    const context = `comment on ${slug.owner}/${slug.repo}#${pullNumber}`;
    try {
      const response = await this.octokit.rest.issues.createComment({
        owner: slug.owner,
        repo: slug.repo,
        issue_number: pullNumber,
        body,
        request: { signal: AbortSignal.timeout(this.timeoutMs) },
      });
      return response.data.html_url;
    } catch (error) {
      throw mapOctokitError(error, context, this.timeoutMs);
    }
  }
}

/**
 * Create a pull request client
 */
export function createGitHubClient(options: GitHubClientOptions): GitHubPullRequests {
  return new GitHubPullRequests(options);
}
