/**
 * Range Resolver
 *
 * Turns a range expression into the commits it spans. Literal git
 * revisions go straight to `git log --no-merges`; the `:github/pr` token is
 * first resolved to `<remote>/<base>..` through the open pull request of
 * the current branch.
 *
 * @packageDocumentation
 */

import { SHIPLOG_DEFAULTS } from '@shiplog/config';
import {
  GITHUB_PR,
  createGitHubClient,
  parseGitHubRemote,
  parseRepositorySlug,
  readGitHubToken,
  type CommitRef,
  type GitHubPullRequests,
  type GitHubRepositorySlug,
  type LogOptions,
  type PullRequestSummary,
  type RepositoryContext,
} from '@shiplog/git';
import { ResolutionError, logDebug } from '@shiplog/utils';

import { toResolutionError } from './git-errors.js';

export interface GitHubSettings {
  /** Remote the base branch is fetched from (default: origin) */
  remote?: string;
  /** "owner/repo"; read from the remote URL when omitted */
  repository?: string;
  /** API request timeout (ms) */
  timeoutMs?: number;
}

export interface ResolveRangeOptions extends LogOptions {
  github?: GitHubSettings;
  /** Environment holding the GitHub token (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedRange {
  /** Expression as given */
  readonly expression: string;
  /** Revision arguments passed to git */
  readonly revision: readonly string[];
  /** Non-merge commits, most recent first unless reversed */
  readonly commits: readonly CommitRef[];
  /** Set when the expression was `:github/pr` */
  readonly pullRequest?: PullRequestSummary;
}

export interface CurrentPullRequest {
  client: GitHubPullRequests;
  slug: GitHubRepositorySlug;
  remote: string;
  pullRequest: PullRequestSummary;
}

function fromGit<T>(context: string, read: () => T): T {
  try {
    return read();
  } catch (error) {
    throw toResolutionError(error, context);
  }
}

/**
 * Find the open pull request of the current branch
 *
 * @throws ConfigurationError if no GitHub token is set
 * @throws ResolutionError if the repository or pull request cannot be determined
 */
export async function findCurrentPullRequest(
  repo: RepositoryContext,
  github: GitHubSettings = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<CurrentPullRequest> {
  const token = readGitHubToken(env);
  const remote = github.remote ?? SHIPLOG_DEFAULTS.REMOTE;

  let slug: GitHubRepositorySlug | undefined;
  if (github.repository) {
    slug = parseRepositorySlug(github.repository);
    if (!slug) {
      throw new ResolutionError(`Invalid GitHub repository "${github.repository}", expected "owner/repo"`);
    }
  } else {
    const url = fromGit(`Could not read the URL of remote "${remote}"`, () => repo.getRemoteUrl(remote));
    slug = parseGitHubRemote(url);
    if (!slug) {
      throw new ResolutionError(`Remote "${remote}" is not a GitHub repository: ${url}`);
    }
  }

  const branch = fromGit('Could not determine the current branch', () => repo.getCurrentBranch());
  if (branch === 'HEAD') {
    throw new ResolutionError(`Cannot resolve ${GITHUB_PR} on a detached HEAD`);
  }

  const client = createGitHubClient({ token, timeoutMs: github.timeoutMs });
  const pullRequest = await client.findOpenPullRequest(slug, branch);
  logDebug('github', `Found pull request #${pullRequest.number}`, { base: pullRequest.baseRef, head: pullRequest.headRef });

  return { client, slug, remote, pullRequest };
}

/**
 * Resolve a range expression
 *
 * An empty expression means the whole history of HEAD. Zero commits is a
 * valid result.
 *
 * @example
 * ```typescript
 * await resolveRange(repo, 'v1.0..HEAD');
 * await resolveRange(repo, ':github/pr', { github: { remote: 'upstream' } });
 * ```
 *
 * @throws ConfigurationError if `:github/pr` is used without a token
 * @throws ResolutionError if the range cannot be resolved
 */
export async function resolveRange(
  repo: RepositoryContext,
  expression = '',
  options: ResolveRangeOptions = {},
): Promise<ResolvedRange> {
  const words = expression.split(/\s+/).filter(Boolean);

  const option = words.find(word => word.startsWith('-'));
  if (option !== undefined) {
    throw new ResolutionError(`Invalid range "${expression}": "${option}" is not a revision`);
  }

  let revision: string[] = words.length > 0 ? words : ['HEAD'];
  let pullRequest: PullRequestSummary | undefined;

  if (words.includes(GITHUB_PR)) {
    if (words.length > 1) {
      throw new ResolutionError(`${GITHUB_PR} cannot be combined with other revisions`);
    }
    const current = await findCurrentPullRequest(repo, options.github, options.env);
    const base = `${current.remote}/${current.pullRequest.baseRef}`;
    fromGit(`Could not fetch ${base}`, () => repo.fetchRemoteBranch(current.remote, current.pullRequest.baseRef));
    revision = [`${base}..`];
    pullRequest = current.pullRequest;
  }

  const { before, after, reverse } = options;
  const commits = fromGit(
    `Could not resolve range "${expression || 'HEAD'}"`,
    () => repo.listCommits(revision, { before, after, reverse }),
  );
  logDebug('git', `Resolved ${commits.length} commits`, { revision });

  return { expression, revision, commits, pullRequest };
}
