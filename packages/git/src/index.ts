/**
 * @shiplog/git
 *
 * Git history access for shiplog - commit and tag listings, note artifact
 * discovery, and the GitHub pull request lookup behind `:github/pr`.
 *
 * @packageDocumentation
 */

// Commit and tag references
export {
  isCommitSha,
  type CommitSha,
  type CommitRef,
  type TagRef,
  type Signature,
  type LogOptions,
} from './types.js';

// Repository context (one per pipeline run)
export {
  GitRepository,
  parseCommitLog,
  parseAddedFiles,
  parseTagList,
  unquoteGitPath,
  type RepositoryContext,
} from './repository.js';

// Secure git command execution (low-level - use GitRepository when possible)
export {
  executeGitCommand,
  execGitCommand,
  validateGitRef,
  validateRefName,
  validateRevision,
  validateTagPattern,
  GitCommandError,
  type GitExecutionOptions,
  type GitExecutionResult,
} from './git-executor.js';

// GitHub pull requests
export {
  GITHUB_PR,
  GITHUB_TOKEN_VARIABLES,
  DEFAULT_GITHUB_TIMEOUT_MS,
  GitHubPullRequests,
  GitHubApiError,
  createGitHubClient,
  mapOctokitError,
  readGitHubToken,
  parseGitHubRemote,
  parseRepositorySlug,
  type GitHubRepositorySlug,
  type GitHubApiErrorCode,
  type GitHubClientOptions,
  type PullRequestSummary,
} from './github.js';
