/**
 * Output targets
 *
 * Rendered text goes to stdout, a file, or a comment on the open pull
 * request of the current branch (`:github/pr`).
 */

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { findCurrentPullRequest, type GitHubSettings } from '@shiplog/core';
import { GITHUB_PR, type RepositoryContext } from '@shiplog/git';
import { ConfigurationError, errorMessage, logDebug } from '@shiplog/utils';

export interface OutputContext {
  repo: RepositoryContext;
  github?: GitHubSettings;
  env?: NodeJS.ProcessEnv;
}

/**
 * Write rendered text to its target
 *
 * @param target - File path, `:github/pr`, or undefined for stdout
 * @returns Where the text went (file path or comment URL), undefined for stdout
 */
export async function writeOutput(text: string, target: string | undefined, context: OutputContext): Promise<string | undefined> {
  if (target === undefined || target === '-') {
    process.stdout.write(text);
    return undefined;
  }

  if (target === GITHUB_PR) {
    const { client, slug, pullRequest } = await findCurrentPullRequest(context.repo, context.github, context.env);
    const url = await client.comment(slug, pullRequest.number, text);
    logDebug('github', `Commented on #${pullRequest.number}`, { url });
    return url;
  }

  const path = resolve(target);
  try {
    await writeFile(path, text, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot write output to ${path}: ${errorMessage(error)}`, { cause: error });
  }
  return path;
}
