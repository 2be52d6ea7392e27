/**
 * Tag Attributor
 *
 * Assigns each commit the release it first shipped in: the containing tag
 * with the earliest creation date, ties broken by ascending tag name.
 */

import type { CommitSha, RepositoryContext, TagRef } from '@shiplog/git';
import { logDebug } from '@shiplog/utils';

import { toResolutionError } from './git-errors.js';

/**
 * Tag -> range commits it contains, tags in attribution order
 *
 * Read-only once built.
 */
export interface TagReachability {
  readonly entries: ReadonlyArray<{ readonly tag: TagRef; readonly commits: ReadonlySet<CommitSha> }>;
}

function tagTime(tag: TagRef): number {
  const time = tag.date.getTime();
  // Undated tags sort after every dated one
  return Number.isNaN(time) ? Number.POSITIVE_INFINITY : time;
}

/**
 * Attribution order: earliest creation date first, then name
 */
export function compareTags(a: TagRef, b: TagRef): number {
  const timeA = tagTime(a);
  const timeB = tagTime(b);
  if (timeA !== timeB) {
    return timeA < timeB ? -1 : 1;
  }
  if (a.name === b.name) {
    return 0;
  }
  return a.name < b.name ? -1 : 1;
}

/**
 * Compute which of `commitShas` each tag contains
 *
 * Runs one `git rev-list` per tag; nothing is run for an empty commit set.
 *
 * @throws ResolutionError if git cannot list a tag's commits
 */
export function buildTagReachability(
  repo: RepositoryContext,
  tags: readonly TagRef[],
  commitShas: Iterable<CommitSha>,
): TagReachability {
  const wanted = new Set(commitShas);
  if (wanted.size === 0 || tags.length === 0) {
    return { entries: [] };
  }

  const entries = [...tags].sort(compareTags).map(tag => {
    let reachable: CommitSha[];
    try {
      reachable = repo.listTagCommits(tag.name);
    } catch (error) {
      throw toResolutionError(error, `Could not list commits of tag ${tag.name}`);
    }
    const commits = new Set(reachable.filter(sha => wanted.has(sha)));
    logDebug('tags', `${tag.name} contains ${commits.size} of ${wanted.size} commits`);
    return { tag, commits };
  });

  return { entries };
}

/**
 * The tag a commit shipped in, or undefined while unreleased
 */
export function attributeTag(sha: CommitSha, reachability: TagReachability): TagRef | undefined {
  return reachability.entries.find(entry => entry.commits.has(sha))?.tag;
}
