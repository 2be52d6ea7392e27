/**
 * Git object types
 *
 * Commit and tag references are read once per pipeline run and never
 * mutated afterwards.
 */

/**
 * Branded type for git commit SHAs
 *
 * Commit SHAs are 40-character hexadecimal identifiers. Only values read
 * back from git (or checked by `isCommitSha`) carry the brand.
 */
export type CommitSha = string & { readonly __brand: 'CommitSha' };

export function isCommitSha(value: string): value is CommitSha {
  return /^[0-9a-f]{40}$/.test(value);
}

/**
 * Author or committer identity
 */
export interface Signature {
  name: string;
  email: string;
  date: Date;
}

/**
 * One commit of a resolved range
 */
export interface CommitRef {
  readonly sha: CommitSha;
  readonly author: Readonly<Signature>;
  readonly committer: Readonly<Signature>;
}

/**
 * A tag and its creation date
 *
 * The date is the tagger date for annotated tags and the committer date of
 * the tagged commit for lightweight tags.
 */
export interface TagRef {
  readonly name: string;
  readonly date: Date;
}

/**
 * `git log` filters shared by commit and note listings
 */
export interface LogOptions {
  /** Only commits older than this date (git --before) */
  before?: string;
  /** Only commits newer than this date (git --after) */
  after?: string;
  /** Oldest commit first (git --reverse) */
  reverse?: boolean;
}
