/**
 * @shiplog/core
 *
 * The note aggregation and query engine: range resolution, note loading,
 * tag attribution, the Note Range query surface and lint evaluation.
 *
 * @example
 * ```typescript
 * import { GitRepository } from '@shiplog/git';
 * import { loadNoteRange } from '@shiplog/core';
 *
 * const { notes } = await loadNoteRange({ repo: GitRepository.open(), range: 'v1.0..' });
 * for (const { key, notes: bucket } of notes.group('type', { ascendingKeys: true, noneKeyLast: true })) {
 *   console.log(key, bucket.length);
 * }
 * ```
 *
 * @packageDocumentation
 */

export type { FieldValue, NoteRecord } from './types.js';

export { resolveAttribute } from './attribute-path.js';

export {
  createNoteValidator,
  isConditionMet,
  type NoteValidator,
  type NoteValidationResult,
} from './note-validator.js';

export { NoteStore, loadNote, parseNoteDocument } from './note-loader.js';

export {
  buildTagReachability,
  attributeTag,
  compareTags,
  type TagReachability,
} from './tag-attributor.js';

export {
  resolveRange,
  findCurrentPullRequest,
  type CurrentPullRequest,
  type GitHubSettings,
  type ResolveRangeOptions,
  type ResolvedRange,
} from './range-resolver.js';

export {
  NoteRange,
  NoteGroups,
  compareKeys,
  keyIdentity,
  type GroupOptions,
  type MatchOptions,
  type NoteGroup,
} from './note-range.js';

export {
  evaluateLint,
  type LintFailure,
  type LintOptions,
  type LintReason,
  type LintResult,
} from './lint.js';

export {
  loadNoteRange,
  lint,
  type LintPipelineOptions,
  type LintReport,
  type LoadNoteRangeOptions,
  type NoteRangeResult,
} from './pipeline.js';

export { toResolutionError } from './git-errors.js';
