/**
 * Configuration Constants
 *
 * Single source of truth for shiplog's default paths and settings.
 *
 * @packageDocumentation
 */

/**
 * Default configuration values
 *
 * @example
 * ```typescript
 * import { SHIPLOG_DEFAULTS } from '@shiplog/config';
 *
 * const notesDir = config.notesDir ?? SHIPLOG_DEFAULTS.NOTES_DIR;
 * ```
 */
export const SHIPLOG_DEFAULTS = {
  /** Project configuration file, at the repository root */
  CONFIG_FILE_NAME: 'shiplog.config.yaml' as const,

  /** Directory holding note artifacts, relative to the repository root */
  NOTES_DIR: '.shiplog/notes' as const,

  /** Note schema descriptor, relative to the repository root */
  SCHEMA_PATH: '.shiplog/schema.yaml' as const,

  /** Concurrent note reads */
  CONCURRENCY: 8 as const,

  /** Remote whose base branch `:github/pr` ranges start from */
  REMOTE: 'origin' as const,

  /** GitHub API request timeout (ms) */
  GITHUB_TIMEOUT_MS: 10000 as const,
} as const;

export type ShiplogDefaults = typeof SHIPLOG_DEFAULTS;

/**
 * Record attributes that attribute paths resolve before schema fields, so
 * no schema field may use one as its label
 */
export const RESERVED_ATTRIBUTE_NAMES = [
  'commit_sha',
  'commit_author_name',
  'commit_author_email',
  'commit_author_date',
  'commit_committer_name',
  'commit_committer_email',
  'commit_committer_date',
  'commit_tag',
  'is_valid',
  'validation_errors',
  'path',
] as const;

export type ReservedAttributeName = (typeof RESERVED_ATTRIBUTE_NAMES)[number];

export function isReservedAttributeName(name: string): name is ReservedAttributeName {
  return RESERVED_ATTRIBUTE_NAMES.some(reserved => reserved === name);
}
