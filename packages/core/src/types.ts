/**
 * Note record types
 */

import type { CommitRef, TagRef } from '@shiplog/git';

/**
 * Value of a schema-declared field after validation
 *
 * `string` fields keep their text, `datetime` fields become dates.
 */
export type FieldValue = string | Date;

/**
 * One annotated commit of a note range
 *
 * `isValid` is false exactly when `validationErrors` is non-empty.
 */
export interface NoteRecord {
  readonly commit: CommitRef;

  /** Earliest tag containing the commit; undefined while unreleased */
  readonly tag?: TagRef;

  /** Repository-relative path of the note artifact */
  readonly path: string;

  /** Schema-declared fields, in schema order */
  readonly fields: Readonly<Record<string, FieldValue>>;

  readonly isValid: boolean;

  /** `<field>: <reason>` entries */
  readonly validationErrors: readonly string[];
}
