/**
 * Configuration Schemas with Zod Validation
 *
 * Two documents are validated here:
 * - `shiplog.config.yaml`, the optional project configuration
 * - `.shiplog/schema.yaml`, the note schema descriptor every note is checked against
 */

import { z } from 'zod';

import { SHIPLOG_DEFAULTS, isReservedAttributeName } from './constants.js';
import { createSafeValidator } from './schema-utils.js';

/**
 * Condition operators a field definition can use
 */
export const CONDITION_OPERATORS = ['==', '!=', 'in', 'not in'] as const;

export type ConditionOperator = (typeof CONDITION_OPERATORS)[number];

/**
 * `[operator, label, value]` - the field only applies when another field's
 * value satisfies the comparison
 *
 * @example ['!=', 'type', 'trivial']
 */
export const FieldConditionSchema = z.tuple([
  z.enum(CONDITION_OPERATORS),
  z.string().min(1),
  z.union([z.string(), z.array(z.string())]),
]);

export type FieldCondition = z.infer<typeof FieldConditionSchema>;

/**
 * One field of the note schema descriptor
 */
export const FieldDefinitionSchema = z.object({
  /** Key of the field inside note documents (e.g. "summary") */
  label: z.string().min(1, 'Field label cannot be empty'),

  /** Human-readable name (e.g. "Summary") */
  name: z.string().optional(),

  /** Prompt help text */
  help: z.string().optional(),

  /** Value type (default: string) */
  type: z.enum(['string', 'datetime']).default('string'),

  /** Allowed values */
  choices: z.array(z.string()).min(1, 'Choices cannot be empty').optional(),

  /** Applicability condition */
  condition: FieldConditionSchema.optional(),

  /** Prompt as multi-line text */
  multiline: z.boolean().optional(),

  /** Must be present when applicable (default: true) */
  required: z.boolean().default(true),

  /** Regular expression the value must match from its start */
  matches: z.string().refine(pattern => {
    try {
      new RegExp(pattern);
      return true;
    } catch {
      return false;
    }
  }, 'Invalid regular expression').optional(),
}).strict();

export type FieldDefinition = z.output<typeof FieldDefinitionSchema>;

/**
 * Ordered list of field definitions with unique labels
 */
export const NoteSchemaDescriptorSchema = z
  .array(FieldDefinitionSchema)
  .min(1, 'Schema must declare at least one field')
  .superRefine((fields, ctx) => {
    const seen = new Set<string>();
    fields.forEach((field, index) => {
      if (isReservedAttributeName(field.label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'label'],
          message: `Field label "${field.label}" is reserved for a commit attribute`,
        });
      }
      if (seen.has(field.label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'label'],
          message: `Duplicate field label "${field.label}"`,
        });
      }
      seen.add(field.label);
    });
  });

export type NoteSchemaDescriptor = z.output<typeof NoteSchemaDescriptorSchema>;

/**
 * Project configuration (`shiplog.config.yaml`)
 */
export const ShiplogConfigSchema = z.object({
  /** Directory of note artifacts, relative to the repository root */
  notesDir: z.string().min(1).default(SHIPLOG_DEFAULTS.NOTES_DIR),

  /** Note schema descriptor path, relative to the repository root */
  schemaPath: z.string().min(1).default(SHIPLOG_DEFAULTS.SCHEMA_PATH),

  /** Glob restricting the tags commits are attributed to (e.g. "v*") */
  tagMatch: z.string().min(1).optional(),

  /** Concurrent note reads */
  concurrency: z.number().int().positive().default(SHIPLOG_DEFAULTS.CONCURRENCY),

  /** Lint settings */
  lint: z.object({
    /** Fail when any commit of the range lacks a note */
    requireEveryCommit: z.boolean().default(false),
  }).strict().default({}),

  /** GitHub settings for the `:github/pr` range and output target */
  github: z.object({
    /** Remote whose base branch pull request ranges start from */
    remote: z.string().min(1).default(SHIPLOG_DEFAULTS.REMOTE),

    /** "owner/repo"; defaults to the remote URL */
    repository: z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'Expected "owner/repo"').optional(),

    /** API request timeout (ms) */
    timeoutMs: z.number().int().positive().default(SHIPLOG_DEFAULTS.GITHUB_TIMEOUT_MS),
  }).strict().default({}),
}).strict();

// Input type keeps every key optional; output has defaults applied
export type ShiplogConfigInput = z.input<typeof ShiplogConfigSchema>;
export type ShiplogConfig = z.output<typeof ShiplogConfigSchema>;

/**
 * Safe validation function for project configuration
 */
export const safeValidateConfig = createSafeValidator(ShiplogConfigSchema);

/**
 * Safe validation function for note schema descriptors
 */
export const safeValidateNoteSchema = createSafeValidator(NoteSchemaDescriptorSchema);
