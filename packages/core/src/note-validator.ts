/**
 * Note Validator
 *
 * Builds a zod schema per field of the note schema descriptor and checks
 * note documents against it. Violations are collected, never thrown:
 * every field that passes its own checks is kept so that a renderer can
 * still show a partially valid note.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

import { isReservedAttributeName, type FieldCondition, type FieldDefinition, type NoteSchemaDescriptor } from '@shiplog/config';
import { ConfigurationError, ValidationError } from '@shiplog/utils';

import type { FieldValue } from './types.js';

export interface NoteValidationResult {
  /** Fields that passed validation, in schema order */
  fields: Record<string, FieldValue>;
  /** One error per violated constraint */
  errors: ValidationError[];
}

/**
 * Checks one parsed note document
 */
export interface NoteValidator {
  validate(document: Readonly<Record<string, unknown>>): NoteValidationResult;
}

type FieldSchema = z.ZodType<FieldValue, z.ZodTypeDef, unknown>;

function toText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

/** ISO-8601 date, optionally with a time and offset */
const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

const datetimeValue = z.unknown().transform((value, ctx): Date => {
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value;
  }
  if (typeof value !== 'string') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a datetime' });
    return z.NEVER;
  }

  const date = ISO_DATETIME.test(value) ? new Date(value) : undefined;
  if (date === undefined || Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Value "${value}" is not a valid datetime` });
    return z.NEVER;
  }
  return date;
});

function fieldSchema(field: FieldDefinition): FieldSchema {
  if (field.type === 'datetime') {
    return datetimeValue;
  }

  const { choices, matches } = field;
  const pattern = matches === undefined ? undefined : new RegExp(`^(?:${matches})`);

  return z.unknown().transform((raw, ctx): string => {
    const value = toText(raw);
    if (value === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a string' });
      return z.NEVER;
    }

    if (choices && !choices.includes(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Value "${value}" is not one of: ${choices.join(', ')}`,
      });
    }
    if (pattern && !pattern.test(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Value "${value}" does not match pattern "${matches ?? ''}"`,
      });
    }
    return value;
  });
}

/**
 * Empty strings and null count as absent
 */
function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Evaluate `[operator, label, value]` against the raw document
 */
export function isConditionMet(condition: FieldCondition, document: Readonly<Record<string, unknown>>): boolean {
  const [operator, label, expected] = condition;
  const actual = toText(Object.hasOwn(document, label) ? document[label] : undefined);
  const options = Array.isArray(expected) ? expected : [expected];

  switch (operator) {
    case '==':
      return !Array.isArray(expected) && actual === expected;
    case '!=':
      return Array.isArray(expected) || actual !== expected;
    case 'in':
      return actual !== undefined && options.includes(actual);
    case 'not in':
      return actual === undefined || !options.includes(actual);
  }
}

/**
 * Create the validator for a note schema descriptor
 *
 * @example
 * ```typescript
 * const validator = createNoteValidator([{ label: 'summary', type: 'string', required: true }]);
 * validator.validate({}).errors.map(String); // ['ValidationError: summary: Required']
 * ```
 *
 * @throws ConfigurationError if a field label is a reserved attribute name
 */
export function createNoteValidator(schema: NoteSchemaDescriptor): NoteValidator {
  const reserved = schema.find(field => isReservedAttributeName(field.label));
  if (reserved) {
    throw new ConfigurationError(`Field label "${reserved.label}" is reserved for a commit attribute`);
  }

  const checks = schema.map(field => ({ field, check: fieldSchema(field) }));
  const labels = new Set(schema.map(field => field.label));

  return {
    validate(document) {
      const fields: Record<string, FieldValue> = {};
      const errors: ValidationError[] = [];

      for (const { field, check } of checks) {
        if (field.condition && !isConditionMet(field.condition, document)) {
          continue;
        }

        const raw = Object.hasOwn(document, field.label) ? document[field.label] : undefined;
        if (isAbsent(raw)) {
          if (field.required) {
            errors.push(new ValidationError(field.label, 'Required'));
          }
          continue;
        }

        const result = check.safeParse(raw);
        if (result.success) {
          fields[field.label] = result.data;
        } else {
          errors.push(...result.error.errors.map(issue => new ValidationError(field.label, issue.message)));
        }
      }

      for (const key of Object.keys(document)) {
        if (!labels.has(key)) {
          errors.push(new ValidationError(key, 'Unknown field'));
        }
      }

      return { fields, errors };
    },
  };
}
