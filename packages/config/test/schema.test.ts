/**
 * Tests for Zod schema validation
 */

import { describe, it, expect } from 'vitest';

import { RESERVED_ATTRIBUTE_NAMES, isReservedAttributeName } from '../src/constants.js';
import {
  FieldDefinitionSchema,
  safeValidateConfig,
  safeValidateNoteSchema,
} from '../src/schema.js';

/**
 * Test that a note schema fails validation with an expected error
 */
function expectInvalidNoteSchema(schema: unknown, errorCheck: string): string[] {
  const result = safeValidateNoteSchema(schema);
  expect(result.success).toBe(false);
  const errors = result.success ? [] : result.errors;
  expect(errors.some(e => e.includes(errorCheck))).toBe(true);
  return errors;
}

describe('FieldDefinitionSchema', () => {
  it('should apply defaults for type and required', () => {
    const field = FieldDefinitionSchema.parse({ label: 'summary' });

    expect(field).toEqual({ label: 'summary', type: 'string', required: true });
  });

  it('should accept the full set of keys', () => {
    const field = FieldDefinitionSchema.parse({
      label: 'description',
      name: 'Description',
      help: 'An in-depth description of the changes.',
      type: 'string',
      condition: ['!=', 'type', 'trivial'],
      multiline: true,
      required: false,
    });

    expect(field.condition).toEqual(['!=', 'type', 'trivial']);
    expect(field.required).toBe(false);
  });

  it('should accept list values for membership conditions', () => {
    const field = FieldDefinitionSchema.parse({ label: 'jira', condition: ['in', 'type', ['bug', 'feature']] });

    expect(field.condition).toEqual(['in', 'type', ['bug', 'feature']]);
  });
});

describe('safeValidateNoteSchema', () => {
  it('should validate an ordered list of fields', () => {
    const result = safeValidateNoteSchema([
      { label: 'type', choices: ['bug', 'feature'] },
      { label: 'summary' },
    ]);

    expect(result.success).toBe(true);
    expect(result.success && result.data.map(field => field.label)).toEqual(['type', 'summary']);
  });

  it('should reject entries without a label', () => {
    expectInvalidNoteSchema([{ invalid: 'type' }], '0.label: Required');
  });

  it('should reject duplicate labels', () => {
    expectInvalidNoteSchema([{ label: 'type' }, { label: 'type' }], '1.label: Duplicate field label "type"');
  });

  it('should reject labels that name a commit attribute', () => {
    const errors = expectInvalidNoteSchema(
      [{ label: 'summary' }, { label: 'path' }],
      '1.label: Field label "path" is reserved for a commit attribute'
    );

    expect(errors).toHaveLength(1);
    expectInvalidNoteSchema([{ label: 'commit_tag' }], '0.label: Field label "commit_tag" is reserved');
  });

  it('should reject invalid match patterns', () => {
    expectInvalidNoteSchema([{ label: 'jira', matches: 'WEB-[' }], '0.matches: Invalid regular expression');
  });

  it('should reject unknown condition operators', () => {
    expectInvalidNoteSchema([{ label: 'jira', condition: ['>', 'type', 'bug'] }], '0.condition.0');
  });

  it('should reject a document that is not a list', () => {
    expectInvalidNoteSchema({ label: 'type' }, 'Expected array');
  });
});

describe('safeValidateConfig', () => {
  it('should fill every default for an empty config', () => {
    const result = safeValidateConfig({});

    expect(result).toEqual({
      success: true,
      data: {
        notesDir: '.shiplog/notes',
        schemaPath: '.shiplog/schema.yaml',
        concurrency: 8,
        lint: { requireEveryCommit: false },
        github: { remote: 'origin', timeoutMs: 10000 },
      },
    });
  });

  it('should reject unknown keys', () => {
    const result = safeValidateConfig({ notesDirectory: 'notes' });

    expect(result.success).toBe(false);
    expect(!result.success && result.errors[0]).toContain('Unrecognized key');
  });

  it('should reject malformed repository slugs', () => {
    const result = safeValidateConfig({ github: { repository: 'widgets' } });

    expect(result).toEqual({ success: false, errors: ['github.repository: Expected "owner/repo"'] });
  });

  it('should reject non-positive concurrency', () => {
    const result = safeValidateConfig({ concurrency: 0 });

    expect(result.success).toBe(false);
    expect(!result.success && result.errors[0]).toMatch(/^concurrency: /);
  });
});

describe('reserved attribute names', () => {
  it('should list every commit attribute', () => {
    expect(RESERVED_ATTRIBUTE_NAMES).toEqual([
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
    ]);
  });

  it('should recognize only exact names', () => {
    expect(isReservedAttributeName('is_valid')).toBe(true);
    expect(isReservedAttributeName('commit_tag.date')).toBe(false);
    expect(isReservedAttributeName('paths')).toBe(false);
  });
});
