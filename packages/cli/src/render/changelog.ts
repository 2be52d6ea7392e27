/**
 * Changelog renderers
 *
 * Both renderers read the note range through group, filter and iteration
 * only; nothing here touches the repository.
 */

import { stringify as stringifyYaml } from 'yaml';

import type { FieldValue, NoteRange, NoteRecord } from '@shiplog/core';

function formatDate(date: Date): string {
  return Number.isNaN(date.getTime()) ? 'undated' : date.toISOString().slice(0, 10);
}

function formatValue(value: FieldValue): string {
  return value instanceof Date ? value.toISOString() : value;
}

// Continuation lines of multi-line values line up under the value
function indentContinuation(text: string, width: number): string {
  return text.trimEnd().split('\n').join(`\n${' '.repeat(width)}`);
}

function renderNote(record: NoteRecord): string {
  const lines = [`- ${record.commit.author.name} [${record.commit.sha.slice(0, 7)}]`];
  for (const [field, value] of Object.entries(record.fields)) {
    lines.push(`  *${field}*: ${indentContinuation(formatValue(value), 4)}`);
  }
  return lines.join('\n');
}

/**
 * Markdown changelog, one section per release in range order
 *
 * @example
 * ```markdown
 * ## v1.0 (2024-01-05)
 *
 * - Ada Lovelace [1a2b3c4]
 *   *type*: feature
 *   *summary*: Add CSV export
 * ```
 */
export function renderChangelog(notes: NoteRange): string {
  const sections: string[] = [];

  for (const { notes: release } of notes.group('commit_tag')) {
    const tag = release.at(0)?.tag;
    const heading = tag ? `## ${tag.name} (${formatDate(tag.date)})` : '## Unreleased';
    sections.push([heading, ...release.toArray().map(renderNote)].join('\n\n'));
  }

  return sections.length > 0 ? `${sections.join('\n\n')}\n` : '';
}

/**
 * Machine-readable dump of the range
 */
export function renderYaml(notes: NoteRange, expression?: string): string {
  return stringifyYaml({
    range: expression || 'HEAD',
    notes: notes.toArray().map(record => ({
      commit_sha: record.commit.sha,
      commit_author_name: record.commit.author.name,
      commit_author_email: record.commit.author.email,
      commit_author_date: record.commit.author.date.toISOString(),
      commit_tag: record.tag?.name ?? null,
      path: record.path,
      is_valid: record.isValid,
      validation_errors: [...record.validationErrors],
      fields: Object.fromEntries(Object.entries(record.fields).map(([field, value]) => [field, formatValue(value)])),
    })),
  });
}
