/**
 * Log Command
 *
 * Renders the notes of a range as a Markdown changelog (or YAML) to
 * stdout, a file, or the open pull request.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import { loadConfig } from '@shiplog/config';
import { loadNoteRange } from '@shiplog/core';

import { renderChangelog, renderYaml } from '../render/changelog.js';
import { EXIT_CODES, reportCommandError } from '../utils/command-errors.js';
import { openRepository } from '../utils/repository.js';
import { writeOutput } from '../utils/output.js';

export interface LogCommandOptions {
  tagMatch?: string;
  before?: string;
  after?: string;
  reverse?: boolean;
  yaml?: boolean;
  output?: string;
}

/**
 * Render the notes of a range expression
 *
 * @returns Process exit code
 */
export async function runLog(range: string, options: LogCommandOptions = {}): Promise<number> {
  try {
    const repo = openRepository();
    const config = await loadConfig(repo.root);
    const { notes } = await loadNoteRange({
      repo,
      config,
      range,
      tagMatch: options.tagMatch,
      before: options.before,
      after: options.after,
      reverse: options.reverse,
    });

    const text = options.yaml ? renderYaml(notes, range) : renderChangelog(notes);
    const destination = await writeOutput(text, options.output, { repo, github: config.github });

    if (destination !== undefined) {
      console.error(chalk.green(`✓ Wrote ${notes.length} notes to ${destination}`));
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportCommandError(error);
  }
}

export function logCommand(program: Command): void {
  program
    .command('log')
    .description('Render the notes of a commit range as a changelog')
    .argument('[range...]', 'git range (e.g. v1.0..) or :github/pr; default: all of HEAD')
    .option('--tag-match <glob>', 'Only attribute commits to tags matching the glob')
    .option('--before <date>', 'Only commits older than the date')
    .option('--after <date>', 'Only commits newer than the date')
    .option('--reverse', 'Oldest commits first')
    .option('--yaml', 'Output YAML instead of Markdown')
    .option('-o, --output <target>', 'Write to a file, or :github/pr to comment on the pull request')
    .action(async (range: string[], options: LogCommandOptions) => {
      const exitCode = await runLog(range.join(' '), options);
      process.exit(exitCode);
    });
}
