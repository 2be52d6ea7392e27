/**
 * Lint Command
 *
 * Fails when a range has commits but no notes, or when any note is
 * invalid. Diagnostics go to stderr.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import { loadConfig } from '@shiplog/config';
import { lint, type LintResult } from '@shiplog/core';

import { EXIT_CODES, reportCommandError } from '../utils/command-errors.js';
import { openRepository } from '../utils/repository.js';

export interface LintCommandOptions {
  requireEveryCommit?: boolean;
}

function reportFailure(result: LintResult, notesDir: string): void {
  switch (result.reason) {
    case 'no-notes':
      console.error(chalk.red(`No notes were found. Add a note under ${notesDir}`));
      break;
    case 'invalid-notes':
      console.error(chalk.red(`${result.message}:`));
      for (const failure of result.failures) {
        console.error(`${failure.path} (${failure.sha.slice(0, 7)}): ${failure.errors.join('; ')}`);
      }
      break;
    case 'missing-notes':
      console.error(chalk.red(`${result.message}:`));
      for (const sha of result.missing) {
        console.error(sha);
      }
      break;
    default:
      console.error(chalk.red(result.message));
  }
}

/**
 * Run lint over a range expression
 *
 * @returns Process exit code
 */
export async function runLint(range: string, options: LintCommandOptions = {}): Promise<number> {
  try {
    const repo = openRepository();
    const config = await loadConfig(repo.root);
    const { result } = await lint({
      repo,
      config,
      range,
      requireEveryCommit: options.requireEveryCommit,
    });

    if (!result.passed) {
      reportFailure(result, config.notesDir);
      return EXIT_CODES.FAILURE;
    }

    console.log(chalk.green(`✓ ${result.message}`));
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportCommandError(error);
  }
}

export function lintCommand(program: Command): void {
  program
    .command('lint')
    .description('Check that the notes of a commit range are present and valid')
    .argument('[range...]', 'git range (e.g. origin/main..) or :github/pr; default: all of HEAD')
    .option('--require-every-commit', 'Also fail when any commit has no note')
    .action(async (range: string[], options: LintCommandOptions) => {
      const exitCode = await runLint(range.join(' '), options);
      process.exit(exitCode);
    });
}
