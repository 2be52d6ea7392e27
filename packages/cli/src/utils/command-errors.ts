/**
 * Command error reporting
 *
 * Maps errors escaping a command to an exit code: shiplog and GitHub API
 * errors print their message and exit 2, anything else is unexpected and
 * exits 1.
 */

import chalk from 'chalk';

import { GitHubApiError } from '@shiplog/git';
import { isDebugEnabled, isShiplogError, errorMessage } from '@shiplog/utils';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  SHIPLOG_ERROR: 2,
} as const;

/**
 * Print an error to stderr and return the exit code for it
 */
export function reportCommandError(error: unknown): number {
  if (isShiplogError(error) || error instanceof GitHubApiError) {
    console.error(chalk.red(`✗ ${error.message}`));
    return EXIT_CODES.SHIPLOG_ERROR;
  }

  console.error(chalk.red(`✗ Unexpected error: ${errorMessage(error)}`));
  if (isDebugEnabled() && error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack));
  }
  return EXIT_CODES.FAILURE;
}
