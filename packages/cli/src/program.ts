/**
 * shiplog command line program
 */

import { Command } from 'commander';

import { lintCommand } from './commands/lint.js';
import { logCommand } from './commands/log.js';

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name('shiplog')
    .description('Structured commit notes: lint them on pull requests, render them into changelogs')
    .version(version);

  lintCommand(program); // shiplog lint
  logCommand(program);  // shiplog log

  return program;
}
