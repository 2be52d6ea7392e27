/**
 * @shiplog/cli
 *
 * Command implementations and renderers behind the `shiplog` executable.
 *
 * @packageDocumentation
 */

export { createProgram } from './program.js';
export { runLint, lintCommand, type LintCommandOptions } from './commands/lint.js';
export { runLog, logCommand, type LogCommandOptions } from './commands/log.js';
export { renderChangelog, renderYaml } from './render/changelog.js';
export { writeOutput, type OutputContext } from './utils/output.js';
export { EXIT_CODES, reportCommandError } from './utils/command-errors.js';
