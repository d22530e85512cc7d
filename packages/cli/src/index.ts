/**
 * @fileoverview Main entry point for @tasktrack/cli
 */

export {
  parseCliArgs,
  parseTaskId,
  type CliCommand,
  type CommandName,
  type IdCommandName,
  type GlobalOptions,
  type ParsedArgs,
} from './args.js';
export { executeCommand } from './commands.js';
export { Formatter, type FormatterOptions } from './format.js';
export { BIN_NAME, helpText, versionText } from './help.js';
export { run, processIO, EXIT_OK, EXIT_FAILURE, type CliIO } from './run.js';
