/**
 * @fileoverview CLI Runner
 *
 * One invocation: parse arguments, load settings, open the store, run the
 * command, save if anything changed, then print. Output goes through the
 * injected IO so the whole flow runs in-process under test.
 */
import type { ColorSupportLevel } from 'chalk';
import {
  DEFAULT_SETTINGS,
  TaskStore,
  applyEnvOverrides,
  configureLogger,
  createLogger,
  getSettingsPath,
  isTaskError,
  loadSettings,
  resolveTasksFile,
  type LoggerOptions,
  type TasktrackSettings,
} from '@tasktrack/core';
import { parseCliArgs, type ParsedArgs } from './args.js';
import { executeCommand } from './commands.js';
import { Formatter } from './format.js';
import { BIN_NAME, helpText, versionText } from './help.js';

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env?: Record<string, string | undefined>;
  cwd?: string;
  /** Terminal colour support; false disables colour regardless of settings */
  color?: boolean;
  /** Chalk level for coloured output; detected from the terminal if unset */
  colorLevel?: ColorSupportLevel;
  /** Overrides applied on top of the logging settings */
  logger?: LoggerOptions;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export const processIO: CliIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

function loggerOptions(settings: TasktrackSettings, verbose: boolean, overrides?: LoggerOptions): LoggerOptions {
  return {
    level: verbose ? 'debug' : settings.logging.level,
    ...(settings.logging.pretty !== undefined ? { pretty: settings.logging.pretty } : {}),
    ...overrides,
  };
}

/**
 * Run the CLI with `argv` (without the node and script entries)
 * @returns process exit code
 */
export async function run(argv: string[], io: CliIO = processIO): Promise<number> {
  const env = io.env ?? process.env;
  const terminalColor = io.color ?? !env.NO_COLOR;

  let args: ParsedArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    const fmt = new Formatter({
      color: terminalColor,
      ...(io.colorLevel !== undefined ? { level: io.colorLevel } : {}),
    });
    io.stderr(fmt.error(error instanceof Error ? error.message : String(error)));
    io.stderr(fmt.hint(`Run '${BIN_NAME} --help' for usage.`));
    return EXIT_FAILURE;
  }

  if (args.kind === 'help') {
    io.stdout(helpText());
    return EXIT_OK;
  }
  if (args.kind === 'version') {
    io.stdout(versionText());
    return EXIT_OK;
  }

  const { command, options } = args;

  // Loading settings can log, so the logger starts from defaults plus the
  // environment and is rebuilt only if settings.json changes it.
  const initial = applyEnvOverrides(DEFAULT_SETTINGS, env);
  configureLogger(loggerOptions(initial, options.verbose, io.logger));
  const settings = applyEnvOverrides(await loadSettings(getSettingsPath(env), createLogger('settings')), env);
  if (
    settings.logging.level !== initial.logging.level ||
    settings.logging.pretty !== initial.logging.pretty
  ) {
    configureLogger(loggerOptions(settings, options.verbose, io.logger));
  }
  const logger = createLogger('cli');

  const fmt = new Formatter({
    color: terminalColor && options.color && settings.display.color,
    ...(io.colorLevel !== undefined ? { level: io.colorLevel } : {}),
  });
  const filePath = resolveTasksFile(options.file ?? settings.storage.tasksFile, io.cwd);

  try {
    const store = await TaskStore.open(filePath);
    const lines = executeCommand(command, store, fmt);
    await store.save(filePath);
    for (const line of lines) {
      io.stdout(line);
    }
    logger.debug('Command finished', { command: command.name, path: filePath });
    return EXIT_OK;
  } catch (error) {
    if (isTaskError(error)) {
      logger.debug('Command failed', { command: command.name, code: error.code });
      io.stderr(fmt.error(error.message));
      return EXIT_FAILURE;
    }
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error('Unexpected failure', err);
    io.stderr(fmt.error(err.message));
    return EXIT_FAILURE;
  }
}
