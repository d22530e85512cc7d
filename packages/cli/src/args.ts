/**
 * @fileoverview Argument Parsing
 *
 * Turns argv into a typed command using node's util.parseArgs. Every
 * malformed command line becomes an InvalidArgumentError.
 */
import { parseArgs } from 'util';
import { InvalidArgumentError, isTaskStatus, type TaskStatus } from '@tasktrack/core';

// =============================================================================
// Types
// =============================================================================

export type IdCommandName = 'complete' | 'remove' | 'reopen';

export type CliCommand =
  | { name: 'add'; description: string }
  | { name: 'list'; filter?: TaskStatus; json: boolean }
  | { name: IdCommandName; id: number };

export type CommandName = CliCommand['name'];

export interface GlobalOptions {
  /** Task file override from --file */
  file?: string;
  verbose: boolean;
  /** false when --no-color was given */
  color: boolean;
}

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'command'; command: CliCommand; options: GlobalOptions };

const COMMAND_NAMES: readonly CommandName[] = ['add', 'list', 'complete', 'remove', 'reopen'];

function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value);
}

// =============================================================================
// Parsing
// =============================================================================

const TASK_ID_PATTERN = /^[0-9]+$/;

/**
 * Parse a task id as typed on the command line
 */
export function parseTaskId(raw: string): number {
  const id = TASK_ID_PATTERN.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new InvalidArgumentError(`Invalid task ID: ${raw}`);
  }
  return id;
}

function parseIdCommand(name: IdCommandName, args: string[]): CliCommand {
  const [raw, ...extra] = args;
  if (raw === undefined) {
    throw new InvalidArgumentError(`Missing task ID for '${name}'`);
  }
  if (extra.length > 0) {
    throw new InvalidArgumentError(`Unexpected arguments for '${name}': ${extra.join(' ')}`);
  }
  return { name, id: parseTaskId(raw) };
}

function parseArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        file: { type: 'string', short: 'f' },
        filter: { type: 'string' },
        json: { type: 'boolean' },
        verbose: { type: 'boolean', short: 'v' },
        'no-color': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean' },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

function parseFilter(raw: string | undefined): TaskStatus | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (!isTaskStatus(raw)) {
    throw new InvalidArgumentError(`Invalid filter: ${raw} (expected 'pending' or 'completed')`);
  }
  return raw;
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  const { values, positionals } = parseArgv(argv);

  if (values.help) {
    return { kind: 'help' };
  }
  if (values.version) {
    return { kind: 'version' };
  }

  const [name, ...rest] = positionals;
  if (name === undefined) {
    throw new InvalidArgumentError('No command given');
  }
  if (!isCommandName(name)) {
    throw new InvalidArgumentError(`Unknown command: ${name}`);
  }

  if (name !== 'list' && (values.filter !== undefined || values.json)) {
    throw new InvalidArgumentError(`--filter and --json only apply to 'list'`);
  }

  let command: CliCommand;
  switch (name) {
    case 'add': {
      const description = rest.join(' ').trim();
      if (description.length === 0) {
        throw new InvalidArgumentError('Missing task description');
      }
      command = { name, description };
      break;
    }
    case 'list': {
      if (rest.length > 0) {
        throw new InvalidArgumentError(`Unexpected arguments for 'list': ${rest.join(' ')}`);
      }
      const filter = parseFilter(values.filter);
      command = { name, json: values.json ?? false, ...(filter !== undefined ? { filter } : {}) };
      break;
    }
    case 'complete':
    case 'remove':
    case 'reopen':
      command = parseIdCommand(name, rest);
      break;
  }

  return {
    kind: 'command',
    command,
    options: {
      ...(values.file !== undefined ? { file: values.file } : {}),
      verbose: values.verbose ?? false,
      color: !values['no-color'],
    },
  };
}
