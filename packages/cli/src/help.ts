/**
 * @fileoverview Usage text
 */
import { NAME, VERSION } from '@tasktrack/core';

export const BIN_NAME = 'tasks';

export function versionText(): string {
  return `${NAME} v${VERSION}`;
}

export function helpText(): string {
  return `
${NAME} - Track pending tasks from the command line

USAGE:
  ${BIN_NAME} <command> [arguments] [options]

COMMANDS:
  add <task...>                 Add a new pending task
  list [--filter <status>]      List tasks, optionally only 'pending' or 'completed'
  complete <task_id>            Mark a task as completed
  reopen <task_id>              Mark a completed task as pending again
  remove <task_id>              Remove a task

OPTIONS:
  -f, --file <path>   Task file (default: tasks.json in the current directory)
  --json              Print 'list' output as JSON
  -v, --verbose       Enable debug logging on stderr
  --no-color          Disable coloured output
  -h, --help          Show this help message
  --version           Show version number

ENVIRONMENT:
  TASKS_FILE            Task file path (overridden by --file)
  TASKTRACK_HOME        Settings directory (default: ~/.tasktrack)
  TASKTRACK_LOG_LEVEL   Log level: trace, debug, info, warn, error, fatal
  NO_COLOR              Disable coloured output

EXAMPLES:
  ${BIN_NAME} add "Write the quarterly report"
  ${BIN_NAME} list --filter pending
  ${BIN_NAME} complete 3
`;
}
