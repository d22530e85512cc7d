/**
 * @fileoverview Command Execution
 *
 * Runs one parsed command against a loaded store and returns the lines to
 * print. Persistence is left to the caller.
 */
import type { TaskStore } from '@tasktrack/core';
import type { CliCommand } from './args.js';
import type { Formatter } from './format.js';

export function executeCommand(command: CliCommand, store: TaskStore, fmt: Formatter): string[] {
  switch (command.name) {
    case 'add': {
      const task = store.add(command.description);
      return [fmt.success(`Task ${task.id} added: ${task.description}`)];
    }

    case 'list': {
      const tasks = store.list(command.filter);
      if (command.json) {
        return [JSON.stringify(tasks, null, 2)];
      }
      if (tasks.length === 0) {
        return ['No tasks found.'];
      }
      return tasks.map((task) => fmt.task(task));
    }

    case 'complete': {
      const { task, changed } = store.complete(command.id);
      return changed
        ? [fmt.success(`Task ${task.id} marked as completed!`)]
        : [fmt.notice(`Task ${task.id} is already completed.`)];
    }

    case 'reopen': {
      const { task, changed } = store.reopen(command.id);
      return changed
        ? [fmt.success(`Task ${task.id} reopened.`)]
        : [fmt.notice(`Task ${task.id} is already pending.`)];
    }

    case 'remove': {
      const task = store.remove(command.id);
      return [fmt.success(`Task ${task.id} removed: ${task.description}`)];
    }
  }
}
