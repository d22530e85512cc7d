/**
 * @fileoverview Output Formatting
 *
 * Chalk styles for command output. With colour off every helper returns
 * plain text.
 */
import chalk, { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import type { Task, TaskStatus } from '@tasktrack/core';

export interface FormatterOptions {
  color: boolean;
  /** Chalk level used when colour is on; detected from the terminal if unset */
  level?: ColorSupportLevel;
}

const STATUS_LABELS: Record<TaskStatus, string> = {
  pending: 'Pending',
  completed: 'Completed',
};

export class Formatter {
  private readonly c: ChalkInstance;

  constructor(options: FormatterOptions) {
    if (!options.color) {
      this.c = new Chalk({ level: 0 });
    } else {
      this.c = options.level === undefined ? chalk : new Chalk({ level: options.level });
    }
  }

  status(status: TaskStatus): string {
    const label = STATUS_LABELS[status];
    return status === 'completed' ? this.c.green(label) : this.c.yellow(label);
  }

  /** `<id>. <description> (<Status>)` */
  task(task: Task): string {
    return `${this.c.dim(`${task.id}.`)} ${task.description} (${this.status(task.status)})`;
  }

  success(message: string): string {
    return this.c.green(message);
  }

  notice(message: string): string {
    return this.c.yellow(message);
  }

  error(message: string): string {
    return this.c.red(`Error: ${message}`);
  }

  hint(message: string): string {
    return this.c.dim(message);
  }
}
