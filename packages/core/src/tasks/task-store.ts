/**
 * @fileoverview Task Store
 *
 * Ordered in-memory collection of tasks plus the id counter. The store is
 * built from a TaskFileData snapshot and exported back to one; it does no I/O
 * of its own apart from the open()/save() helpers.
 */

import { IdsExhaustedError, InvalidArgumentError, TaskNotFoundError } from '../errors/index.js';
import { createLogger, type TaskLogger } from '../logging/index.js';
import { loadTaskFile, saveTaskFile, type LoadTaskFileOptions } from './task-file.js';
import { TASK_FILE_VERSION, emptyTaskFile, type Task, type TaskFileData, type TaskStatus } from './types.js';

export interface TaskStoreOptions {
  logger?: TaskLogger;
  /** Clock for createdAt / completedAt stamps */
  now?: () => Date;
}

/**
 * Result of a status change; `changed` is false when the task already had
 * the requested status.
 */
export interface StatusChange {
  task: Task;
  changed: boolean;
}

function copyTask(task: Task): Task {
  return { ...task };
}

export function assertTaskId(id: number): void {
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new InvalidArgumentError(`Invalid task ID: ${id}`);
  }
}

export class TaskStore {
  private tasks: Task[];
  private nextId: number;
  private dirty = false;
  private logger: TaskLogger;
  private now: () => Date;

  constructor(data: TaskFileData = emptyTaskFile(), options: TaskStoreOptions = {}) {
    this.tasks = data.tasks.map(copyTask);
    this.nextId = data.nextId;
    this.logger = options.logger ?? createLogger('task-store');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load a store from the task file at `filePath`
   */
  static async open(filePath: string, options: TaskStoreOptions & LoadTaskFileOptions = {}): Promise<TaskStore> {
    const data = await loadTaskFile(filePath, options);
    return new TaskStore(data, options);
  }

  /**
   * True once a mutation has happened since construction or the last save
   */
  get isDirty(): boolean {
    return this.dirty;
  }

  get size(): number {
    return this.tasks.length;
  }

  /**
   * Append a new pending task
   */
  add(description: string): Task {
    const trimmed = description.trim();
    if (trimmed.length === 0) {
      throw new InvalidArgumentError('Task description must not be empty');
    }
    if (!Number.isSafeInteger(this.nextId)) {
      throw new IdsExhaustedError(this.nextId);
    }

    const task: Task = {
      id: this.nextId,
      description: trimmed,
      status: 'pending',
      createdAt: this.now().toISOString(),
    };

    this.nextId += 1;
    this.tasks.push(task);
    this.dirty = true;
    this.logger.info('Task added', { taskId: task.id });

    return copyTask(task);
  }

  /**
   * Tasks in insertion order, optionally restricted to one status
   */
  list(filter?: TaskStatus): Task[] {
    const matching = filter ? this.tasks.filter((t) => t.status === filter) : this.tasks;
    return matching.map(copyTask);
  }

  get(id: number): Task | null {
    const task = this.tasks.find((t) => t.id === id);
    return task ? copyTask(task) : null;
  }

  /**
   * Mark a task completed. Completing a completed task keeps its original
   * completedAt.
   */
  complete(id: number): StatusChange {
    const task = this.find(id);
    if (task.status === 'completed') {
      return { task: copyTask(task), changed: false };
    }

    task.status = 'completed';
    task.completedAt = this.now().toISOString();
    this.dirty = true;
    this.logger.info('Task completed', { taskId: id });

    return { task: copyTask(task), changed: true };
  }

  /**
   * Move a completed task back to pending
   */
  reopen(id: number): StatusChange {
    const task = this.find(id);
    if (task.status === 'pending') {
      return { task: copyTask(task), changed: false };
    }

    task.status = 'pending';
    delete task.completedAt;
    this.dirty = true;
    this.logger.info('Task reopened', { taskId: id });

    return { task: copyTask(task), changed: true };
  }

  /**
   * Delete a task; its id is not handed out again
   */
  remove(id: number): Task {
    assertTaskId(id);
    const index = this.tasks.findIndex((t) => t.id === id);
    if (index === -1) {
      throw new TaskNotFoundError(id);
    }

    const [removed] = this.tasks.splice(index, 1);
    if (!removed) {
      throw new TaskNotFoundError(id);
    }
    this.dirty = true;
    this.logger.info('Task removed', { taskId: id });

    return removed;
  }

  toData(): TaskFileData {
    return {
      version: TASK_FILE_VERSION,
      nextId: this.nextId,
      tasks: this.tasks.map(copyTask),
    };
  }

  markSaved(): void {
    this.dirty = false;
  }

  /**
   * Persist to `filePath` if anything changed
   * @returns whether a write happened
   */
  async save(filePath: string): Promise<boolean> {
    if (!this.dirty) {
      return false;
    }
    await saveTaskFile(filePath, this.toData());
    this.markSaved();
    return true;
  }

  private find(id: number): Task {
    assertTaskId(id);
    const task = this.tasks.find((t) => t.id === id);
    if (!task) {
      throw new TaskNotFoundError(id);
    }
    return task;
  }
}
