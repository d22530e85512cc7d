/**
 * @fileoverview Task Types
 */

export const TASK_STATUSES = ['pending', 'completed'] as const;

export const TASK_FILE_VERSION = 1;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export interface Task {
  /** Sequential, never reused */
  id: number;
  description: string;
  status: TaskStatus;
  createdAt: string;
  completedAt?: string;
}

/**
 * Snapshot of the store as persisted in the task file
 */
export interface TaskFileData {
  version: typeof TASK_FILE_VERSION;
  /** Id the next added task receives */
  nextId: number;
  tasks: Task[];
}

export function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

export function emptyTaskFile(): TaskFileData {
  return { version: TASK_FILE_VERSION, nextId: 1, tasks: [] };
}
