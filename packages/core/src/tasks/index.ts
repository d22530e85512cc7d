/**
 * @fileoverview Task exports
 */

export {
  TASK_STATUSES,
  TASK_FILE_VERSION,
  isTaskStatus,
  emptyTaskFile,
  type Task,
  type TaskStatus,
  type TaskFileData,
} from './types.js';
export { TaskSchema, TaskFileSchema, LegacyTaskSchema, LegacyTaskFileSchema, type LegacyTask } from './schemas.js';
export { parseTaskFile, loadTaskFile, saveTaskFile, type LoadTaskFileOptions } from './task-file.js';
export { TaskStore, assertTaskId, type TaskStoreOptions, type StatusChange } from './task-store.js';
