/**
 * @fileoverview Task Error Types
 *
 * Typed error hierarchy for task store and CLI failures, so callers branch
 * on `code` instead of matching message text.
 */

/**
 * Centralized task error codes
 */
export const TaskErrorCode = {
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  TASK_NOT_FOUND: 'TASK_NOT_FOUND',
  IDS_EXHAUSTED: 'IDS_EXHAUSTED',
  // Persistence
  STORE_CORRUPT: 'STORE_CORRUPT',
  STORE_IO: 'STORE_IO',
} as const;

export type TaskErrorCodeType = (typeof TaskErrorCode)[keyof typeof TaskErrorCode];

/**
 * Base task error class
 */
export class TaskError extends Error {
  override readonly name: string = 'TaskError';

  constructor(
    public readonly code: TaskErrorCodeType,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Malformed id, missing description, bad filter or bad command line
 */
export class InvalidArgumentError extends TaskError {
  override readonly name = 'InvalidArgumentError';

  constructor(message: string) {
    super(TaskErrorCode.INVALID_ARGUMENT, message);
  }
}

/**
 * Operation on an id the store does not hold
 */
export class TaskNotFoundError extends TaskError {
  override readonly name = 'TaskNotFoundError';

  constructor(public readonly taskId: number) {
    super(TaskErrorCode.TASK_NOT_FOUND, `Task not found: ${taskId}`);
  }
}

/**
 * The id counter has passed the largest id that can be stored exactly
 */
export class IdsExhaustedError extends TaskError {
  override readonly name = 'IdsExhaustedError';

  constructor(public readonly nextId: number) {
    super(TaskErrorCode.IDS_EXHAUSTED, `No task ids left to assign (next id ${nextId})`);
  }
}

export type StoreErrorCode = typeof TaskErrorCode.STORE_CORRUPT | typeof TaskErrorCode.STORE_IO;

/**
 * Task file could not be read, parsed or written
 */
export class StoreError extends TaskError {
  override readonly name = 'StoreError';

  constructor(
    code: StoreErrorCode,
    public readonly filePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(code, message, options);
  }
}

/**
 * Type guard for TaskError
 */
export function isTaskError(error: unknown): error is TaskError {
  return error instanceof TaskError;
}
