/**
 * @fileoverview Error exports
 */

export {
  TaskError,
  TaskErrorCode,
  InvalidArgumentError,
  TaskNotFoundError,
  IdsExhaustedError,
  StoreError,
  isTaskError,
  type TaskErrorCodeType,
  type StoreErrorCode,
} from './task-errors.js';
