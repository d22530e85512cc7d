/**
 * @fileoverview Settings exports
 */

export type {
  TasktrackSettings,
  UserSettings,
  DeepPartial,
  StorageSettings,
  LoggingSettings,
  DisplaySettings,
} from './types.js';
export { DEFAULT_SETTINGS, DEFAULT_TASKS_FILE } from './defaults.js';
export { UserSettingsSchema } from './schema.js';
export {
  deepMerge,
  getSettingsDir,
  getSettingsPath,
  loadUserSettings,
  loadSettings,
  applyEnvOverrides,
  resolveTasksFile,
} from './loader.js';
