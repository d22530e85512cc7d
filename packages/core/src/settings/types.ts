/**
 * @fileoverview Settings Type Definitions
 *
 * Structure of ~/.tasktrack/settings.json.
 */

import type { LogLevel } from '../logging/index.js';

export interface StorageSettings {
  /** Task file path; relative paths resolve against the working directory */
  tasksFile: string;
}

export interface LoggingSettings {
  level: LogLevel;
  /** Force pino-pretty on or off; unset means "when stderr is a terminal" */
  pretty?: boolean;
}

export interface DisplaySettings {
  color: boolean;
}

export interface TasktrackSettings {
  version: string;
  storage: StorageSettings;
  logging: LoggingSettings;
  display: DisplaySettings;
}

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

/**
 * User settings override (partial version of TasktrackSettings)
 */
export type UserSettings = DeepPartial<TasktrackSettings>;
