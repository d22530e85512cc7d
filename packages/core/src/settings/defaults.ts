/**
 * @fileoverview Default Settings
 */

import type { TasktrackSettings } from './types.js';

export const DEFAULT_TASKS_FILE = 'tasks.json';

export const DEFAULT_SETTINGS: TasktrackSettings = {
  version: '0.1.0',
  storage: {
    tasksFile: DEFAULT_TASKS_FILE,
  },
  logging: {
    level: 'warn',
  },
  display: {
    color: true,
  },
};
