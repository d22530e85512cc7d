/**
 * @fileoverview Settings Loader
 *
 * Loads user settings from ~/.tasktrack/settings.json, validates them and
 * merges them over the defaults. Environment variables are applied on top by
 * applyEnvOverrides().
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { createLogger, isLogLevel, type TaskLogger } from '../logging/index.js';
import type { TasktrackSettings, UserSettings, DeepPartial } from './types.js';
import { DEFAULT_SETTINGS } from './defaults.js';
import { UserSettingsSchema } from './schema.js';

// =============================================================================
// Constants
// =============================================================================

const SETTINGS_DIR = '.tasktrack';
const SETTINGS_FILE = 'settings.json';

type Env = Record<string, string | undefined>;

// =============================================================================
// Merge Utilities
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source taking precedence.
 * Arrays are replaced entirely, not merged.
 */
export function deepMerge<T extends object>(target: T, source: DeepPartial<T>): T {
  const base = new Map<string, unknown>(Object.entries(target));
  const overrides: Record<string, unknown> = {};

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = base.get(key);
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      overrides[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      overrides[key] = sourceValue;
    }
  }

  return Object.assign({ ...target }, overrides);
}

// =============================================================================
// Paths
// =============================================================================

/**
 * Get the settings directory. TASKTRACK_HOME wins over ~/.tasktrack.
 */
export function getSettingsDir(env: Env = process.env, homeDir?: string): string {
  if (env.TASKTRACK_HOME) {
    return env.TASKTRACK_HOME;
  }
  return path.join(homeDir ?? os.homedir(), SETTINGS_DIR);
}

export function getSettingsPath(env: Env = process.env, homeDir?: string): string {
  return path.join(getSettingsDir(env, homeDir), SETTINGS_FILE);
}

// =============================================================================
// Settings Loading
// =============================================================================

/**
 * Load user settings from file
 * @returns User settings, or null if the file is missing or invalid
 */
export async function loadUserSettings(
  settingsPath: string,
  logger: TaskLogger = createLogger('settings')
): Promise<UserSettings | null> {
  let content: string;
  try {
    content = await fs.readFile(settingsPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    logger.warn('Failed to read settings, using defaults', {
      path: settingsPath,
      err: error instanceof Error ? error : new Error(String(error)),
    });
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    logger.warn('Settings file is not valid JSON, using defaults', {
      path: settingsPath,
      err: error instanceof Error ? error : new Error(String(error)),
    });
    return null;
  }

  const parsed = UserSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Settings file failed validation, using defaults', {
      path: settingsPath,
      issues: parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return null;
  }

  return parsed.data;
}

/**
 * Load and merge settings with defaults
 */
export async function loadSettings(
  settingsPath: string = getSettingsPath(),
  logger?: TaskLogger
): Promise<TasktrackSettings> {
  const userSettings = await loadUserSettings(settingsPath, logger);

  if (!userSettings) {
    return structuredClone(DEFAULT_SETTINGS);
  }

  return deepMerge(structuredClone(DEFAULT_SETTINGS), userSettings);
}

// =============================================================================
// Environment Variable Overrides
// =============================================================================

/**
 * Apply environment variable overrides to settings.
 * Environment variables take precedence over file settings.
 */
export function applyEnvOverrides(settings: TasktrackSettings, env: Env = process.env): TasktrackSettings {
  const result = { ...settings };

  if (env.TASKS_FILE) {
    result.storage = { ...result.storage, tasksFile: env.TASKS_FILE };
  }

  const level = env.TASKTRACK_LOG_LEVEL;
  if (level && isLogLevel(level)) {
    result.logging = { ...result.logging, level };
  }

  // https://no-color.org: any non-empty value disables colour
  if (env.NO_COLOR) {
    result.display = { ...result.display, color: false };
  }

  return result;
}

// =============================================================================
// Path Resolution
// =============================================================================

/**
 * Resolve the task file path. Absolute paths are returned unchanged;
 * relative ones resolve against `cwd`.
 */
export function resolveTasksFile(tasksFile: string, cwd: string = process.cwd()): string {
  return path.isAbsolute(tasksFile) ? tasksFile : path.resolve(cwd, tasksFile);
}
