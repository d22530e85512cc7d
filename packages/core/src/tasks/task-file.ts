/**
 * @fileoverview Task File
 *
 * Reads and writes the JSON document backing the task store. A missing file
 * is an empty store; anything unreadable is reported as a StoreError and the
 * file is left alone.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import type { ZodError } from 'zod';
import { StoreError, TaskErrorCode } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { LegacyTaskFileSchema, TaskFileSchema, type LegacyTask } from './schemas.js';
import { TASK_FILE_VERSION, emptyTaskFile, type Task, type TaskFileData } from './types.js';

export interface LoadTaskFileOptions {
  /** Clock used to stamp tasks migrated from the legacy layout */
  now?: () => Date;
}

function describeIssues(error: ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function migrateLegacy(entries: LegacyTask[], now: Date): TaskFileData {
  const createdAt = now.toISOString();
  const tasks = entries.map((entry, index): Task => ({
    id: index + 1,
    description: entry.description,
    status: entry.completed ? 'completed' : 'pending',
    createdAt,
    ...(entry.completed ? { completedAt: createdAt } : {}),
  }));
  return { version: TASK_FILE_VERSION, nextId: tasks.length + 1, tasks };
}

/**
 * Validate a parsed JSON document and normalise it into a snapshot
 */
export function parseTaskFile(raw: unknown, filePath: string, options: LoadTaskFileOptions = {}): TaskFileData {
  const logger = createLogger('task-file');
  let data: TaskFileData;

  if (Array.isArray(raw)) {
    const legacy = LegacyTaskFileSchema.safeParse(raw);
    if (!legacy.success) {
      throw new StoreError(
        TaskErrorCode.STORE_CORRUPT,
        filePath,
        `Task file has an unrecognised layout: ${filePath} (${describeIssues(legacy.error)})`
      );
    }
    data = migrateLegacy(legacy.data, (options.now ?? (() => new Date()))());
    logger.debug('Migrated legacy task file', { path: filePath, taskCount: data.tasks.length });
  } else {
    const current = TaskFileSchema.safeParse(raw);
    if (!current.success) {
      throw new StoreError(
        TaskErrorCode.STORE_CORRUPT,
        filePath,
        `Task file has an unrecognised layout: ${filePath} (${describeIssues(current.error)})`
      );
    }
    data = current.data;
  }

  const seen = new Set<number>();
  let maxId = 0;
  for (const task of data.tasks) {
    if (seen.has(task.id)) {
      throw new StoreError(
        TaskErrorCode.STORE_CORRUPT,
        filePath,
        `Task file contains duplicate id ${task.id}: ${filePath}`
      );
    }
    seen.add(task.id);
    maxId = Math.max(maxId, task.id);
  }

  return { ...data, nextId: Math.max(data.nextId, maxId + 1) };
}

/**
 * Load the task file at `filePath`
 */
export async function loadTaskFile(filePath: string, options: LoadTaskFileOptions = {}): Promise<TaskFileData> {
  const logger = createLogger('task-file');

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      logger.debug('Task file not found, starting empty', { path: filePath });
      return emptyTaskFile();
    }
    throw new StoreError(TaskErrorCode.STORE_IO, filePath, `Failed to read task file: ${filePath}`, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new StoreError(TaskErrorCode.STORE_CORRUPT, filePath, `Task file is not valid JSON: ${filePath}`, {
      cause: error,
    });
  }

  const data = parseTaskFile(raw, filePath, options);
  logger.debug('Task file loaded', { path: filePath, taskCount: data.tasks.length, nextId: data.nextId });
  return data;
}

/**
 * Write the snapshot atomically: a temporary sibling is written and then
 * renamed over the target.
 */
export async function saveTaskFile(filePath: string, data: TaskFileData): Promise<void> {
  const logger = createLogger('task-file');
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;

  // The caller reports the StoreError; the failure is only traced here.
  await logger.timed(
    'Task file save',
    async () => {
      try {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(tmpPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
        await fs.rename(tmpPath, filePath);
      } catch (error) {
        await fs.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
          logger.debug('Temporary task file cleanup failed', { path: tmpPath, err: cleanupError });
        });
        throw new StoreError(TaskErrorCode.STORE_IO, filePath, `Failed to write task file: ${filePath}`, {
          cause: error,
        });
      }
    },
    'debug',
    'debug'
  );

  logger.debug('Task file saved', { path: filePath, taskCount: data.tasks.length });
}
