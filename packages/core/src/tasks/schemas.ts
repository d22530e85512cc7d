/**
 * @fileoverview Task File Schemas
 *
 * Two layouts are accepted on read: the current versioned document and the
 * bare array of `{ description, completed }` written by earlier releases.
 */

import { z } from 'zod';
import { TASK_FILE_VERSION, TASK_STATUSES } from './types.js';

export const TaskSchema = z.object({
  id: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
  description: z.string().min(1),
  status: z.enum(TASK_STATUSES),
  createdAt: z.string(),
  completedAt: z.string().optional(),
});

export const TaskFileSchema = z.object({
  version: z.literal(TASK_FILE_VERSION),
  // One past the largest id: the counter once MAX_SAFE_INTEGER has been handed out
  nextId: z.number().int().positive().max(Number.MAX_SAFE_INTEGER + 1),
  tasks: z.array(TaskSchema),
});

export const LegacyTaskSchema = z.object({
  description: z.string().min(1),
  completed: z.boolean(),
});

export const LegacyTaskFileSchema = z.array(LegacyTaskSchema);

export type LegacyTask = z.infer<typeof LegacyTaskSchema>;
