/**
 * @fileoverview Settings Schema
 *
 * Zod schema for the user settings file. Every field is optional; unknown
 * keys are stripped.
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../logging/index.js';

const LogLevelSchema = z.enum(LOG_LEVELS);

export const UserSettingsSchema = z.object({
  version: z.string().optional(),
  storage: z
    .object({
      tasksFile: z.string().min(1).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: LogLevelSchema.optional(),
      pretty: z.boolean().optional(),
    })
    .optional(),
  display: z
    .object({
      color: z.boolean().optional(),
    })
    .optional(),
});
