/**
 * @fileoverview Main entry point for @tasktrack/core
 *
 * Task store, task file codec, typed errors, logging and settings shared by
 * the tasktrack command line.
 */

// Re-export tasks
export * from './tasks/index.js';

// Re-export errors
export * from './errors/index.js';

// Re-export logging
export * from './logging/index.js';

// Re-export settings
export * from './settings/index.js';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'tasktrack';
