#!/usr/bin/env node
/**
 * @fileoverview tasktrack CLI Entry Point
 */
import { run } from './run.js';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
