/**
 * @fileoverview Tests for the pino logger wrapper
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { configureLogger, createLogger, isLogLevel, resetLogger } from '../../src/logging/index.js';

async function readLines(file: string): Promise<Record<string, unknown>[]> {
  const content = await fs.readFile(file, 'utf-8');
  return content
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line): Record<string, unknown> => JSON.parse(line));
}

describe('logger', () => {
  let dir: string;
  let logFile: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tasktrack-log-'));
    logFile = path.join(dir, 'tasktrack.log');
  });

  afterEach(async () => {
    resetLogger();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes JSON lines with component context to the destination', async () => {
    configureLogger({ level: 'info', pretty: false, destination: logFile });

    createLogger('task-store').info('Task added', { taskId: 3 });

    const [entry] = await readLines(logFile);
    expect(entry).toMatchObject({
      level: 'info',
      name: 'tasktrack',
      component: 'task-store',
      taskId: 3,
      msg: 'Task added',
    });
  });

  it('drops messages below the configured level', async () => {
    configureLogger({ level: 'warn', pretty: false, destination: logFile });
    const logger = createLogger('cli');

    logger.debug('hidden');
    logger.info('hidden too');
    logger.warn('shown');

    const lines = await readLines(logFile);
    expect(lines.map((l) => l.msg)).toEqual(['shown']);
  });

  it('serialises errors under err', async () => {
    configureLogger({ level: 'error', pretty: false, destination: logFile });

    createLogger('cli').error('Unexpected failure', new Error('boom'));

    const [entry] = await readLines(logFile);
    expect(entry?.msg).toBe('Unexpected failure');
    expect(entry?.err).toMatchObject({ message: 'boom', type: 'Error' });
  });

  it('times async work and rethrows failures', async () => {
    const logger = configureLogger({ level: 'debug', pretty: false, destination: logFile });

    await expect(logger.timed('save', async () => 42)).resolves.toBe(42);
    await expect(
      logger.timed('save', async () => {
        throw new Error('disk full');
      })
    ).rejects.toThrow('disk full');

    const lines = await readLines(logFile);
    expect(lines.map((l) => [l.level, l.msg])).toEqual([
      ['debug', 'save completed'],
      ['error', 'save failed'],
    ]);
  });

  it('logs timed failures at the requested level', async () => {
    const logger = configureLogger({ level: 'debug', pretty: false, destination: logFile });

    await expect(
      logger.timed(
        'save',
        async () => {
          throw new Error('disk full');
        },
        'debug',
        'debug'
      )
    ).rejects.toThrow('disk full');

    const [entry] = await readLines(logFile);
    expect(entry).toMatchObject({ level: 'debug', msg: 'save failed', err: { message: 'disk full' } });
  });

  it('child loggers merge context', () => {
    const parent = configureLogger({ level: 'fatal', pretty: false, destination: logFile });
    const child = parent.child({ component: 'cli' }).child({ taskId: 1 });

    expect(child.context).toEqual({ component: 'cli', taskId: 1 });
    expect(child.level).toBe('fatal');
  });

  it('recognises log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
