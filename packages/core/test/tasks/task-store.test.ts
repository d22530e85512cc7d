/**
 * @fileoverview Tests for the in-memory task store
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { TaskStore } from '../../src/tasks/task-store.js';
import { TASK_FILE_VERSION, type TaskFileData } from '../../src/tasks/types.js';
import { IdsExhaustedError, InvalidArgumentError, TaskNotFoundError } from '../../src/errors/index.js';

const T0 = new Date('2024-03-01T09:00:00.000Z');
const T1 = new Date('2024-03-02T10:30:00.000Z');

describe('TaskStore', () => {
  let clock: Date;
  let store: TaskStore;

  beforeEach(() => {
    clock = T0;
    store = new TaskStore(undefined, { now: () => clock });
  });

  describe('add', () => {
    it('assigns sequential ids starting at 1 with status pending', () => {
      const first = store.add('Buy milk');
      const second = store.add('Walk the dog');

      expect(first).toEqual({ id: 1, description: 'Buy milk', status: 'pending', createdAt: T0.toISOString() });
      expect(second.id).toBe(2);
      expect(store.size).toBe(2);
    });

    it('trims the description', () => {
      expect(store.add('  Water plants \n').description).toBe('Water plants');
    });

    it('rejects an empty or blank description', () => {
      expect(() => store.add('')).toThrow(InvalidArgumentError);
      expect(() => store.add('   ')).toThrow('Task description must not be empty');
      expect(store.size).toBe(0);
      expect(store.isDirty).toBe(false);
    });

    it('throws instead of reusing an id when the counter is past the safe range', () => {
      const exhausted = new TaskStore({ version: TASK_FILE_VERSION, nextId: Number.MAX_SAFE_INTEGER + 1, tasks: [] });

      expect(() => exhausted.add('Buy milk')).toThrow(IdsExhaustedError);
      expect(exhausted.size).toBe(0);
      expect(exhausted.isDirty).toBe(false);
    });

    it('marks the store dirty', () => {
      expect(store.isDirty).toBe(false);
      store.add('Buy milk');
      expect(store.isDirty).toBe(true);
    });
  });

  describe('list', () => {
    beforeEach(() => {
      store.add('Buy milk');
      store.add('Walk the dog');
      store.add('Call the bank');
      store.complete(2);
    });

    it('returns every task in insertion order', () => {
      expect(store.list().map((t) => t.id)).toEqual([1, 2, 3]);
    });

    it('filters by status', () => {
      expect(store.list('pending').map((t) => t.id)).toEqual([1, 3]);
      expect(store.list('completed').map((t) => t.id)).toEqual([2]);
    });

    it('returns an empty array when nothing matches', () => {
      const fresh = new TaskStore();
      expect(fresh.list()).toEqual([]);
      expect(fresh.list('completed')).toEqual([]);
    });

    it('returns copies that do not alias store state', () => {
      const [task] = store.list();
      if (!task) throw new Error('expected a task');
      task.description = 'changed';
      expect(store.get(1)?.description).toBe('Buy milk');
    });

    it('does not mutate state', () => {
      store.markSaved();
      store.list('pending');
      expect(store.isDirty).toBe(false);
    });
  });

  describe('complete', () => {
    it('sets status completed and stamps completedAt', () => {
      store.add('Buy milk');
      clock = T1;

      const { task, changed } = store.complete(1);

      expect(changed).toBe(true);
      expect(task.status).toBe('completed');
      expect(task.completedAt).toBe(T1.toISOString());
      expect(store.list('completed').map((t) => t.id)).toEqual([1]);
    });

    it('is a no-op for an already completed task', () => {
      store.add('Buy milk');
      store.complete(1);
      store.markSaved();
      clock = T1;

      const { task, changed } = store.complete(1);

      expect(changed).toBe(false);
      expect(task.completedAt).toBe(T0.toISOString());
      expect(store.isDirty).toBe(false);
    });

    it('fails with TaskNotFoundError for an unknown id', () => {
      store.add('Buy milk');
      expect(() => store.complete(7)).toThrow(TaskNotFoundError);
      expect(() => store.complete(7)).toThrow('Task not found: 7');
    });

    it('rejects ids that are not positive integers', () => {
      expect(() => store.complete(0)).toThrow(InvalidArgumentError);
      expect(() => store.complete(-3)).toThrow(InvalidArgumentError);
      expect(() => store.complete(1.5)).toThrow('Invalid task ID: 1.5');
    });
  });

  describe('reopen', () => {
    it('moves a completed task back to pending', () => {
      store.add('Buy milk');
      store.complete(1);

      const { task, changed } = store.reopen(1);

      expect(changed).toBe(true);
      expect(task.status).toBe('pending');
      expect(task.completedAt).toBeUndefined();
      expect('completedAt' in task).toBe(false);
    });

    it('reports no change for a pending task', () => {
      store.add('Buy milk');
      store.markSaved();
      expect(store.reopen(1).changed).toBe(false);
      expect(store.isDirty).toBe(false);
    });

    it('fails with TaskNotFoundError for an unknown id', () => {
      expect(() => store.reopen(1)).toThrow(TaskNotFoundError);
    });
  });

  describe('remove', () => {
    it('deletes the task and returns it', () => {
      store.add('Buy milk');
      store.add('Walk the dog');

      const removed = store.remove(1);

      expect(removed.description).toBe('Buy milk');
      expect(store.list().map((t) => t.id)).toEqual([2]);
      expect(store.get(1)).toBeNull();
    });

    it('never reuses the id of a removed task', () => {
      store.add('Buy milk');
      store.add('Walk the dog');
      store.remove(2);

      expect(store.add('Call the bank').id).toBe(3);
    });

    it('keeps the remaining ids stable', () => {
      store.add('a');
      store.add('b');
      store.add('c');
      store.remove(2);

      expect(store.list().map((t) => [t.id, t.description])).toEqual([
        [1, 'a'],
        [3, 'c'],
      ]);
    });

    it('fails with TaskNotFoundError for an unknown id', () => {
      store.add('Buy milk');
      expect(() => store.remove(2)).toThrow(TaskNotFoundError);
      expect(store.size).toBe(1);
    });
  });

  describe('snapshots', () => {
    it('restores tasks and nextId from data', () => {
      const data: TaskFileData = {
        version: TASK_FILE_VERSION,
        nextId: 10,
        tasks: [{ id: 4, description: 'Existing', status: 'pending', createdAt: T0.toISOString() }],
      };
      const restored = new TaskStore(data);

      expect(restored.get(4)?.description).toBe('Existing');
      expect(restored.add('Next').id).toBe(10);
    });

    it('exports the current state', () => {
      store.add('Buy milk');
      store.add('Walk the dog');
      store.remove(1);

      expect(store.toData()).toEqual({
        version: 1,
        nextId: 3,
        tasks: [{ id: 2, description: 'Walk the dog', status: 'pending', createdAt: T0.toISOString() }],
      });
    });

    it('does not share task objects with the input snapshot', () => {
      const data: TaskFileData = {
        version: TASK_FILE_VERSION,
        nextId: 2,
        tasks: [{ id: 1, description: 'Existing', status: 'pending', createdAt: T0.toISOString() }],
      };
      const restored = new TaskStore(data);
      restored.complete(1);

      expect(data.tasks[0]?.status).toBe('pending');
    });
  });
});
