import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import path from 'path';
import { FileTaskStore } from '../../src/storage/FileTaskStore.js';
import { StatusService } from '../../src/services/StatusService.js';
import { StatusRecord } from '../../src/types/index.js';
import { TaskNotFoundError, ValidationError } from '../../src/types/errors.js';
import { createQuestion, createTestHomeDir, removeTestHomeDir } from '../fixtures/index.js';

const status = (overrides?: Partial<StatusRecord>): StatusRecord => ({
  status: 'running',
  detail: 'Agent session active',
  updated_at: '2026-01-15T10:00:00.000Z',
  pid: 4321,
  ...overrides,
});

describe('StatusService', () => {
  let homeDir: string;
  let store: FileTaskStore;
  let alive: Set<number>;
  let service: StatusService;

  beforeEach(async () => {
    homeDir = createTestHomeDir();
    store = new FileTaskStore(homeDir);
    await store.initialize();
    await store.create('t1');
    alive = new Set();
    service = new StatusService(store, pid => alive.has(pid));
  });

  afterEach(async () => {
    await store.close();
    removeTestHomeDir(homeDir);
  });

  describe('getStatus', () => {
    it('should report a live supervisor', async () => {
      await store.writePid('t1', 4321);
      await store.writeDocument('t1', 'status', status());
      alive.add(4321);

      const view = await service.getStatus('t1');

      expect(view).toMatchObject({ taskId: 't1', liveness: 'alive', status: status() });
      expect(view.warning).toBeUndefined();
      expect(view.bridgeLogPath).toBe(path.join(homeDir, 'tasks', 't1', 'bridge.log'));
    });

    it('should warn when the supervisor died mid-task', async () => {
      await store.writePid('t1', 4321);
      await store.writeDocument('t1', 'status', status({ status: 'waiting_for_answer' }));

      const view = await service.getStatus('t1');

      expect(view.liveness).toBe('dead');
      expect(view.warning).toBe('Process is dead but status shows waiting_for_answer. Task may have crashed.');
    });

    it('should not warn about a dead supervisor once the task is terminal', async () => {
      await store.writePid('t1', 4321);
      await store.writeDocument('t1', 'status', status({ status: 'complete', detail: 'Task finished successfully' }));

      const view = await service.getStatus('t1');

      expect(view.liveness).toBe('dead');
      expect(view.warning).toBeUndefined();
    });

    it('should fall back to the pid recorded in the status', async () => {
      await store.writeDocument('t1', 'status', status({ pid: 555 }));
      alive.add(555);

      expect((await service.getStatus('t1')).liveness).toBe('alive');
    });

    it('should report unknown liveness without any pid', async () => {
      const view = await service.getStatus('t1');

      expect(view).toMatchObject({ status: null, metadata: null, liveness: 'unknown' });
    });

    it('should not modify the task directory', async () => {
      await store.writePid('t1', 4321);
      await store.writeDocument('t1', 'status', status());

      await service.getStatus('t1');

      expect(await store.readDocument('t1', 'status')).toEqual(status());
    });

    it('should reject unknown and malformed task ids', async () => {
      await expect(service.getStatus('missing')).rejects.toBeInstanceOf(TaskNotFoundError);
      await expect(service.getStatus('missing')).rejects.toThrow("Task 'missing' not found");
      await expect(service.getStatus('../t1')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('Task documents', () => {
    it('should tail the agent output', async () => {
      await store.appendToLog('t1', 'output', 'one\ntwo\nthree\n');

      expect(await service.getOutput('t1', 2)).toBe('two\nthree');
      expect(await service.getOutput('t1')).toBe('one\ntwo\nthree');
    });

    it('should return the pending question', async () => {
      const question = createQuestion();
      await store.writeDocument('t1', 'question', {
        question: question.question,
        options: question.options,
        questions: [question],
        asked_at: '2026-01-15T10:00:00.000Z',
      });

      expect((await service.getQuestion('t1'))?.question).toBe('Which database?');
    });

    it('should return null where nothing has been written', async () => {
      expect(await service.getOutput('t1')).toBeNull();
      expect(await service.getQuestion('t1')).toBeNull();
      expect(await service.getResult('t1')).toBeNull();
      expect(await service.getLog('t1')).toBeNull();
    });

    it('should return the bridge log', async () => {
      await store.appendToLog('t1', 'bridge', '{"level":"info"}\n');
      expect(await service.getLog('t1')).toBe('{"level":"info"}\n');
    });
  });

  describe('listTasks', () => {
    it('should summarize every task in id order', async () => {
      await store.create('t0');
      await store.writeDocument('t1', 'status', status());

      expect(await service.listTasks()).toEqual([
        { taskId: 't0', status: 'unknown', detail: '(no status)', hasStatus: false },
        {
          taskId: 't1',
          status: 'running',
          detail: 'Agent session active',
          updatedAt: '2026-01-15T10:00:00.000Z',
          hasStatus: true,
        },
      ]);
    });

    it('should list a task with an unreadable status as unknown', async () => {
      writeFileSync(path.join(store.taskDir('t1'), 'status.json'), 'not json');

      expect(await service.listTasks()).toEqual([
        { taskId: 't1', status: 'unknown', detail: '(no status)', hasStatus: false },
      ]);
    });

    it('should return an empty list when there are no tasks', async () => {
      const emptyHome = createTestHomeDir();
      const emptyStore = new FileTaskStore(emptyHome);
      await emptyStore.initialize();

      expect(await new StatusService(emptyStore).listTasks()).toEqual([]);

      await emptyStore.close();
      removeTestHomeDir(emptyHome);
    });
  });
});
