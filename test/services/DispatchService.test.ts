import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { FileTaskStore } from '../../src/storage/FileTaskStore.js';
import { DispatchService, DispatchOptions } from '../../src/services/DispatchService.js';
import { StatusWriter } from '../../src/services/StatusWriter.js';
import { DuplicateTaskError, LaunchFailedError, ValidationError } from '../../src/types/errors.js';
import { InProcessLauncher, createTestHomeDir, removeTestHomeDir } from '../fixtures/index.js';

describe('DispatchService', () => {
  let homeDir: string;
  let store: FileTaskStore;
  let launcher: InProcessLauncher;
  let sleeps: number[];

  const createService = (options?: Partial<DispatchOptions>) =>
    new DispatchService(store, launcher, {
      launchGraceMs: 1000,
      isAlive: () => true,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      ...options,
    });

  beforeEach(async () => {
    homeDir = createTestHomeDir();
    store = new FileTaskStore(homeDir);
    await store.initialize();
    launcher = new InProcessLauncher();
    sleeps = [];
  });

  afterEach(async () => {
    await store.close();
    removeTestHomeDir(homeDir);
  });

  describe('dispatch', () => {
    it('should create the task and launch its supervisor', async () => {
      const result = await createService().dispatch({ taskId: 't1', workdir: homeDir, prompt: 'Fix the failing test' });

      expect(result).toEqual({
        taskId: 't1',
        pid: 900001,
        taskDir: path.join(homeDir, 'tasks', 't1'),
        workdir: homeDir,
      });
      expect(launcher.requests).toEqual([{
        taskId: 't1',
        workdir: homeDir,
        prompt: 'Fix the failing test',
        logPath: path.join(homeDir, 'tasks', 't1', 'bridge.log'),
      }]);
      expect(await store.readPid('t1')).toBe(900001);
    });

    it('should wait out the launch grace period', async () => {
      await createService({ launchGraceMs: 250 }).dispatch({ taskId: 't1', workdir: homeDir, prompt: 'Go' });
      expect(sleeps).toEqual([250]);
    });

    it('should generate a timestamp task id when none is given', async () => {
      const now = () => new Date(2026, 0, 15, 9, 5, 7);
      const result = await createService({ now }).dispatch({ workdir: homeDir, prompt: 'Go' });

      expect(result.taskId).toBe('task-20260115-090507');
      expect(await store.exists('task-20260115-090507')).toBe(true);
    });

    it('should resolve a relative workdir', async () => {
      const result = await createService().dispatch({ taskId: 't1', workdir: '.', prompt: 'Go' });

      expect(result.workdir).toBe(process.cwd());
      expect(launcher.requests[0]?.workdir).toBe(process.cwd());
    });
  });

  describe('Validation', () => {
    it('should reject a missing workdir before creating anything', async () => {
      const workdir = path.join(homeDir, 'does-not-exist');

      await expect(createService().dispatch({ taskId: 't1', workdir, prompt: 'Go' }))
        .rejects.toThrow(`workdir does not exist: ${workdir}`);
      expect(await store.exists('t1')).toBe(false);
      expect(launcher.requests).toHaveLength(0);
    });

    it('should reject a blank prompt', async () => {
      const error = await createService()
        .dispatch({ taskId: 't1', workdir: homeDir, prompt: '   ' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ message: '--prompt must not be blank' });
      expect(launcher.requests).toHaveLength(0);
    });

    it('should reject an empty prompt', async () => {
      await expect(createService().dispatch({ taskId: 't1', workdir: homeDir, prompt: '' }))
        .rejects.toThrow('--prompt is required');
    });

    it('should reject a task id that is not a single path segment', async () => {
      await expect(createService().dispatch({ taskId: 'a/b', workdir: homeDir, prompt: 'Go' }))
        .rejects.toThrow('Task ID can only contain letters, numbers, dots, hyphens, and underscores');
    });
  });

  describe('Duplicates', () => {
    it('should refuse to reuse a task id', async () => {
      await store.create('t1');

      await expect(createService().dispatch({ taskId: 't1', workdir: homeDir, prompt: 'Go' }))
        .rejects.toThrow(new DuplicateTaskError('t1', path.join(homeDir, 'tasks', 't1')).message);
      expect(launcher.requests).toHaveLength(0);
    });
  });

  describe('Launch checks', () => {
    it('should fail when the supervisor is gone after the grace period', async () => {
      const service = createService({ isAlive: () => false });
      const logPath = path.join(homeDir, 'tasks', 't1', 'bridge.log');

      const error = await service.dispatch({ taskId: 't1', workdir: homeDir, prompt: 'Go' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LaunchFailedError);
      expect(error).toMatchObject({
        message: `Supervisor process failed to start. Check: ${logPath}`,
        code: 'LAUNCH_FAILED',
      });
    });

    it('should accept a supervisor that already finished the task', async () => {
      launcher = new InProcessLauncher(async (request, pid) => {
        const status = new StatusWriter(store, request.taskId, pid);
        await status.transition('starting', 'Initializing agent session');
        await status.transition('complete', 'Task finished successfully');
      });
      const service = createService({
        isAlive: () => false,
        sleep: () => launcher.settled(),
      });

      const result = await service.dispatch({ taskId: 't1', workdir: homeDir, prompt: 'Go' });
      expect(result.pid).toBe(900001);
    });
  });
});
