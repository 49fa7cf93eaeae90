import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileTaskStore } from '../../src/storage/FileTaskStore.js';
import { AnswerService } from '../../src/services/AnswerService.js';
import { SupervisorService } from '../../src/services/SupervisorService.js';
import { DocumentKind, TaskDocuments } from '../../src/types/index.js';
import {
  ScriptStep,
  ScriptedAgentRunner,
  ask,
  createManualClock,
  createQuestion,
  createTestHomeDir,
  events,
  fail,
  removeTestHomeDir,
  resultEvent,
  textEvent,
  toolEvent,
} from '../fixtures/index.js';

/**
 * Records the order of document writes; status writes carry the new status
 */
class RecordingTaskStore extends FileTaskStore {
  readonly writes: string[] = [];

  async writeDocument<K extends DocumentKind>(taskId: string, kind: K, content: TaskDocuments[K]): Promise<void> {
    await super.writeDocument(taskId, kind, content);
    if (kind === 'status') {
      const written = await this.readDocument(taskId, 'status');
      this.writes.push(`status:${written?.status}`);
    } else {
      this.writes.push(kind);
    }
  }
}

const input = { taskId: 't1', workdir: '/tmp/project', prompt: 'Add a health endpoint' };

describe('SupervisorService', () => {
  let homeDir: string;
  let store: RecordingTaskStore;
  // Operators write through their own store, as a separate process would
  let answers: AnswerService;
  let actions: Array<() => Promise<void>>;
  let clock: ReturnType<typeof createManualClock>;

  const supervise = (steps: ScriptStep[]) => {
    const runner = new ScriptedAgentRunner(steps);
    const supervisor = new SupervisorService(store, runner, {
      pollIntervalMs: 2000,
      answerTimeoutMs: 600000,
      now: clock.now,
      sleep: clock.sleep,
      pid: 4321,
    });
    return { runner, run: () => supervisor.run(input) };
  };

  beforeEach(async () => {
    homeDir = createTestHomeDir();
    store = new RecordingTaskStore(homeDir);
    await store.initialize();
    await store.create('t1');

    const operatorStore = new FileTaskStore(homeDir);
    await operatorStore.initialize();
    answers = new AnswerService(operatorStore);

    actions = [];
    clock = createManualClock(async () => {
      const next = actions.shift();
      if (next) await next();
    });
  });

  afterEach(async () => {
    await store.close();
    removeTestHomeDir(homeDir);
  });

  describe('Successful runs', () => {
    it('should complete and record the result', async () => {
      const { runner, run } = supervise(events(textEvent('Reading files'), toolEvent('Bash'), resultEvent()));

      expect(await run()).toBe('complete');

      expect(runner.runs).toHaveLength(1);
      expect(runner.runs[0]).toMatchObject({ taskId: 't1', workdir: '/tmp/project', prompt: 'Add a health endpoint' });

      expect(await store.readDocument('t1', 'status')).toMatchObject({
        status: 'complete',
        detail: 'Task finished successfully',
        pid: 4321,
      });
      expect(await store.readDocument('t1', 'result')).toMatchObject({
        subtype: 'success',
        result: 'All done',
        session_id: 'session-1',
        num_turns: 3,
        total_cost_usd: 0.0125,
        duration_ms: 4200,
        is_error: false,
      });
    });

    it('should write the result before announcing completion', async () => {
      const { run } = supervise(events(textEvent('Reading files'), resultEvent()));
      await run();

      expect(store.writes).toEqual(['task', 'status:starting', 'status:running', 'result', 'status:complete']);
    });

    it('should mirror text and tool use into output.log', async () => {
      const { run } = supervise(events(textEvent('Reading files'), toolEvent('Bash'), textEvent('Done'), resultEvent()));
      await run();

      expect(await store.readLog('t1', 'output')).toBe('Reading files\n[Tool: Bash]\nDone\n');
    });

    it('should record the pid and task metadata', async () => {
      const { run } = supervise(events(resultEvent()));
      await run();

      expect(await store.readPid('t1')).toBe(4321);
      expect(await store.readDocument('t1', 'task')).toMatchObject({
        task_id: 't1',
        workdir: '/tmp/project',
        prompt: 'Add a health endpoint',
      });
    });

    it('should create the task directory when started by hand', async () => {
      const supervisor = new SupervisorService(store, new ScriptedAgentRunner(events(resultEvent())), {
        pollIntervalMs: 2000,
        answerTimeoutMs: 600000,
        pid: 4321,
      });

      expect(await supervisor.run({ ...input, taskId: 'by-hand' })).toBe('complete');
      expect(await store.exists('by-hand')).toBe(true);
    });

    it('should keep the terminal status when events arrive after the result', async () => {
      const { run } = supervise(events(resultEvent(), textEvent('late')));

      expect(await run()).toBe('complete');
      expect((await store.readDocument('t1', 'status'))?.status).toBe('complete');
    });
  });

  describe('Clarifying questions', () => {
    it('should relay a question and hand the answer back to the agent', async () => {
      actions.push(async () => {
        await answers.submitAnswer('t1', 'Postgres');
      });
      const { runner, run } = supervise([
        ...events(textEvent('Planning')),
        ask(createQuestion()),
        ...events(resultEvent()),
      ]);

      expect(await run()).toBe('complete');
      expect(runner.answers).toEqual([{ 'Which database?': 'Postgres' }]);
      expect(store.writes).toEqual([
        'task',
        'status:starting',
        'status:running',
        'question',
        'status:waiting_for_answer',
        'status:running',
        'result',
        'status:complete',
      ]);
    });

    it('should allow a question before any other event', async () => {
      actions.push(async () => {
        await answers.submitAnswer('t1', 'SQLite');
      });
      const { runner, run } = supervise([ask(createQuestion()), ...events(resultEvent())]);

      expect(await run()).toBe('complete');
      expect(runner.answers).toEqual([{ 'Which database?': 'SQLite' }]);
      expect(store.writes).toEqual([
        'task',
        'status:starting',
        'status:running',
        'question',
        'status:waiting_for_answer',
        'status:running',
        'result',
        'status:complete',
      ]);
    });
  });

  describe('Failures', () => {
    it('should end in error when the agent reports one', async () => {
      const { run } = supervise(events(resultEvent({ subtype: 'error_max_turns', result: undefined, is_error: true })));

      expect(await run()).toBe('error');
      expect(await store.readDocument('t1', 'status')).toMatchObject({
        status: 'error',
        detail: 'Agent reported an error: error_max_turns',
      });
      expect(await store.readDocument('t1', 'result')).toBeNull();
    });

    it('should end in error when the stream ends without a result', async () => {
      const { run } = supervise(events(textEvent('Thinking')));

      expect(await run()).toBe('error');
      expect(await store.readDocument('t1', 'status')).toMatchObject({
        status: 'error',
        detail: 'Agent session ended without a result',
      });
    });

    it('should record a thrown error in status and output.log', async () => {
      const { run } = supervise([...events(textEvent('partial')), fail(new Error('connection reset'))]);

      expect(await run()).toBe('error');
      expect(await store.readDocument('t1', 'status')).toMatchObject({
        status: 'error',
        detail: 'Error: connection reset',
      });
      expect(await store.readLog('t1', 'output')).toBe('partial\n\n[BRIDGE ERROR] Error: connection reset\n');
    });

    it('should fail from starting when the agent cannot start', async () => {
      const { run } = supervise([fail(new TypeError('spawn claude ENOENT'))]);

      expect(await run()).toBe('error');
      expect(store.writes).toEqual(['task', 'status:starting', 'status:error']);
      expect((await store.readDocument('t1', 'status'))?.detail).toBe('TypeError: spawn claude ENOENT');
    });

    it('should cap the status detail at 200 characters but log it in full', async () => {
      const message = 'x'.repeat(300);
      const { run } = supervise([fail(new Error(message))]);
      await run();

      const status = await store.readDocument('t1', 'status');
      expect(status?.detail).toBe(`Error: ${'x'.repeat(193)}`);
      expect(await store.readLog('t1', 'output')).toBe(`\n[BRIDGE ERROR] Error: ${message}\n`);
    });
  });
});
