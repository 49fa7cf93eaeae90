import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServiceContext } from '../../src/commands/context.js';
import { ServiceContext } from '../../src/commands/types.js';
import { SupervisorService } from '../../src/services/SupervisorService.js';
import { FileTaskStore } from '../../src/storage/FileTaskStore.js';
import { LaunchFailedError } from '../../src/types/errors.js';
import {
  InProcessLauncher,
  ScriptStep,
  ScriptedAgentRunner,
  ask,
  createQuestion,
  createTestConfig,
  createTestHomeDir,
  events,
  removeTestHomeDir,
  resultEvent,
  textEvent,
  toolEvent,
  waitFor,
} from '../fixtures/index.js';

/**
 * Dispatch, observe and answer tasks end to end. Each "supervisor process"
 * runs in this process on its own store, sharing only the task directory.
 */
describe('Core Workflows', () => {
  let homeDir: string;
  let store: FileTaskStore;
  let context: ServiceContext;
  let launcher: InProcessLauncher;
  let runners: ScriptedAgentRunner[];
  let alive: Set<number>;

  const setup = (script: ScriptStep[]) => {
    const config = createTestConfig(homeDir);

    launcher = new InProcessLauncher(async (request, pid) => {
      alive.add(pid);
      const supervisorStore = new FileTaskStore(homeDir);
      await supervisorStore.initialize();
      const runner = new ScriptedAgentRunner(script);
      runners.push(runner);

      try {
        await new SupervisorService(supervisorStore, runner, {
          pollIntervalMs: config.supervisor.pollIntervalMs,
          answerTimeoutMs: config.supervisor.answerTimeoutMs,
          pid,
        }).run(request);
      } finally {
        alive.delete(pid);
        await supervisorStore.close();
      }
    });

    context = createServiceContext(config, store, {
      launcher,
      isAlive: pid => alive.has(pid),
      sleep: async () => undefined,
    });
  };

  const waitForStatus = (taskId: string, status: string) =>
    waitFor(async () => {
      const view = await context.status.getStatus(taskId);
      return view.status?.status === status ? view : undefined;
    });

  beforeEach(async () => {
    homeDir = createTestHomeDir();
    store = new FileTaskStore(homeDir);
    await store.initialize();
    runners = [];
    alive = new Set();
  });

  afterEach(async () => {
    await launcher.settled();
    await store.close();
    removeTestHomeDir(homeDir);
  });

  it('should run a task to completion', async () => {
    setup(events(textEvent('Adding the endpoint'), toolEvent('Edit'), resultEvent({ result: 'Added /health' })));

    const dispatched = await context.dispatch.dispatch({ taskId: 'health', workdir: homeDir, prompt: 'Add /health' });
    await launcher.settled();

    const view = await context.status.getStatus(dispatched.taskId);
    expect(view.status).toMatchObject({ status: 'complete', detail: 'Task finished successfully' });
    expect(view.liveness).toBe('dead');
    expect(view.warning).toBeUndefined();
    expect(view.metadata).toMatchObject({ task_id: 'health', workdir: homeDir, prompt: 'Add /health' });

    expect(await context.status.getOutput('health')).toBe('Adding the endpoint\n[Tool: Edit]');
    expect(await context.status.getResult('health')).toMatchObject({ subtype: 'success', result: 'Added /health' });
    expect(await context.status.getQuestion('health')).toBeNull();
  });

  it('should relay a clarifying question to the operator and back', async () => {
    setup([...events(textEvent('Planning')), ask(createQuestion()), ...events(resultEvent())]);

    await context.dispatch.dispatch({ taskId: 'db', workdir: homeDir, prompt: 'Add persistence' });

    const waiting = await waitForStatus('db', 'waiting_for_answer');
    expect(waiting.liveness).toBe('alive');
    expect(waiting.status?.detail).toBe('Agent is asking a clarifying question');

    const question = await context.status.getQuestion('db');
    expect(question?.question).toBe('Which database?');
    expect(question?.options.map(option => option.label)).toEqual(['SQLite', 'Postgres']);

    const submitted = await context.answer.submitAnswer('db', 'Postgres');
    expect(submitted.warning).toBeUndefined();

    await launcher.settled();

    expect(runners[0]?.answers).toEqual([{ 'Which database?': 'Postgres' }]);
    expect((await context.status.getStatus('db')).status?.status).toBe('complete');
    expect(await context.status.getQuestion('db')).toBeNull();
    expect(await store.readDocument('db', 'answer')).toBeNull();
  });

  it('should list tasks with their status', async () => {
    setup(events(resultEvent()));

    await context.dispatch.dispatch({ taskId: 'a-task', workdir: homeDir, prompt: 'One' });
    await context.dispatch.dispatch({ taskId: 'b-task', workdir: homeDir, prompt: 'Two' });
    await launcher.settled();

    const tasks = await context.status.listTasks();
    expect(tasks.map(task => [task.taskId, task.status])).toEqual([
      ['a-task', 'complete'],
      ['b-task', 'complete'],
    ]);
  });

  it('should flag a supervisor that died while waiting', async () => {
    setup([ask(createQuestion()), ...events(resultEvent())]);

    const dispatched = await context.dispatch.dispatch({ taskId: 'crash', workdir: homeDir, prompt: 'Go' });
    await waitForStatus('crash', 'waiting_for_answer');

    // As if the supervisor had been killed
    alive.delete(dispatched.pid);

    const view = await context.status.getStatus('crash');
    expect(view.liveness).toBe('dead');
    expect(view.warning).toBe('Process is dead but status shows waiting_for_answer. Task may have crashed.');

    // Let the in-process supervisor finish so nothing is left running
    await context.answer.submitAnswer('crash', 'SQLite');
    await launcher.settled();
  });

  it('should report a supervisor that never came up', async () => {
    const config = createTestConfig(homeDir);
    launcher = new InProcessLauncher();
    context = createServiceContext(config, store, {
      launcher,
      isAlive: () => false,
      sleep: async () => undefined,
    });

    await expect(context.dispatch.dispatch({ taskId: 'dud', workdir: homeDir, prompt: 'Go' }))
      .rejects.toBeInstanceOf(LaunchFailedError);
    expect(await store.exists('dud')).toBe(true);
  });
});
