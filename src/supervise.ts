/**
 * Supervisor process entry: `task-bridge supervise`. Started detached by the
 * dispatcher with stdout and stderr appended to the task's bridge.log.
 */

import { ClaudeAgentRunner } from './agent/index.js';
import { loadConfig } from './config/index.js';
import { SuperviseInput, SupervisorService } from './services/SupervisorService.js';
import { createTaskStore } from './storage/index.js';
import { logger } from './utils/logger.js';

/**
 * Run one task to completion. Resolves to the process exit code.
 */
export async function runSupervisor(input: SuperviseInput): Promise<number> {
  const config = loadConfig();
  logger.configure(config.logging);
  logger.info('Supervisor starting', { taskId: input.taskId, workdir: input.workdir });

  const store = createTaskStore(config);
  await store.initialize();

  const supervisor = new SupervisorService(store, new ClaudeAgentRunner(config.agent), {
    pollIntervalMs: config.supervisor.pollIntervalMs,
    answerTimeoutMs: config.supervisor.answerTimeoutMs,
  });

  try {
    const status = await supervisor.run(input);
    logger.info('Supervisor finished', { taskId: input.taskId, status });
    return status === 'complete' ? 0 : 1;
  } finally {
    await store.close();
  }
}
