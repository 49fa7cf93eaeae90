import { AgentEvent, AgentRunner } from '../agent/index.js';
import { TaskStore } from '../storage/index.js';
import { TaskMetadata, TaskStatus } from '../types/index.js';
import { getErrorMessage } from '../types/errors.js';
import { nowIso } from '../utils/index.js';
import { Logger, createOperationLogger } from '../utils/logger.js';
import { ClarificationService, ClarificationTiming } from './ClarificationService.js';
import { StatusWriter } from './StatusWriter.js';

const MAX_ERROR_DETAIL = 200;

export interface SuperviseInput {
  taskId: string;
  workdir: string;
  prompt: string;
}

export interface SupervisorOptions extends ClarificationTiming {
  pid?: number;
}

function describeError(error: unknown): string {
  const name = error instanceof Error ? error.name : 'Error';
  return `${name}: ${getErrorMessage(error)}`;
}

/**
 * Drives one agent session for one task and mirrors its progress into the
 * task directory: starting -> running <-> waiting_for_answer -> complete | error.
 */
export class SupervisorService {
  constructor(
    private store: TaskStore,
    private runner: AgentRunner,
    private options: SupervisorOptions
  ) {}

  /**
   * Run the task to a terminal status. Failures are recorded in the task
   * directory rather than thrown; the returned status says how it ended.
   */
  async run(input: SuperviseInput): Promise<TaskStatus> {
    const { taskId } = input;
    const pid = this.options.pid ?? process.pid;
    const log = createOperationLogger('supervise', { taskId });
    const status = new StatusWriter(this.store, taskId, pid);

    try {
      await this.prepare(input, pid, status);
      await this.drive(input, status, log);
    } catch (error) {
      const detail = describeError(error);
      log.error('Supervisor failed', { workdir: input.workdir }, error instanceof Error ? error : undefined);
      await this.recordFailure(taskId, status, detail, log);
    }

    return status.status ?? 'error';
  }

  private async prepare(input: SuperviseInput, pid: number, status: StatusWriter): Promise<void> {
    const { taskId, workdir, prompt } = input;

    // Normally created by the dispatcher; a hand-started supervisor makes its own
    if (!(await this.store.exists(taskId))) {
      await this.store.create(taskId);
    }

    await this.store.writePid(taskId, pid);
    const metadata: TaskMetadata = {
      task_id: taskId,
      workdir,
      prompt,
      created_at: nowIso(),
    };
    await this.store.writeDocument(taskId, 'task', metadata);
    await status.transition('starting', 'Initializing agent session');
    await this.store.appendToLog(taskId, 'output', '');
  }

  private async drive(input: SuperviseInput, status: StatusWriter, log: Logger): Promise<void> {
    const { taskId, workdir, prompt } = input;
    const clarification = new ClarificationService(this.store, status, taskId, this.options);
    let sawResult = false;

    // Any event or question means the session is up
    const markRunning = async (): Promise<void> => {
      if (status.status === 'starting') {
        await status.transition('running', 'Agent session active');
      }
    };

    const events = this.runner.run({
      taskId,
      prompt,
      workdir,
      onClarification: async questions => {
        await markRunning();
        return clarification.ask(questions);
      },
    });

    for await (const event of events) {
      await markRunning();

      if (event.type === 'result') {
        sawResult = true;
      }
      await this.handleEvent(taskId, event, status, log);
    }

    if (!sawResult) {
      log.warn('Agent stream ended without a result');
      await status.transition('error', 'Agent session ended without a result');
    }
  }

  private async handleEvent(taskId: string, event: AgentEvent, status: StatusWriter, log: Logger): Promise<void> {
    switch (event.type) {
      case 'session_started':
        log.info('Agent session started', { sessionId: event.sessionId });
        break;
      case 'text':
        await this.store.appendToLog(taskId, 'output', `${event.text}\n`);
        break;
      case 'tool_use':
        await this.store.appendToLog(taskId, 'output', `[Tool: ${event.name}]\n`);
        break;
      case 'result':
        if (event.result.is_error) {
          log.error('Agent reported an error', { subtype: event.result.subtype, result: event.result.result });
          await status.transition('error', `Agent reported an error: ${event.result.subtype}`);
        } else {
          // result.json lands before the status that announces it
          await this.store.writeDocument(taskId, 'result', { ...event.result, completed_at: nowIso() });
          await status.transition('complete', 'Task finished successfully');
          log.metric('Task complete', {
            numTurns: event.result.num_turns ?? 0,
            durationMs: event.result.duration_ms ?? 0,
          });
        }
        break;
    }
  }

  private async recordFailure(taskId: string, status: StatusWriter, detail: string, log: Logger): Promise<void> {
    try {
      await status.transition('error', detail.slice(0, MAX_ERROR_DETAIL));
      await this.store.appendToLog(taskId, 'output', `\n[BRIDGE ERROR] ${detail}\n`);
    } catch (error) {
      log.error('Could not record failure', { detail }, error instanceof Error ? error : undefined);
    }
  }
}
