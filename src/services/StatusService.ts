import { TaskStore } from '../storage/index.js';
import {
  Liveness,
  QuestionRecord,
  ResultRecord,
  StatusRecord,
  TaskStatusView,
  TaskSummary,
  isActiveStatus,
} from '../types/index.js';
import { TaskNotFoundError, getErrorMessage } from '../types/errors.js';
import { ProcessProbe, isProcessRunning, validateTaskId } from '../utils/index.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_OUTPUT_LINES = 50;

/**
 * Read-only view of tasks for operators. Never writes to a task directory.
 */
export class StatusService {
  constructor(
    private store: TaskStore,
    private isAlive: ProcessProbe = isProcessRunning
  ) {}

  /**
   * Status, metadata and supervisor liveness. Liveness is advisory: a dead
   * supervisor with an active status is reported, not repaired.
   */
  async getStatus(taskId: string): Promise<TaskStatusView> {
    await this.requireTask(taskId);

    const [status, metadata, pid] = await Promise.all([
      this.store.readDocument(taskId, 'status'),
      this.store.readDocument(taskId, 'task'),
      this.store.readPid(taskId),
    ]);

    const liveness = this.checkLiveness(status, pid);
    const view: TaskStatusView = {
      taskId,
      status,
      metadata,
      liveness,
      bridgeLogPath: this.store.logPath(taskId, 'bridge'),
    };

    if (status && liveness === 'dead' && isActiveStatus(status.status)) {
      view.warning = `Process is dead but status shows ${status.status}. Task may have crashed.`;
    }

    return view;
  }

  async getOutput(taskId: string, lines: number = DEFAULT_OUTPUT_LINES): Promise<string | null> {
    await this.requireTask(taskId);
    return this.store.tailLog(taskId, 'output', lines);
  }

  async getQuestion(taskId: string): Promise<QuestionRecord | null> {
    await this.requireTask(taskId);
    return this.store.readDocument(taskId, 'question');
  }

  async getResult(taskId: string): Promise<ResultRecord | null> {
    await this.requireTask(taskId);
    return this.store.readDocument(taskId, 'result');
  }

  async getLog(taskId: string): Promise<string | null> {
    await this.requireTask(taskId);
    return this.store.readLog(taskId, 'bridge');
  }

  async listTasks(): Promise<TaskSummary[]> {
    const taskIds = await this.store.listTaskIds();
    const summaries: TaskSummary[] = [];

    for (const taskId of taskIds) {
      let status: StatusRecord | null;
      try {
        status = await this.store.readDocument(taskId, 'status');
      } catch (error) {
        // One unreadable task must not hide the rest
        logger.warn('Unreadable status while listing tasks', { taskId, reason: getErrorMessage(error) });
        status = null;
      }

      summaries.push(status
        ? { taskId, status: status.status, detail: status.detail, updatedAt: status.updated_at, hasStatus: true }
        : { taskId, status: 'unknown', detail: '(no status)', hasStatus: false });
    }

    return summaries;
  }

  private checkLiveness(status: StatusRecord | null, pidFromFile: number | null): Liveness {
    const pid = pidFromFile ?? status?.pid ?? null;
    if (pid === null || pid <= 0) {
      return 'unknown';
    }
    return this.isAlive(pid) ? 'alive' : 'dead';
  }

  private async requireTask(taskId: string): Promise<void> {
    validateTaskId(taskId);
    if (!(await this.store.exists(taskId))) {
      throw new TaskNotFoundError(taskId);
    }
  }
}
