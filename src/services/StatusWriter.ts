import { TaskStore } from '../storage/index.js';
import { StatusRecord, TaskStatus, isTerminalStatus } from '../types/index.js';
import { InvalidTransitionError } from '../types/errors.js';
import { nowIso } from '../utils/index.js';
import { Logger, createOperationLogger } from '../utils/logger.js';

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  starting: ['running', 'error'],
  running: ['waiting_for_answer', 'complete', 'error'],
  waiting_for_answer: ['running', 'error'],
  complete: [],
  error: [],
};

/**
 * Whether a task may move from `from` to `to`. A task with no status yet may
 * only start or fail.
 */
export function canTransition(from: TaskStatus | null, to: TaskStatus): boolean {
  if (from === null) {
    return to === 'starting' || to === 'error';
  }
  return TRANSITIONS[from].includes(to);
}

/**
 * The only writer of a task's status.json
 */
export class StatusWriter {
  private current: TaskStatus | null = null;
  private readonly log: Logger;

  constructor(
    private store: TaskStore,
    private taskId: string,
    private pid: number = process.pid
  ) {
    this.log = createOperationLogger('status', { taskId });
  }

  get status(): TaskStatus | null {
    return this.current;
  }

  get terminal(): boolean {
    return this.current !== null && isTerminalStatus(this.current);
  }

  /**
   * Write the next status. Returns false, writing nothing, once the task has
   * reached a terminal status.
   */
  async transition(status: TaskStatus, detail: string): Promise<boolean> {
    if (this.terminal) {
      this.log.warn('Ignoring status change after terminal status', {
        from: this.current,
        to: status,
        detail,
      });
      return false;
    }

    if (!canTransition(this.current, status)) {
      throw new InvalidTransitionError(this.current ?? 'none', status);
    }

    const record: StatusRecord = {
      status,
      detail,
      updated_at: nowIso(),
      pid: this.pid,
    };
    await this.store.writeDocument(this.taskId, 'status', record);

    this.log.info('Status changed', { from: this.current, to: status, detail });
    this.current = status;
    return true;
  }
}
