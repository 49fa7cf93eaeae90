import path from 'path';
import { TaskStore } from '../storage/index.js';
import { DispatchInput, DispatchResult, isTerminalStatus } from '../types/index.js';
import {
  AlreadyExistsError,
  DuplicateTaskError,
  LaunchFailedError,
  ValidationError,
} from '../types/errors.js';
import {
  ProcessProbe,
  dispatchInputSchema,
  generateTaskId,
  isDirectory,
  isProcessRunning,
  sleep,
  validate,
} from '../utils/index.js';
import { createOperationLogger } from '../utils/logger.js';
import { ProcessLauncher } from './ProcessLauncher.js';

export interface DispatchOptions {
  launchGraceMs: number;
  isAlive?: ProcessProbe;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/**
 * Creates a task directory and starts its supervisor in the background
 */
export class DispatchService {
  private readonly isAlive: ProcessProbe;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(
    private store: TaskStore,
    private launcher: ProcessLauncher,
    private options: DispatchOptions
  ) {
    this.isAlive = options.isAlive ?? isProcessRunning;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? (() => new Date());
  }

  async dispatch(input: DispatchInput): Promise<DispatchResult> {
    const { taskId: requestedId, prompt } = validate(dispatchInputSchema, {
      taskId: input.taskId,
      workdir: input.workdir,
      prompt: input.prompt,
    });

    const workdir = path.resolve(input.workdir);
    if (!(await isDirectory(workdir))) {
      throw new ValidationError(`workdir does not exist: ${workdir}`, 'workdir');
    }

    const taskId = requestedId ?? generateTaskId(this.now());
    const taskDir = this.store.taskDir(taskId);
    const log = createOperationLogger('dispatch', { taskId });

    try {
      await this.store.create(taskId);
    } catch (error) {
      if (error instanceof AlreadyExistsError) {
        throw new DuplicateTaskError(taskId, taskDir);
      }
      throw error;
    }

    const logPath = this.store.logPath(taskId, 'bridge');
    const pid = await this.launcher.launch({ taskId, workdir, prompt, logPath });
    await this.store.writePid(taskId, pid);
    log.debug('Supervisor launched', { pid, workdir });

    await this.sleep(this.options.launchGraceMs);
    if (!this.isAlive(pid)) {
      // A task that finished inside the grace period is not a launch failure
      const status = await this.store.readDocument(taskId, 'status');
      if (!status || !isTerminalStatus(status.status)) {
        log.error('Supervisor exited during launch', { pid, logPath });
        throw new LaunchFailedError('Supervisor process failed to start', logPath);
      }
    }

    return { taskId, pid, taskDir, workdir };
  }
}
