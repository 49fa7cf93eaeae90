import { spawn } from 'child_process';
import { closeSync, openSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { LaunchFailedError, getErrorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export interface LaunchRequest {
  taskId: string;
  workdir: string;
  prompt: string;
  /** Where the supervisor's stdout and stderr go */
  logPath: string;
}

/**
 * Starts a supervisor for a task and reports its pid
 */
export interface ProcessLauncher {
  launch(request: LaunchRequest): Promise<number>;
}

export function defaultEntryScript(): string {
  return process.argv[1] ?? fileURLToPath(new URL('../index.js', import.meta.url));
}

/**
 * Values are attached with `=` so the parser never reads a prompt or path
 * starting with `-` as a flag.
 */
export function buildSuperviseArgs(entryScript: string, request: LaunchRequest): string[] {
  return [
    ...process.execArgv,
    path.resolve(entryScript),
    'supervise',
    `--task-id=${request.taskId}`,
    `--workdir=${request.workdir}`,
    `--prompt=${request.prompt}`,
  ];
}

/**
 * Launches `supervise` as a detached node process in its own session, so it
 * outlives the CLI or MCP server that dispatched it.
 */
export class DetachedProcessLauncher implements ProcessLauncher {
  constructor(
    private homeDir: string,
    private entryScript: string = defaultEntryScript()
  ) {}

  async launch(request: LaunchRequest): Promise<number> {
    const args = buildSuperviseArgs(this.entryScript, request);

    const stdoutFd = openSync(request.logPath, 'a');
    const stderrFd = openSync(request.logPath, 'a');
    const child = (() => {
      try {
        return spawn(process.execPath, args, {
          cwd: request.workdir,
          detached: true,
          stdio: ['ignore', stdoutFd, stderrFd],
          windowsHide: true,
          env: {
            ...process.env,
            TASK_BRIDGE_HOME: this.homeDir,
          },
        });
      } catch (error) {
        throw new LaunchFailedError(`Failed to spawn supervisor: ${getErrorMessage(error)}`, request.logPath);
      } finally {
        closeSync(stdoutFd);
        closeSync(stderrFd);
      }
    })();

    child.on('error', error => {
      logger.error('Supervisor process error', { taskId: request.taskId }, error);
    });

    if (!child.pid) {
      throw new LaunchFailedError('Failed to start supervisor process', request.logPath);
    }

    child.unref();
    logger.debug('Supervisor spawned', { taskId: request.taskId, childPid: child.pid });
    return child.pid;
  }
}
