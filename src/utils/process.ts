import { getErrorCode } from '../types/errors.js';

export type ProcessProbe = (pid: number) => boolean;

/**
 * Signal 0 checks for existence without touching the process.
 * EPERM means the pid exists but belongs to someone else.
 */
export function isProcessRunning(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }

  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    const code = getErrorCode(error);
    if (code === 'ESRCH') {
      return false;
    }
    if (code === 'EPERM') {
      return true;
    }

    throw error;
  }
}
