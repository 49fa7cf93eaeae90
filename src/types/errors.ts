/**
 * Error classes for the task bridge.
 *
 * Every error carries a stable `code` so CLI and MCP callers can branch on the
 * failure kind without parsing messages.
 */

export type BridgeErrorCode =
  | 'VALIDATION_ERROR'
  | 'ALREADY_EXISTS'
  | 'DUPLICATE_TASK'
  | 'NOT_FOUND'
  | 'TASK_NOT_FOUND'
  | 'LAUNCH_FAILED'
  | 'CORRUPT_DOCUMENT'
  | 'INVALID_TRANSITION';

export class BridgeError extends Error {
  constructor(message: string, public readonly code: BridgeErrorCode) {
    super(message);
    this.name = this.constructor.name;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Missing or malformed arguments. Raised before any state is touched.
 */
export class ValidationError extends BridgeError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'VALIDATION_ERROR');
  }
}

/**
 * Store-level: the task directory is already there
 */
export class AlreadyExistsError extends BridgeError {
  constructor(public readonly taskId: string) {
    super(`Task directory already exists: ${taskId}`, 'ALREADY_EXISTS');
  }
}

export class DuplicateTaskError extends BridgeError {
  constructor(public readonly taskId: string, taskDir: string) {
    super(`Task '${taskId}' already exists at ${taskDir}`, 'DUPLICATE_TASK');
  }
}

/**
 * Store-level: the task directory is absent
 */
export class NotFoundError extends BridgeError {
  constructor(public readonly taskId: string) {
    super(`Task directory not found: ${taskId}`, 'NOT_FOUND');
  }
}

export class TaskNotFoundError extends BridgeError {
  constructor(public readonly taskId: string) {
    super(`Task '${taskId}' not found`, 'TASK_NOT_FOUND');
  }
}

export class LaunchFailedError extends BridgeError {
  constructor(message: string, public readonly logPath?: string) {
    super(logPath ? `${message}. Check: ${logPath}` : message, 'LAUNCH_FAILED');
  }
}

export class CorruptDocumentError extends BridgeError {
  constructor(public readonly filePath: string, reason: string) {
    super(`Failed to parse ${filePath}: ${reason}`, 'CORRUPT_DOCUMENT');
  }
}

export class InvalidTransitionError extends BridgeError {
  constructor(from: string, to: string) {
    super(`Invalid status transition: ${from} -> ${to}`, 'INVALID_TRANSITION');
  }
}

export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}
