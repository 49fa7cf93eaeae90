/**
 * Output formatters for CLI commands
 * Supports both human-readable and JSON formats
 */

import chalk from '../utils/chalk.js';
import { TaskStatus } from '../types/index.js';
import { getErrorCode, getErrorMessage } from '../types/errors.js';
import { CommandArgs, CommandDefinition, CommandResult } from './types.js';

export const CLI_NAME = 'task-bridge';

export type OutputFormat = 'human' | 'json';

export interface FormattedOutput {
  text: string;
  exitCode: number;
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'human' || value === 'json';
}

/**
 * Format time as relative (e.g., "2 hours ago", "3 days ago")
 */
export function formatRelativeTime(date: string | Date, now: Date = new Date()): string {
  const then = new Date(date);
  if (Number.isNaN(then.getTime())) {
    return 'unknown';
  }
  const diffMs = now.getTime() - then.getTime();

  const seconds = Math.max(0, Math.floor(diffMs / 1000));
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days} day${days > 1 ? 's' : ''} ago`;
  } else if (hours > 0) {
    return `${hours} hour${hours > 1 ? 's' : ''} ago`;
  } else if (minutes > 0) {
    return `${minutes} min${minutes > 1 ? 's' : ''} ago`;
  } else {
    return `${seconds} sec${seconds === 1 ? '' : 's'} ago`;
  }
}

/**
 * Strip ANSI color codes to get visual width
 */
function getVisualWidth(text: string): number {
  // Remove ANSI escape sequences
  return text.replace(/\u001b\[[0-9;]*m/g, '').length;
}

/**
 * Pad text to width, accounting for ANSI color codes
 */
export function padEndVisual(text: string, width: number): string {
  const visualWidth = getVisualWidth(text);
  const padding = Math.max(0, width - visualWidth);
  return text + ' '.repeat(padding);
}

export function colorStatus(status: TaskStatus | 'unknown'): string {
  switch (status) {
    case 'complete':
      return chalk.green(status);
    case 'error':
      return chalk.red(status);
    case 'waiting_for_answer':
      return chalk.yellow(status);
    case 'running':
    case 'starting':
      return chalk.blue(status);
    default:
      return chalk.gray(status);
  }
}

/**
 * Format command result for display
 */
export function formatCommandResult(
  def: CommandDefinition,
  result: CommandResult,
  args: CommandArgs,
  format: OutputFormat = 'human'
): FormattedOutput {
  const exitCode = result.success ? 0 : 1;

  if (format === 'json') {
    return {
      text: JSON.stringify(result, null, 2),
      exitCode
    };
  }

  if (!result.success) {
    return {
      text: chalk.red(`❌ Error: ${result.error || `${def.cliName} failed`}`),
      exitCode
    };
  }

  let output = '';
  for (const warning of result.warnings ?? []) {
    output += chalk.yellow(`⚠️  Warning: ${warning}`) + '\n';
  }
  if (result.message) {
    output += chalk.green(`✅ ${result.message}`) + '\n';
  }
  output += def.formatResult(result, args);

  return {
    text: output.trimEnd(),
    exitCode
  };
}

/**
 * Shape a thrown error into a failed command result
 */
export function errorResult(error: unknown): CommandResult<never> {
  const result: CommandResult<never> = {
    success: false,
    error: getErrorMessage(error)
  };
  const code = getErrorCode(error);
  if (code) {
    result.code = code;
  }
  return result;
}
