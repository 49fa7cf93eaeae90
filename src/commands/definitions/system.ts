/**
 * System Commands (answers, health check)
 */

import chalk from '../../utils/chalk.js';
import { HealthStatus, SubmitAnswerResult } from '../../types/index.js';
import { CommandParameter, CommandResult, defineCommand } from '../types.js';

export interface HealthCheckData {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  homeDir: string;
  storage: HealthStatus;
}

function formatHealthCheck(data: HealthCheckData): string {
  const statusColor = data.status === 'healthy' ? chalk.green : chalk.red;
  let output = `${chalk.bold('System Status:')} ${statusColor(data.status.toUpperCase())}\n`;
  output += `${chalk.gray('Timestamp:')} ${new Date(data.timestamp).toLocaleString()}\n`;
  output += `${chalk.gray('Home:')} ${data.homeDir}\n`;

  output += `\n${chalk.bold('Storage:')}\n`;
  const storageStatus = data.storage.healthy ? chalk.green('✓ Healthy') : chalk.red('✗ Unhealthy');
  output += `  Status: ${storageStatus}\n`;
  if (data.storage.message) {
    output += `  Message: ${data.storage.message}\n`;
  }

  return output;
}

// Submit Answer Command
const submitAnswerParams = [
  {
    name: 'taskId',
    type: 'string',
    description: 'Task identifier',
    positional: true,
    required: true
  },
  {
    name: 'answer',
    type: 'string',
    description: 'Answer text for the pending question',
    alias: 'a',
    required: true
  }
] as const satisfies readonly CommandParameter[];

export const submitAnswer = defineCommand({
  name: 'submitAnswer',
  mcpName: 'submit_answer',
  cliName: 'submit-answer',
  description: 'Answer the clarifying question a task is waiting on. The running agent picks the answer up within a few seconds. Unanswered questions fall back to their first option after ten minutes.',
  parameters: submitAnswerParams,
  discoverability: {
    useWhen: ['get_status reports waiting_for_answer'],
    typicalPredecessors: ['get_question'],
    typicalSuccessors: ['get_status', 'get_output'],
    antiPatterns: ['Answering a task that is not waiting (the answer is kept but may never be read)']
  },
  formatResult: (result: CommandResult<SubmitAnswerResult>) => result.data ? `${chalk.gray('Answer:')} ${result.data.answer.text}\n` : '',
  async handler(context, args): Promise<CommandResult<SubmitAnswerResult>> {
    const submitted = await context.answer.submitAnswer(args.taskId, args.answer);
    return {
      success: true,
      message: `Answer submitted for task '${submitted.taskId}'`,
      data: submitted,
      warnings: submitted.warning ? [submitted.warning] : undefined
    };
  }
});

// Health Check Command
const healthCheckParams = [] as const satisfies readonly CommandParameter[];

export const healthCheck = defineCommand({
  name: 'healthCheck',
  mcpName: 'health_check',
  cliName: 'health-check',
  description: 'Check that the task store is reachable and writable. Use this to verify the bridge is operational before dispatching work.',
  parameters: healthCheckParams,
  formatResult: (result: CommandResult<HealthCheckData>) => result.data ? formatHealthCheck(result.data) : '',
  async handler(context): Promise<CommandResult<HealthCheckData>> {
    const storage = await context.store.healthCheck();

    return {
      success: storage.healthy,
      error: storage.healthy ? undefined : storage.message,
      data: {
        status: storage.healthy ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        homeDir: context.config.storage.homeDir,
        storage
      }
    };
  }
});
