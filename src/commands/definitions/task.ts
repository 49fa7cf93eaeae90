/**
 * Task Commands (dispatch, status, listing)
 */

import chalk from '../../utils/chalk.js';
import { DispatchResult, TaskStatusView, TaskSummary } from '../../types/index.js';
import { CommandParameter, CommandResult, defineCommand } from '../types.js';
import { CLI_NAME, colorStatus, formatRelativeTime, padEndVisual } from '../formatters.js';

export interface DispatchTaskData extends DispatchResult {
  logPath: string;
}

function formatDispatch(data: DispatchTaskData): string {
  const { taskId } = data;
  let output = '\n';
  output += `  ${chalk.gray('Status:')}    ${CLI_NAME} get-status ${taskId}\n`;
  output += `  ${chalk.gray('Output:')}    ${CLI_NAME} get-output ${taskId}\n`;
  output += `  ${chalk.gray('Question:')}  ${CLI_NAME} get-question ${taskId}\n`;
  output += `  ${chalk.gray('Answer:')}    ${CLI_NAME} submit-answer ${taskId} --answer '<text>'\n`;
  output += `  ${chalk.gray('Kill:')}      kill ${data.pid}\n`;
  output += `  ${chalk.gray('Log:')}       ${data.logPath}\n`;
  return output;
}

export function formatStatusView(view: TaskStatusView, now: Date = new Date()): string {
  let output = `${chalk.bold('Task:')} ${view.taskId}\n`;

  if (!view.status) {
    output += `${chalk.bold('Status:')} ${chalk.gray('unknown (no status.json)')}\n`;
    return output;
  }

  const { status } = view;
  output += `${chalk.bold('Status:')} ${colorStatus(status.status)}\n`;
  output += `${chalk.gray('Detail:')} ${status.detail}\n`;
  output += `${chalk.gray('Updated:')} ${status.updated_at} (${formatRelativeTime(status.updated_at, now)})\n`;
  output += `${chalk.gray('PID:')} ${status.pid} (${view.liveness})\n`;
  if (view.metadata) {
    output += `${chalk.gray('Workdir:')} ${view.metadata.workdir}\n`;
  }

  if (view.warning) {
    output += chalk.yellow(`WARNING: ${view.warning}`) + '\n';
    output += `Check log: ${view.bridgeLogPath}\n`;
  }

  return output;
}

export function formatTaskList(tasks: TaskSummary[]): string {
  let output = `${chalk.bold('Tasks:')}\n\n`;
  if (tasks.length === 0) {
    return output + chalk.gray('  (none)');
  }

  const idWidth = Math.max(...tasks.map(task => task.taskId.length)) + 2;
  for (const task of tasks) {
    const id = padEndVisual(`[${task.taskId}]`, idWidth);
    output += task.hasStatus
      ? `  ${id}  ${padEndVisual(colorStatus(task.status), 18)}  ${task.detail}\n`
      : `  ${id}  ${chalk.gray(task.detail)}\n`;
  }
  return output;
}

// Dispatch Task Command
const dispatchTaskParams = [
  {
    name: 'prompt',
    type: 'string',
    description: 'Instructions for the coding agent (use @path to read them from a file)',
    alias: 'p',
    required: true,
    readFromFile: true
  },
  {
    name: 'taskId',
    type: 'string',
    description: 'Task identifier (default: task-YYYYMMDD-HHMMSS)',
    alias: 't'
  },
  {
    name: 'workdir',
    type: 'string',
    description: 'Directory the agent works in (default: current directory)',
    alias: 'w'
  }
] as const satisfies readonly CommandParameter[];

export const dispatchTask = defineCommand({
  name: 'dispatchTask',
  mcpName: 'dispatch_task',
  cliName: 'dispatch-task',
  description: 'Start a coding task in the background. The agent runs detached in the given working directory; poll get_status and answer its clarifying questions with submit_answer.',
  parameters: dispatchTaskParams,
  examples: [
    `${CLI_NAME} dispatch-task --task-id fix-api --workdir ~/projects/app --prompt "Fix the null check in api.ts"`,
    `${CLI_NAME} dispatch-task --prompt @task.md`
  ],
  discoverability: {
    useWhen: ['A coding task should run unattended', 'Work may need operator input partway through'],
    typicalPredecessors: ['health_check'],
    typicalSuccessors: ['get_status', 'get_question', 'get_output'],
    antiPatterns: ['Re-dispatching a task id that already exists']
  },
  formatResult: (result: CommandResult<DispatchTaskData>) => result.data ? formatDispatch(result.data) : '',
  async handler(context, args): Promise<CommandResult<DispatchTaskData>> {
    const dispatched = await context.dispatch.dispatch({
      taskId: args.taskId,
      workdir: args.workdir ?? process.cwd(),
      prompt: args.prompt
    });

    return {
      success: true,
      message: `Task '${dispatched.taskId}' dispatched.`,
      data: { ...dispatched, logPath: context.store.logPath(dispatched.taskId, 'bridge') }
    };
  }
});

// Get Status Command
const getStatusParams = [
  {
    name: 'taskId',
    type: 'string',
    description: 'Task identifier',
    positional: true,
    required: true
  }
] as const satisfies readonly CommandParameter[];

export const getStatus = defineCommand({
  name: 'getStatus',
  mcpName: 'get_status',
  cliName: 'get-status',
  description: 'Show a task\'s status, its detail line and whether its supervisor process is still alive. Warns when the process died while the task was still active.',
  parameters: getStatusParams,
  discoverability: {
    useWhen: ['Checking on a dispatched task', 'Deciding whether a question is waiting'],
    typicalPredecessors: ['dispatch_task', 'list_tasks'],
    typicalSuccessors: ['get_question', 'get_result', 'get_log'],
    antiPatterns: ['Polling faster than every few seconds']
  },
  formatResult: (result: CommandResult<TaskStatusView>) => result.data ? formatStatusView(result.data) : '',
  async handler(context, args): Promise<CommandResult<TaskStatusView>> {
    return {
      success: true,
      data: await context.status.getStatus(args.taskId)
    };
  }
});

// List Tasks Command
const listTasksParams = [] as const satisfies readonly CommandParameter[];

export const listTasks = defineCommand({
  name: 'listTasks',
  mcpName: 'list_tasks',
  cliName: 'list-tasks',
  description: 'List every task with its current status and detail line.',
  parameters: listTasksParams,
  formatResult: (result: CommandResult<{ tasks: TaskSummary[] }>) => formatTaskList(result.data?.tasks ?? []),
  async handler(context): Promise<CommandResult<{ tasks: TaskSummary[] }>> {
    const tasks = await context.status.listTasks();
    return {
      success: true,
      data: { tasks }
    };
  }
});
