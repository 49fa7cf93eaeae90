/**
 * Inspection Commands (output, question, result, bridge log)
 */

import chalk from '../../utils/chalk.js';
import { QuestionRecord, ResultRecord } from '../../types/index.js';
import { DEFAULT_OUTPUT_LINES } from '../../services/StatusService.js';
import { CommandParameter, CommandResult, defineCommand } from '../types.js';
import { CLI_NAME } from '../formatters.js';

export interface TaskOutputData {
  taskId: string;
  lines: number;
  output: string | null;
}

export interface TaskQuestionData {
  taskId: string;
  question: QuestionRecord | null;
}

export interface TaskResultData {
  taskId: string;
  result: ResultRecord | null;
}

export interface TaskLogData {
  taskId: string;
  log: string | null;
}

export function formatQuestion(data: TaskQuestionData): string {
  if (!data.question) {
    return chalk.gray(`No pending question for task '${data.taskId}'`);
  }

  const questions = data.question.questions.length > 0
    ? data.question.questions
    : [{ question: data.question.question, options: data.question.options }];

  let output = '';
  for (const question of questions) {
    output += `${chalk.bold('Question:')} ${question.question}\n`;
    question.options.forEach((option, index) => {
      output += `  ${index + 1}. ${option.label}`;
      output += option.description ? ` ${chalk.gray(`- ${option.description}`)}\n` : '\n';
    });
  }
  output += `${chalk.gray('Asked:')} ${data.question.asked_at}\n`;
  output += `\nAnswer with: ${CLI_NAME} submit-answer ${data.taskId} --answer '<text>'\n`;
  return output;
}

export function formatResult(data: TaskResultData): string {
  if (!data.result) {
    return chalk.gray(`No result yet for task '${data.taskId}'`);
  }

  const { result } = data;
  let output = `${chalk.bold('Result:')} ${result.is_error ? chalk.red(result.subtype) : chalk.green(result.subtype)}\n`;
  output += `${chalk.gray('Completed:')} ${result.completed_at}\n`;
  if (result.num_turns !== undefined) {
    output += `${chalk.gray('Turns:')} ${result.num_turns}\n`;
  }
  if (result.total_cost_usd !== undefined) {
    output += `${chalk.gray('Cost:')} $${result.total_cost_usd.toFixed(4)}\n`;
  }
  if (result.session_id) {
    output += `${chalk.gray('Session:')} ${result.session_id}\n`;
  }
  if (result.result) {
    output += `\n${result.result}\n`;
  }
  return output;
}

const taskIdParam = {
  name: 'taskId',
  type: 'string',
  description: 'Task identifier',
  positional: true,
  required: true
} as const satisfies CommandParameter;

// Get Output Command
const getOutputParams = [
  taskIdParam,
  {
    name: 'lines',
    type: 'number',
    description: 'Number of trailing lines to show',
    alias: 'n',
    default: DEFAULT_OUTPUT_LINES
  }
] as const satisfies readonly CommandParameter[];

export const getOutput = defineCommand({
  name: 'getOutput',
  mcpName: 'get_output',
  cliName: 'get-output',
  description: 'Show the last lines of what the agent has said and which tools it has used.',
  parameters: getOutputParams,
  formatResult: (result: CommandResult<TaskOutputData>) => {
    if (!result.data) return '';
    return result.data.output ?? chalk.gray(`No output yet for task '${result.data.taskId}'`);
  },
  async handler(context, args): Promise<CommandResult<TaskOutputData>> {
    const output = await context.status.getOutput(args.taskId, args.lines);
    return {
      success: true,
      data: { taskId: args.taskId, lines: args.lines, output }
    };
  }
});

// Get Question Command
const getQuestionParams = [taskIdParam] as const satisfies readonly CommandParameter[];

export const getQuestion = defineCommand({
  name: 'getQuestion',
  mcpName: 'get_question',
  cliName: 'get-question',
  description: 'Show the clarifying question a task is waiting on, with its options. Returns null when nothing is pending.',
  parameters: getQuestionParams,
  discoverability: {
    useWhen: ['get_status reports waiting_for_answer'],
    typicalPredecessors: ['get_status'],
    typicalSuccessors: ['submit_answer'],
    antiPatterns: ['Answering without reading the options']
  },
  formatResult: (result: CommandResult<TaskQuestionData>) => result.data ? formatQuestion(result.data) : '',
  async handler(context, args): Promise<CommandResult<TaskQuestionData>> {
    return {
      success: true,
      data: { taskId: args.taskId, question: await context.status.getQuestion(args.taskId) }
    };
  }
});

// Get Result Command
const getResultParams = [taskIdParam] as const satisfies readonly CommandParameter[];

export const getResult = defineCommand({
  name: 'getResult',
  mcpName: 'get_result',
  cliName: 'get-result',
  description: 'Show the final result of a completed task. Returns null until the task completes.',
  parameters: getResultParams,
  formatResult: (result: CommandResult<TaskResultData>) => result.data ? formatResult(result.data) : '',
  async handler(context, args): Promise<CommandResult<TaskResultData>> {
    return {
      success: true,
      data: { taskId: args.taskId, result: await context.status.getResult(args.taskId) }
    };
  }
});

// Get Log Command
const getLogParams = [taskIdParam] as const satisfies readonly CommandParameter[];

export const getLog = defineCommand({
  name: 'getLog',
  mcpName: 'get_log',
  cliName: 'get-log',
  description: 'Show the supervisor\'s debug log for a task. Useful when a task ended in error or its process died.',
  parameters: getLogParams,
  formatResult: (result: CommandResult<TaskLogData>) => {
    if (!result.data) return '';
    return result.data.log ?? chalk.gray(`No bridge log for task '${result.data.taskId}'`);
  },
  async handler(context, args): Promise<CommandResult<TaskLogData>> {
    return {
      success: true,
      data: { taskId: args.taskId, log: await context.status.getLog(args.taskId) }
    };
  }
});
