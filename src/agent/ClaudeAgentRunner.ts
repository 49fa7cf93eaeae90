/**
 * Agent runner backed by the Claude Agent SDK.
 *
 * Runs one `query()` session in the task's working directory. Every tool call
 * is approved automatically except AskUserQuestion, which is handed to the
 * clarification handler; its answers are injected back into the tool input.
 */

import {
  query,
  type Options,
  type PermissionResult,
  type SDKMessage,
  type SDKUserMessage,
} from '@anthropic-ai/claude-agent-sdk';
import { BridgeConfig } from '../config/index.js';
import { ClarificationQuestion, QuestionOption } from '../types/index.js';
import { Logger, createOperationLogger } from '../utils/logger.js';
import { AgentEvent, AgentRunOptions, AgentRunner, ClarificationHandler } from './types.js';

export const CLARIFICATION_TOOL = 'AskUserQuestion';

/**
 * The slice of the SDK's `query` the runner depends on
 */
export type QueryFunction = (params: {
  prompt: AsyncIterable<SDKUserMessage>;
  options: Options;
}) => AsyncIterable<SDKMessage>;

export type ClaudeAgentRunnerOptions = BridgeConfig['agent'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseOption(raw: unknown): QuestionOption | null {
  if (typeof raw === 'string') {
    return { label: raw };
  }
  if (!isRecord(raw) || typeof raw.label !== 'string') {
    return null;
  }
  const description = optionalString(raw.description);
  return description === undefined ? { label: raw.label } : { label: raw.label, description };
}

/**
 * Read the `questions` array of an AskUserQuestion tool input
 */
export function parseClarificationQuestions(raw: unknown): ClarificationQuestion[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const questions: ClarificationQuestion[] = [];
  for (const entry of raw) {
    if (!isRecord(entry) || typeof entry.question !== 'string') {
      continue;
    }
    const options = Array.isArray(entry.options)
      ? entry.options.map(parseOption).filter((option): option is QuestionOption => option !== null)
      : [];
    const question: ClarificationQuestion = { question: entry.question, options };
    const header = optionalString(entry.header);
    if (header !== undefined) {
      question.header = header;
    }
    if (typeof entry.multiSelect === 'boolean') {
      question.multiSelect = entry.multiSelect;
    }
    questions.push(question);
  }
  return questions;
}

/**
 * Pull text and tool-use blocks out of an assistant message body
 */
export function contentToEvents(content: unknown): AgentEvent[] {
  if (typeof content === 'string') {
    return [{ type: 'text', text: content }];
  }
  if (!Array.isArray(content)) {
    return [];
  }

  const events: AgentEvent[] = [];
  for (const block of content) {
    if (!isRecord(block)) continue;
    if (block.type === 'text' && typeof block.text === 'string') {
      events.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use' && typeof block.name === 'string') {
      events.push({ type: 'tool_use', name: block.name });
    }
  }
  return events;
}

export function messageToEvents(message: SDKMessage): AgentEvent[] {
  switch (message.type) {
    case 'system':
      return message.subtype === 'init'
        ? [{ type: 'session_started', sessionId: message.session_id }]
        : [];
    case 'assistant':
      return contentToEvents(message.message.content);
    case 'result':
      return [{
        type: 'result',
        result: {
          subtype: message.subtype,
          result: message.subtype === 'success' ? message.result : undefined,
          session_id: message.session_id,
          num_turns: message.num_turns,
          total_cost_usd: message.total_cost_usd,
          duration_ms: message.duration_ms,
          is_error: message.is_error,
        },
      }];
    default:
      return [];
  }
}

/**
 * Permission callback for a session: approves every tool, and routes
 * AskUserQuestion through `onClarification`, returning its answers to the
 * agent as part of the tool input.
 */
export function createPermissionHandler(
  onClarification: ClarificationHandler,
  log: Logger
): (toolName: string, input: Record<string, unknown>) => Promise<PermissionResult> {
  return async (toolName, input) => {
    if (toolName !== CLARIFICATION_TOOL) {
      log.trace('Tool approved', { toolName });
      return { behavior: 'allow', updatedInput: input };
    }

    const questions = parseClarificationQuestions(input.questions);
    log.info('Agent asked a clarifying question', { questionCount: questions.length });
    const answers = await onClarification(questions);
    return {
      behavior: 'allow',
      updatedInput: { ...input, answers },
    };
  };
}

/**
 * Yield the prompt, then hold the input stream open until the session ends.
 * Permission callbacks are only delivered while the input stream is open.
 */
async function* promptStream(prompt: string, finished: Promise<void>): AsyncGenerator<SDKUserMessage> {
  yield {
    type: 'user',
    message: {
      role: 'user',
      content: prompt,
    },
    parent_tool_use_id: null,
    session_id: '',
  };
  await finished;
}

export class ClaudeAgentRunner implements AgentRunner {
  constructor(
    private options: ClaudeAgentRunnerOptions,
    private queryFn: QueryFunction = query
  ) {}

  async *run({ taskId, prompt, workdir, onClarification }: AgentRunOptions): AsyncGenerator<AgentEvent> {
    const log = createOperationLogger('agent-run', { taskId });

    let markFinished: () => void = () => undefined;
    const finished = new Promise<void>(resolve => {
      markFinished = resolve;
    });

    const sdkOptions: Options = {
      cwd: workdir,
      permissionMode: this.options.permissionMode,
      canUseTool: createPermissionHandler(onClarification, log),
    };
    if (this.options.model) {
      sdkOptions.model = this.options.model;
    }
    if (this.options.executablePath) {
      sdkOptions.pathToClaudeCodeExecutable = this.options.executablePath;
    }

    log.debug('Starting agent query', { workdir, permissionMode: this.options.permissionMode });
    const messages = this.queryFn({ prompt: promptStream(prompt, finished), options: sdkOptions });

    try {
      for await (const message of messages) {
        log.trace('Agent message', { messageType: message.type });
        yield* messageToEvents(message);
        if (message.type === 'result') {
          markFinished();
        }
      }
    } finally {
      markFinished();
    }
  }
}
