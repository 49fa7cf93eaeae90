import { ClarificationQuestion, ResultRecord } from '../types/index.js';

/**
 * Events surfaced by an agent run, in the order the agent produces them
 */
export type AgentEvent =
  | { type: 'session_started'; sessionId?: string }
  | { type: 'text'; text: string }
  | { type: 'tool_use'; name: string }
  | { type: 'result'; result: Omit<ResultRecord, 'completed_at'> };

/**
 * Invoked from inside the agent's execution loop when it asks the user a
 * question. The agent stays suspended until the promise settles.
 * Resolves to a map of question text -> answer text.
 */
export type ClarificationHandler = (questions: ClarificationQuestion[]) => Promise<Record<string, string>>;

export interface AgentRunOptions {
  taskId: string;
  prompt: string;
  workdir: string;
  onClarification: ClarificationHandler;
}

export interface AgentRunner {
  run(options: AgentRunOptions): AsyncIterable<AgentEvent>;
}
