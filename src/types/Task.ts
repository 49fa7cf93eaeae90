export const TASK_STATUSES = [
  'starting',
  'running',
  'waiting_for_answer',
  'complete',
  'error',
] as const;

export type TaskStatus = typeof TASK_STATUSES[number];

// Statuses that imply the supervisor process should still be alive
export const ACTIVE_STATUSES: readonly TaskStatus[] = ['starting', 'running', 'waiting_for_answer'];
export const TERMINAL_STATUSES: readonly TaskStatus[] = ['complete', 'error'];

export function isActiveStatus(status: TaskStatus): boolean {
  return ACTIVE_STATUSES.includes(status);
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * status.json - owned by the task's supervisor, polled by everyone else
 */
export interface StatusRecord {
  status: TaskStatus;
  detail: string;
  updated_at: string;
  pid: number;
}

export interface QuestionOption {
  label: string;
  description?: string;
}

export interface ClarificationQuestion {
  question: string;
  header?: string;
  options: QuestionOption[];
  multiSelect?: boolean;
}

/**
 * question.json - present only while the task is waiting for an answer.
 * `question` and `options` mirror the first entry of `questions`.
 */
export interface QuestionRecord {
  question: string;
  options: QuestionOption[];
  questions: ClarificationQuestion[];
  asked_at: string;
}

/**
 * answer.json - written by the operator, consumed and removed by the supervisor
 */
export interface AnswerRecord {
  text: string;
  answered_at: string;
  answers?: Record<string, string>;
}

/**
 * result.json - written once, just before the status becomes `complete`
 */
export interface ResultRecord {
  subtype: string;
  result?: string;
  session_id?: string;
  num_turns?: number;
  total_cost_usd?: number;
  duration_ms?: number;
  is_error: boolean;
  completed_at: string;
}

/**
 * task.json - what the task was asked to do
 */
export interface TaskMetadata {
  task_id: string;
  workdir: string;
  prompt: string;
  created_at: string;
}

export interface TaskDocuments {
  status: StatusRecord;
  question: QuestionRecord;
  answer: AnswerRecord;
  result: ResultRecord;
  task: TaskMetadata;
}

export type DocumentKind = keyof TaskDocuments;

export type LogStream = 'output' | 'bridge';

export interface DispatchInput {
  taskId?: string;
  workdir: string;
  prompt: string;
}

export interface DispatchResult {
  taskId: string;
  pid: number;
  taskDir: string;
  workdir: string;
}

export type Liveness = 'alive' | 'dead' | 'unknown';

export interface TaskStatusView {
  taskId: string;
  status: StatusRecord | null;
  metadata: TaskMetadata | null;
  liveness: Liveness;
  warning?: string;
  bridgeLogPath: string;
}

export interface TaskSummary {
  taskId: string;
  status: TaskStatus | 'unknown';
  detail: string;
  updatedAt?: string;
  hasStatus: boolean;
}

export interface SubmitAnswerResult {
  taskId: string;
  answer: AnswerRecord;
  warning?: string;
}
