import { TaskStore } from '../storage/index.js';
import { AnswerRecord, ClarificationQuestion, QuestionRecord } from '../types/index.js';
import { getErrorMessage } from '../types/errors.js';
import { nowIso, sleep } from '../utils/index.js';
import { Logger, createOperationLogger } from '../utils/logger.js';
import { StatusWriter } from './StatusWriter.js';

export const DEFAULT_ANSWER = 'No preference';

export interface ClarificationTiming {
  pollIntervalMs: number;
  answerTimeoutMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Build the answer map for a set of questions from an operator's answer.
 * An explicit `answers` map wins; otherwise the text answers the first question.
 */
export function mapAnswer(questions: ClarificationQuestion[], answer: AnswerRecord): Record<string, string> {
  if (answer.answers && Object.keys(answer.answers).length > 0) {
    return { ...answer.answers };
  }
  const first = questions[0];
  return first ? { [first.question]: answer.text } : {};
}

/**
 * The fallback used when nobody answers in time: the first option of each question
 */
export function defaultAnswers(questions: ClarificationQuestion[]): Record<string, string> {
  const answers: Record<string, string> = {};
  for (const question of questions) {
    answers[question.question] = question.options[0]?.label ?? DEFAULT_ANSWER;
  }
  return answers;
}

/**
 * Relays one task's clarification questions through the task store and
 * blocks until the operator answers or the wait budget runs out.
 */
export class ClarificationService {
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastConsumed?: string;

  constructor(
    private store: TaskStore,
    private statusWriter: StatusWriter,
    private taskId: string,
    private timing: ClarificationTiming
  ) {
    this.log = createOperationLogger('clarification', { taskId });
    this.now = timing.now ?? Date.now;
    this.sleep = timing.sleep ?? sleep;
  }

  async ask(questions: ClarificationQuestion[]): Promise<Record<string, string>> {
    const first = questions[0];
    const record: QuestionRecord = {
      question: first?.question ?? '',
      options: first?.options ?? [],
      questions,
      asked_at: nowIso(),
    };

    // An answer left over from an earlier question must not satisfy this one.
    // Cleared before the question exists, so a fast operator is never discarded.
    await this.store.removeDocument(this.taskId, 'answer');

    // Question before status: a reader that sees waiting_for_answer can read it
    await this.store.writeDocument(this.taskId, 'question', record);
    await this.statusWriter.transition('waiting_for_answer', 'Agent is asking a clarifying question');
    this.log.info('Waiting for answer', {
      question: record.question,
      optionCount: record.options.length,
      timeoutMs: this.timing.answerTimeoutMs,
    });

    const startedAt = this.now();
    for (;;) {
      const answer = await this.readAnswer();
      if (answer) {
        await this.store.removeDocument(this.taskId, 'question');
        await this.store.removeDocument(this.taskId, 'answer');
        await this.statusWriter.transition('running', 'Received answer, continuing');
        this.log.info('Answer received', { answeredAt: answer.answered_at });
        return mapAnswer(questions, answer);
      }

      if (this.now() - startedAt >= this.timing.answerTimeoutMs) {
        await this.store.removeDocument(this.taskId, 'question');
        await this.statusWriter.transition('running', 'Answer timed out, continuing with default');
        const answers = defaultAnswers(questions);
        this.log.warn('Answer timed out, using defaults', { answers });
        return answers;
      }

      await this.sleep(this.timing.pollIntervalMs);
    }
  }

  /**
   * Read answer.json if it holds an answer not already acted on
   */
  private async readAnswer(): Promise<AnswerRecord | null> {
    let answer: AnswerRecord | null;
    try {
      answer = await this.store.readDocument(this.taskId, 'answer');
    } catch (error) {
      this.log.warn('Discarding unreadable answer', { reason: getErrorMessage(error) });
      await this.store.removeDocument(this.taskId, 'answer');
      return null;
    }

    if (!answer) {
      return null;
    }

    const fingerprint = `${answer.answered_at}\u0000${answer.text}`;
    if (fingerprint === this.lastConsumed) {
      this.log.debug('Ignoring already consumed answer');
      await this.store.removeDocument(this.taskId, 'answer');
      return null;
    }

    this.lastConsumed = fingerprint;
    return answer;
  }
}
