import { TaskStore } from '../storage/index.js';
import { AnswerRecord, SubmitAnswerResult } from '../types/index.js';
import { TaskNotFoundError } from '../types/errors.js';
import { answerTextSchema, nowIso, validate, validateTaskId } from '../utils/index.js';
import { logger } from '../utils/logger.js';

/**
 * Delivers an operator's answer to a task waiting on a clarifying question
 */
export class AnswerService {
  constructor(private store: TaskStore) {}

  async submitAnswer(taskId: string, text: string, answers?: Record<string, string>): Promise<SubmitAnswerResult> {
    const answerText = validate(answerTextSchema, text);
    validateTaskId(taskId);

    if (!(await this.store.exists(taskId))) {
      throw new TaskNotFoundError(taskId);
    }

    const result: SubmitAnswerResult = {
      taskId,
      answer: { text: answerText, answered_at: nowIso() },
    };
    if (answers) {
      result.answer.answers = answers;
    }

    // Not fatal: the supervisor may be about to ask, or the caller may be early
    const status = await this.store.readDocument(taskId, 'status');
    if (status?.status !== 'waiting_for_answer') {
      result.warning = `Task status is '${status?.status ?? 'unknown'}', not 'waiting_for_answer'`;
    }

    const answer: AnswerRecord = result.answer;
    await this.store.writeDocument(taskId, 'answer', answer);
    logger.debug('Answer submitted', { operation: 'submitAnswer', taskId, waiting: result.warning === undefined });

    return result;
  }
}
