import Joi from 'joi';
import {
  AnswerRecord,
  DispatchInput,
  DocumentKind,
  QuestionRecord,
  ResultRecord,
  StatusRecord,
  TASK_STATUSES,
  TaskDocuments,
  TaskMetadata,
} from '../types/index.js';
import { ValidationError } from '../types/errors.js';

/**
 * Common validation schemas for the task bridge
 */

export const taskIdSchema = Joi.string()
  .min(1)
  .max(100)
  .pattern(/^[a-zA-Z0-9._][a-zA-Z0-9._-]*$/)
  .invalid('.', '..')
  .messages({
    'string.pattern.base': 'Task ID can only contain letters, numbers, dots, hyphens, and underscores, and cannot start with a hyphen',
    'any.invalid': 'Task ID cannot be "." or ".."',
  });

export const promptSchema = Joi.string()
  .pattern(/\S/)
  .required()
  .messages({
    'string.empty': '--prompt is required',
    'string.pattern.base': '--prompt must not be blank',
    'any.required': '--prompt is required',
  });

export const answerTextSchema = Joi.string()
  .min(1)
  .required()
  .messages({
    'string.empty': '--answer is required',
    'any.required': '--answer is required',
  });

export const workdirSchema = Joi.string().min(1).required();

export const dispatchInputSchema = Joi.object<DispatchInput>({
  taskId: taskIdSchema.optional(),
  workdir: workdirSchema,
  prompt: promptSchema,
});

/**
 * Schemas for the on-disk documents. Unknown keys are tolerated so a newer
 * supervisor can add fields without breaking older readers.
 */

const isoTimestamp = Joi.string().min(1);

const questionOptionSchema = Joi.object({
  label: Joi.string().allow('').required(),
  description: Joi.string().allow('').optional(),
}).unknown(true);

export const clarificationQuestionSchema = Joi.object({
  question: Joi.string().allow('').required(),
  header: Joi.string().allow('').optional(),
  options: Joi.array().items(questionOptionSchema).default([]),
  multiSelect: Joi.boolean().optional(),
}).unknown(true);

export const statusRecordSchema = Joi.object<StatusRecord>({
  status: Joi.string().valid(...TASK_STATUSES).required(),
  detail: Joi.string().allow('').default(''),
  updated_at: isoTimestamp.required(),
  pid: Joi.number().integer().min(0).required(),
}).unknown(true);

export const questionRecordSchema = Joi.object<QuestionRecord>({
  question: Joi.string().allow('').required(),
  options: Joi.array().items(questionOptionSchema).default([]),
  questions: Joi.array().items(clarificationQuestionSchema).default([]),
  asked_at: isoTimestamp.required(),
}).unknown(true);

export const answerRecordSchema = Joi.object<AnswerRecord>({
  text: Joi.string().allow('').required(),
  answered_at: isoTimestamp.required(),
  answers: Joi.object().pattern(Joi.string(), Joi.string().allow('')).optional(),
}).unknown(true);

export const resultRecordSchema = Joi.object<ResultRecord>({
  subtype: Joi.string().required(),
  result: Joi.string().allow('').optional(),
  session_id: Joi.string().optional(),
  num_turns: Joi.number().optional(),
  total_cost_usd: Joi.number().optional(),
  duration_ms: Joi.number().optional(),
  is_error: Joi.boolean().required(),
  completed_at: isoTimestamp.required(),
}).unknown(true);

export const taskMetadataSchema = Joi.object<TaskMetadata>({
  task_id: Joi.string().required(),
  workdir: Joi.string().required(),
  prompt: Joi.string().allow('').required(),
  created_at: isoTimestamp.required(),
}).unknown(true);

export const DOCUMENT_SCHEMAS: { [K in DocumentKind]: Joi.ObjectSchema<TaskDocuments[K]> } = {
  status: statusRecordSchema,
  question: questionRecordSchema,
  answer: answerRecordSchema,
  result: resultRecordSchema,
  task: taskMetadataSchema,
};

/**
 * Validate data against a schema, throwing ValidationError with every detail
 */
export function validate<T>(schema: Joi.Schema<T>, data: unknown): T {
  const { error, value } = schema.validate(data, {
    abortEarly: false,
    stripUnknown: false,
    allowUnknown: false,
  });

  if (error) {
    const details = error.details.map(detail => ({
      field: detail.path.join('.'),
      message: detail.message,
    }));
    const message = details.length === 1 && details[0]
      ? details[0].message
      : `Validation failed: ${details.map(d => `${d.field}: ${d.message}`).join(', ')}`;
    throw new ValidationError(message, details[0]?.field || undefined);
  }

  return value;
}

export function validateTaskId(taskId: unknown): string {
  return validate(taskIdSchema.required(), taskId);
}
