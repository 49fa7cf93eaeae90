/**
 * Unified command definitions - all commands organized by category
 */

import { CommandDefinition } from './types.js';
import { dispatchTask, getStatus, listTasks } from './definitions/task.js';
import { getLog, getOutput, getQuestion, getResult } from './definitions/inspect.js';
import { healthCheck, submitAnswer } from './definitions/system.js';

export const COMMAND_DEFINITIONS = [
  // Task lifecycle
  dispatchTask,
  getStatus,
  listTasks,

  // Inspection
  getOutput,
  getQuestion,
  getResult,
  getLog,

  // Operator input & system
  submitAnswer,
  healthCheck
] as const satisfies readonly CommandDefinition[];

/**
 * Look a command up by its base, CLI or MCP name
 */
export function findCommand(name: string): CommandDefinition | undefined {
  return COMMAND_DEFINITIONS.find(def => def.name === name || def.cliName === name || def.mcpName === name);
}
