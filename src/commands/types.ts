/**
 * Types for unified command definition system
 */

import { BridgeConfig } from '../config/index.js';
import { TaskStore } from '../storage/index.js';
import { AnswerService } from '../services/AnswerService.js';
import { DispatchService } from '../services/DispatchService.js';
import { StatusService } from '../services/StatusService.js';

type CamelToSnakeCase<S extends string> = S extends `${infer T}${infer U}` ?
  `${T extends Capitalize<T> ? "_" : ""}${Lowercase<T>}${CamelToSnakeCase<U>}` :
  S;
type CamelToKebabCase<S extends string> = S extends `${infer T}${infer U}` ?
  `${T extends Capitalize<T> ? "-" : ""}${Lowercase<T>}${CamelToKebabCase<U>}` :
  S;

// Service context for command handlers
export interface ServiceContext {
  config: BridgeConfig;
  store: TaskStore;
  dispatch: DispatchService;
  status: StatusService;
  answer: AnswerService;
}

export type CommandParameterTypes = 'string' | 'number' | 'boolean';

// Parameter definition for commands with type inference support
export interface CommandParameter<T extends CommandParameterTypes = CommandParameterTypes> {
  readonly name: string;
  readonly type: T;
  readonly description: string;
  readonly required?: boolean;
  readonly default?: ParameterFromName<T>;
  readonly choices?: readonly string[];
  readonly alias?: string | readonly string[];
  readonly positional?: boolean;
  /** CLI only: a value of `@path` is replaced by the file's contents */
  readonly readFromFile?: boolean;
}

type ParameterFromName<T extends CommandParameterTypes> =
  T extends 'string' ? string :
  T extends 'number' ? number :
  T extends 'boolean' ? boolean :
  never;

// Extract argument types from parameter definitions
type ParameterType<T extends CommandParameter> =
  T['type'] extends 'string' ?
    T extends { readonly choices: readonly string[] } ? T['choices'][number] : string :
  ParameterFromName<T['type']>;

// Required and defaulted parameters always carry a value
type ParameterValue<T extends CommandParameter> =
  T extends { readonly required: true } ? ParameterType<T> :
  T extends { readonly default: string | number | boolean } ? ParameterType<T> :
  ParameterType<T> | undefined;

// Convert parameter array to argument object type
export type InferArgs<T extends readonly CommandParameter[]> = {
  [K in T[number] as K['name']]: ParameterValue<K>
};

// Arguments as seen by code that handles any command
export type CommandArgs = InferArgs<readonly CommandParameter[]>;

// Result format for consistent output
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  message?: string;
  warnings?: string[];
}

// Command definition interface with type inference
export interface CommandDefinition<
  T extends readonly CommandParameter[] = readonly CommandParameter[],
  R extends CommandResult = CommandResult,
  NAME extends string = string
> {
  // Identity
  name: NAME;
  mcpName: CamelToSnakeCase<NAME>;      // MCP tool name (with underscores)
  cliName: CamelToKebabCase<NAME>;      // CLI command name (with dashes)
  description: string;

  parameters: T;

  handler(context: ServiceContext, args: InferArgs<T>): Promise<R>;

  // Human-readable rendering of a successful result
  formatResult(result: R, args: InferArgs<T>): string;

  examples?: string[];

  // Hints for LLM agents choosing between tools
  discoverability?: ToolDiscoverability;
}

// Generic function to define commands with full type inference
export function defineCommand<T extends readonly CommandParameter[], R extends CommandResult, NAME extends string>(
  definition: CommandDefinition<T, R, NAME>
): CommandDefinition<T, R, NAME> {
  return definition;
}

export interface ToolDiscoverability {
  /** When to use this tool (context and conditions) */
  useWhen: string[];
  /** What typically comes before this tool in workflows */
  typicalPredecessors: string[];
  /** What typically comes after this tool in workflows */
  typicalSuccessors: string[];
  /** Anti-patterns - when NOT to use this tool */
  antiPatterns: string[];
}
