/**
 * Generators for MCP tools and CLI commands from command definitions
 */

import type { Argv, Options, PositionalOptions } from 'yargs';
import { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { errorResult, formatCommandResult, isOutputFormat, OutputFormat } from './formatters.js';
import { CommandArgs, CommandDefinition, CommandResult, ServiceContext } from './types.js';
import { readContentFromFileOrValue, toCommandArgs } from './utils.js';
import { isBridgeError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

function logCommandError(error: unknown, context: string, command: string): void {
  // Bridge errors are expected outcomes (bad input, unknown task); anything else is a bug
  if (isBridgeError(error)) {
    logger.debug(`Command failed in ${context}`, { command, code: error.code, errorMessage: error.message });
    return;
  }
  logger.error(`Unexpected error in ${context}`, { command }, error instanceof Error ? error : new Error(String(error)));
}

interface JsonSchemaProperty {
  type: 'string' | 'number' | 'boolean';
  description: string;
  enum?: readonly string[];
  default?: unknown;
}

/**
 * Generate MCP tool from command definition
 */
export function generateMcpTool(def: CommandDefinition): Tool {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];

  // Add format parameter to all MCP tools
  properties.format = {
    type: 'string',
    description: 'Output format (human-readable text or JSON)',
    enum: ['human', 'json'],
    default: 'json'
  };

  for (const param of def.parameters) {
    const schema: JsonSchemaProperty = {
      type: param.type,
      description: param.description
    };

    if (param.choices) {
      schema.enum = param.choices;
    }

    if (param.default !== undefined) {
      schema.default = param.default;
    }

    properties[param.name] = schema;

    if (param.required) {
      required.push(param.name);
    }
  }

  return {
    name: def.mcpName,
    description: generateEnhancedDescription(def),
    inputSchema: {
      type: 'object',
      properties,
      required: required.length > 0 ? required : undefined
    }
  };
}

/**
 * Generate enhanced description with LLM agent discoverability hints
 */
function generateEnhancedDescription(def: CommandDefinition): string {
  let description = def.description;

  if (def.discoverability) {
    const disc = def.discoverability;

    if (disc.useWhen.length > 0) {
      description += `\n\nUSE WHEN: ${disc.useWhen.join(' | ')}`;
    }
    if (disc.typicalPredecessors.length > 0) {
      description += `\n\nTYPICALLY AFTER: ${disc.typicalPredecessors.join(', ')}`;
    }
    if (disc.typicalSuccessors.length > 0) {
      description += `\n\nTYPICALLY BEFORE: ${disc.typicalSuccessors.join(', ')}`;
    }
    if (disc.antiPatterns.length > 0) {
      description += `\n\nAVOID WHEN: ${disc.antiPatterns.join(' | ')}`;
    }
  }

  return description;
}

/**
 * Generate CLI command configuration from command definition
 */
export function generateCliCommand(def: CommandDefinition) {
  // Build yargs command string with positional parameters
  const commandParts: string[] = [def.cliName];
  for (const param of def.parameters.filter(p => p.positional)) {
    commandParts.push(param.required ? `<${param.name}>` : `[${param.name}]`);
  }

  // yargs builders mutate the instance they are given
  const builder = (yargs: Argv): Argv => {
    yargs.option('format', {
      type: 'string',
      describe: 'Output format',
      choices: ['human', 'json'],
      default: 'human',
      alias: 'f'
    });

    for (const param of def.parameters) {
      if (param.positional) {
        const positional: PositionalOptions = {
          describe: param.description,
          type: param.type
        };
        if (param.default !== undefined) positional.default = param.default;
        if (param.choices) positional.choices = [...param.choices];
        yargs.positional(param.name, positional);
        continue;
      }

      const option: Options = {
        type: param.type,
        describe: param.description
      };
      if (param.required) option.demandOption = true;
      if (param.alias !== undefined) option.alias = typeof param.alias === 'string' ? param.alias : [...param.alias];
      if (param.default !== undefined) option.default = param.default;
      if (param.choices) option.choices = [...param.choices];
      yargs.option(param.name, option);
    }

    for (const example of def.examples ?? []) {
      yargs.example(example, '');
    }

    return yargs;
  };

  return {
    command: commandParts.join(' '),
    describe: def.description,
    builder
  };
}

/**
 * Run a command against raw CLI input: `@file` expansion, argument checks,
 * the handler itself, and failures folded into the result.
 */
export async function runCliCommand(
  def: CommandDefinition,
  context: ServiceContext,
  argv: Record<string, unknown>
): Promise<{ result: CommandResult; args: CommandArgs }> {
  const raw: Record<string, unknown> = { ...argv };
  let args: CommandArgs = {};

  try {
    for (const param of def.parameters) {
      const value = raw[param.name];
      if (param.readFromFile && typeof value === 'string') {
        raw[param.name] = readContentFromFileOrValue(value, param.name);
      }
    }

    args = toCommandArgs(def, raw);
    return { result: await def.handler(context, args), args };
  } catch (error) {
    logCommandError(error, 'CLI handler execution', def.cliName);
    return { result: errorResult(error), args };
  }
}

/**
 * Generate CLI handler from command definition
 */
export function generateCliHandler(def: CommandDefinition, context: ServiceContext) {
  return async (argv: Record<string, unknown>): Promise<number> => {
    const format: OutputFormat = isOutputFormat(argv.format) ? argv.format : 'human';
    const { result, args } = await runCliCommand(def, context, argv);
    const formatted = formatCommandResult(def, result, args, format);

    if (formatted.text) {
      if (formatted.exitCode === 0) {
        console.log(formatted.text);
      } else {
        console.error(formatted.text);
      }
    }

    return formatted.exitCode;
  };
}

/**
 * Generate MCP handler from command definition
 */
export function generateMcpHandler(def: CommandDefinition, context: ServiceContext) {
  return async (input: Record<string, unknown> = {}): Promise<CallToolResult> => {
    // MCP callers default to JSON
    const format: OutputFormat = isOutputFormat(input.format) ? input.format : 'json';
    let args: CommandArgs = {};
    let result: CommandResult;

    try {
      args = toCommandArgs(def, input);
      result = await def.handler(context, args);
    } catch (error) {
      logCommandError(error, 'MCP handler execution', def.mcpName);
      result = errorResult(error);
    }

    const formatted = formatCommandResult(def, result, args, format);
    return {
      content: [
        {
          type: 'text' as const,
          text: formatted.text
        }
      ],
      isError: formatted.exitCode !== 0
    };
  };
}
