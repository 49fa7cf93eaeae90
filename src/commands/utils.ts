/**
 * Utilities for command processing
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { ValidationError, getErrorMessage } from '../types/errors.js';
import { CommandArgs, CommandDefinition } from './types.js';

/**
 * Reads content from a file path if the value starts with '@', otherwise returns the value as-is
 */
export function readContentFromFileOrValue(value: string, field?: string): string {
  if (value.startsWith('@')) {
    const filePath = value.slice(1); // Remove the '@' prefix
    try {
      const absolutePath = resolve(filePath);
      return readFileSync(absolutePath, 'utf-8').replace(/\r?\n$/, '');
    } catch (error) {
      throw new ValidationError(`Failed to read file '${filePath}': ${getErrorMessage(error)}`, field);
    }
  }
  return value;
}

/**
 * Pick a command's declared parameters out of raw CLI or MCP input, checking
 * each value against its declared type. Unset optional values are left out.
 */
export function toCommandArgs(def: CommandDefinition, raw: Record<string, unknown>): CommandArgs {
  const args: CommandArgs = {};

  for (const param of def.parameters) {
    const value = raw[param.name] ?? param.default;
    if (value === undefined || value === null) {
      if (param.required) {
        throw new ValidationError(`Missing required parameter: ${param.name}`, param.name);
      }
      continue;
    }

    switch (param.type) {
      case 'string':
        if (typeof value !== 'string' && typeof value !== 'number') {
          throw new ValidationError(`Parameter '${param.name}' must be a string`, param.name);
        }
        args[param.name] = String(value);
        break;
      case 'number': {
        const parsed = typeof value === 'number' ? value : Number(value);
        if (typeof value === 'boolean' || !Number.isFinite(parsed)) {
          throw new ValidationError(`Parameter '${param.name}' must be a number`, param.name);
        }
        args[param.name] = parsed;
        break;
      }
      case 'boolean':
        if (typeof value !== 'boolean') {
          throw new ValidationError(`Parameter '${param.name}' must be a boolean`, param.name);
        }
        args[param.name] = value;
        break;
    }

    const current = args[param.name];
    if (param.choices && typeof current === 'string' && !param.choices.includes(current)) {
      throw new ValidationError(
        `Parameter '${param.name}' must be one of: ${param.choices.join(', ')}`,
        param.name
      );
    }
  }

  return args;
}
