import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import path from 'path';
import { readContentFromFileOrValue, toCommandArgs } from '../../src/commands/utils.js';
import { dispatchTask } from '../../src/commands/definitions/task.js';
import { getOutput } from '../../src/commands/definitions/inspect.js';
import { healthCheck } from '../../src/commands/definitions/system.js';
import { ValidationError } from '../../src/types/errors.js';
import { createTestHomeDir, removeTestHomeDir } from '../fixtures/index.js';

describe('Command utilities', () => {
  describe('readContentFromFileOrValue', () => {
    let dir: string;

    beforeEach(() => {
      dir = createTestHomeDir();
    });

    afterEach(() => {
      removeTestHomeDir(dir);
    });

    it('should return plain values unchanged', () => {
      expect(readContentFromFileOrValue('Fix the bug')).toBe('Fix the bug');
    });

    it('should read @path values from the file, dropping one trailing newline', () => {
      const file = path.join(dir, 'task.md');
      writeFileSync(file, '# Task\n\nFix the bug\n\n');

      expect(readContentFromFileOrValue(`@${file}`)).toBe('# Task\n\nFix the bug\n');
    });

    it('should report an unreadable file as a validation error', () => {
      const file = path.join(dir, 'missing.md');

      expect(() => readContentFromFileOrValue(`@${file}`, 'prompt')).toThrow(ValidationError);
      expect(() => readContentFromFileOrValue(`@${file}`, 'prompt')).toThrow(`Failed to read file '${file}'`);
    });
  });

  describe('toCommandArgs', () => {
    it('should keep declared parameters and apply defaults', () => {
      expect(toCommandArgs(getOutput, { taskId: 't1', unrelated: true })).toEqual({ taskId: 't1', lines: 50 });
    });

    it('should leave unset optional parameters out', () => {
      expect(toCommandArgs(dispatchTask, { prompt: 'Go' })).toEqual({ prompt: 'Go' });
    });

    it('should coerce numeric strings for number parameters', () => {
      expect(toCommandArgs(getOutput, { taskId: 't1', lines: '5' })).toEqual({ taskId: 't1', lines: 5 });
    });

    it('should coerce numbers for string parameters', () => {
      expect(toCommandArgs(getOutput, { taskId: 42 })).toEqual({ taskId: '42', lines: 50 });
    });

    it('should reject missing required parameters', () => {
      expect(() => toCommandArgs(dispatchTask, { taskId: 't1' })).toThrow('Missing required parameter: prompt');
    });

    it('should reject values of the wrong type', () => {
      expect(() => toCommandArgs(getOutput, { taskId: 't1', lines: 'many' })).toThrow("Parameter 'lines' must be a number");
      expect(() => toCommandArgs(getOutput, { taskId: 't1', lines: true })).toThrow("Parameter 'lines' must be a number");
      expect(() => toCommandArgs(dispatchTask, { prompt: { text: 'Go' } })).toThrow("Parameter 'prompt' must be a string");
    });

    it('should accept commands without parameters', () => {
      expect(toCommandArgs(healthCheck, { format: 'json' })).toEqual({});
    });
  });
});
