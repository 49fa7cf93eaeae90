import Joi from 'joi';
import os from 'os';
import path from 'path';

export type PermissionMode = 'default' | 'acceptEdits' | 'bypassPermissions' | 'plan';

export interface BridgeConfig {
  // Storage configuration
  storage: {
    homeDir: string;
  };

  // Supervisor (background process) configuration
  supervisor: {
    pollIntervalMs: number;
    answerTimeoutMs: number;
  };

  // Dispatcher configuration
  dispatch: {
    launchGraceMs: number;
  };

  // Underlying coding agent configuration
  agent: {
    permissionMode: PermissionMode;
    model?: string;
    executablePath?: string;
  };

  // Logging configuration
  logging: {
    level: 'error' | 'warn' | 'info' | 'debug' | 'trace';
    pretty: boolean;
  };
}

export const DEFAULT_HOME_DIR = path.join(os.homedir(), '.task-bridge');

export const configSchema = Joi.object<BridgeConfig>({
  storage: Joi.object({
    homeDir: Joi.string().default(DEFAULT_HOME_DIR),
  }).default(),

  supervisor: Joi.object({
    pollIntervalMs: Joi.number().integer().min(10).default(2000),
    answerTimeoutMs: Joi.number().integer().min(0).default(600000), // 10 minutes
  }).default(),

  dispatch: Joi.object({
    launchGraceMs: Joi.number().integer().min(0).default(1000),
  }).default(),

  agent: Joi.object({
    permissionMode: Joi.string()
      .valid('default', 'acceptEdits', 'bypassPermissions', 'plan')
      .default('acceptEdits'),
    model: Joi.string().optional(),
    executablePath: Joi.string().optional(),
  }).default(),

  logging: Joi.object({
    level: Joi.string().valid('error', 'warn', 'info', 'debug', 'trace').default('info'),
    pretty: Joi.boolean().default(false),
  }).default(),
}).default();
