import { BridgeConfig, configSchema } from './types.js';

function parseInteger(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

/**
 * Load configuration from environment variables
 * Following 12-factor app methodology
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const envConfig = {
    storage: {
      homeDir: env.TASK_BRIDGE_HOME,
    },
    supervisor: {
      pollIntervalMs: parseInteger(env.TASK_BRIDGE_POLL_INTERVAL_MS),
      answerTimeoutMs: parseInteger(env.TASK_BRIDGE_ANSWER_TIMEOUT_MS),
    },
    dispatch: {
      launchGraceMs: parseInteger(env.TASK_BRIDGE_LAUNCH_GRACE_MS),
    },
    agent: {
      permissionMode: env.TASK_BRIDGE_PERMISSION_MODE,
      model: env.TASK_BRIDGE_MODEL,
      executablePath: env.TASK_BRIDGE_CLAUDE_PATH,
    },
    logging: {
      level: env.TASK_BRIDGE_LOG_LEVEL,
      pretty: env.TASK_BRIDGE_LOG_PRETTY
        ? env.TASK_BRIDGE_LOG_PRETTY.toLowerCase() === 'true'
        : undefined,
    },
  };

  // Remove undefined values to let Joi apply defaults
  const cleanConfig = removeUndefined(envConfig);

  // Validate and apply defaults
  const { error, value } = configSchema.validate(cleanConfig, {
    allowUnknown: false,
    stripUnknown: true,
  });

  if (error) {
    throw new Error(`Configuration validation failed: ${error.message}`);
  }

  return value;
}

/**
 * Recursively remove undefined values from an object
 */
function removeUndefined(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(removeUndefined);
  }

  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) {
      cleaned[key] = removeUndefined(value);
    }
  }
  return cleaned;
}

/**
 * Get environment-specific configuration examples
 */
export function getConfigExamples() {
  return {
    development: {
      TASK_BRIDGE_HOME: './.task-bridge',
      TASK_BRIDGE_POLL_INTERVAL_MS: '500',
      TASK_BRIDGE_LOG_LEVEL: 'debug',
      TASK_BRIDGE_LOG_PRETTY: 'true',
    },
    production: {
      TASK_BRIDGE_HOME: '/var/lib/task-bridge',
      TASK_BRIDGE_ANSWER_TIMEOUT_MS: '600000',
      TASK_BRIDGE_PERMISSION_MODE: 'acceptEdits',
      TASK_BRIDGE_LOG_LEVEL: 'info',
      TASK_BRIDGE_LOG_PRETTY: 'false',
    },
  };
}

/**
 * Render the examples as `--help` epilog text
 */
export function formatConfigExamples(): string {
  const lines = ['Environment examples:'];
  for (const [name, env] of Object.entries(getConfigExamples())) {
    lines.push(`  ${name}:`);
    for (const [key, value] of Object.entries(env)) {
      lines.push(`    ${key}=${value}`);
    }
  }
  return lines.join('\n');
}

export * from './types.js';
