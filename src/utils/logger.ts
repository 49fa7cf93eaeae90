import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getErrorCode } from '../types/errors.js';

/**
 * Structured Logger for the task bridge
 * One JSON object per line. Inside a supervisor process stdout and stderr are
 * redirected into the task's bridge.log, so this is also the per-task debug log.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface LogContext {
  taskId?: string;
  operation?: string;
  duration?: number;
  pid?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
  metrics?: {
    [key: string]: number;
  };
}

export interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
  // stdout belongs to the protocol when serving MCP over stdio
  stderrOnly?: boolean;
}

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

class Logger {
  private logLevel: LogLevel;
  private pretty = false;
  private stderrOnly = false;
  private serviceName: string;
  private environment: string;
  private baseContext: LogContext;
  private testLogFile?: string;

  constructor(
    serviceName: string = 'task-bridge',
    logLevel: LogLevel = 'info',
    environment: string = process.env.NODE_ENV || 'development',
    baseContext: LogContext = {}
  ) {
    this.serviceName = serviceName;
    this.logLevel = logLevel;
    this.environment = environment;
    this.baseContext = baseContext;

    // Keep test output readable: log entries go to a file unless disabled
    if (this.environment === 'test' && process.env.TEST_LOG_FILE !== 'false') {
      const logDir = path.join(os.tmpdir(), 'task-bridge-test-logs');
      fs.mkdirSync(logDir, { recursive: true });
      this.testLogFile = path.join(logDir, `test-${Date.now()}-${process.pid}.log`);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.logLevel);
  }

  private formatLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error,
    metrics?: { [key: string]: number }
  ): LogEntry {
    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: {
        ...this.baseContext,
        ...context,
        service: this.serviceName,
        pid: process.pid,
      },
    };

    if (error) {
      logEntry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: getErrorCode(error),
      };
    }

    if (metrics) {
      logEntry.metrics = metrics;
    }

    return logEntry;
  }

  private render(logEntry: LogEntry): string {
    if (!this.pretty) {
      return JSON.stringify(logEntry);
    }

    const { service: _service, pid: _pid, ...rest } = logEntry.context ?? {};
    let line = `${logEntry.timestamp} ${logEntry.level.toUpperCase().padEnd(5)} ${logEntry.message}`;
    if (Object.keys(rest).length > 0) {
      line += ` ${JSON.stringify(rest)}`;
    }
    if (logEntry.error) {
      line += `\n${logEntry.error.stack ?? `${logEntry.error.name}: ${logEntry.error.message}`}`;
    }
    return line;
  }

  private writeLog(logEntry: LogEntry): void {
    const output = this.render(logEntry);

    if (this.testLogFile) {
      try {
        fs.appendFileSync(this.testLogFile, output + '\n');
        return;
      } catch (error) {
        console.error('Failed to write to test log file:', error);
      }
    }

    if (this.stderrOnly || logEntry.level === 'error' || logEntry.level === 'warn') {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog('error')) return;
    this.writeLog(this.formatLogEntry('error', message, context, error));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;
    this.writeLog(this.formatLogEntry('warn', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.writeLog(this.formatLogEntry('info', message, context));
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;
    this.writeLog(this.formatLogEntry('debug', message, context));
  }

  trace(message: string, context?: LogContext): void {
    if (!this.shouldLog('trace')) return;
    this.writeLog(this.formatLogEntry('trace', message, context));
  }

  /**
   * Log with custom metrics
   */
  metric(message: string, metrics: { [key: string]: number }, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.writeLog(this.formatLogEntry('info', message, context, undefined, metrics));
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    const childLogger = new Logger(
      this.serviceName,
      this.logLevel,
      this.environment,
      { ...this.baseContext, ...additionalContext }
    );
    childLogger.pretty = this.pretty;
    childLogger.stderrOnly = this.stderrOnly;
    childLogger.testLogFile = this.testLogFile;
    return childLogger;
  }

  /**
   * Apply level and output style from configuration
   */
  configure(options: LoggerOptions): void {
    this.logLevel = options.level;
    this.pretty = options.pretty;
    this.stderrOnly = options.stderrOnly ?? false;
  }
}

// Create default logger instance
export const logger = new Logger();

// Export Logger class for custom instances
export { Logger };

/**
 * Helper function to create operation-specific loggers
 */
export function createOperationLogger(operation: string, context?: LogContext): Logger {
  return logger.child({ operation, ...context });
}
