import {
  DocumentKind,
  HealthStatus,
  LogStream,
  TaskDocuments,
} from '../types/index.js';

/**
 * Durable per-task storage for the bridge.
 *
 * Documents are whole-value writes that readers observe either completely or
 * not at all; logs are append-only and may be read with a trailing partial line.
 */
export interface TaskStore {
  // Lifecycle
  initialize(): Promise<void>;
  close(): Promise<void>;

  // Task directories
  create(taskId: string): Promise<void>;
  exists(taskId: string): Promise<boolean>;
  listTaskIds(): Promise<string[]>;
  taskDir(taskId: string): string;

  // Documents (status, question, answer, result, task)
  writeDocument<K extends DocumentKind>(taskId: string, kind: K, content: TaskDocuments[K]): Promise<void>;
  readDocument<K extends DocumentKind>(taskId: string, kind: K): Promise<TaskDocuments[K] | null>;
  removeDocument(taskId: string, kind: DocumentKind): Promise<void>;

  // Logs (output.log, bridge.log)
  appendToLog(taskId: string, stream: LogStream, text: string): Promise<void>;
  readLog(taskId: string, stream: LogStream): Promise<string | null>;
  tailLog(taskId: string, stream: LogStream, lines: number): Promise<string | null>;
  logPath(taskId: string, stream: LogStream): string;

  // Supervisor pid file (bridge.pid)
  writePid(taskId: string, pid: number): Promise<void>;
  readPid(taskId: string): Promise<number | null>;

  // Health
  healthCheck(): Promise<HealthStatus>;
}

/**
 * Base class for task stores with common lifecycle handling
 */
export abstract class BaseTaskStore implements TaskStore {
  protected initialized = false;

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.doInitialize();
    this.initialized = true;
  }

  async close(): Promise<void> {
    if (!this.initialized) {
      return;
    }
    await this.doClose();
    this.initialized = false;
  }

  protected ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('Task store not initialized. Call initialize() first.');
    }
  }

  protected abstract doInitialize(): Promise<void>;
  protected abstract doClose(): Promise<void>;

  abstract create(taskId: string): Promise<void>;
  abstract exists(taskId: string): Promise<boolean>;
  abstract listTaskIds(): Promise<string[]>;
  abstract taskDir(taskId: string): string;

  abstract writeDocument<K extends DocumentKind>(taskId: string, kind: K, content: TaskDocuments[K]): Promise<void>;
  abstract readDocument<K extends DocumentKind>(taskId: string, kind: K): Promise<TaskDocuments[K] | null>;
  abstract removeDocument(taskId: string, kind: DocumentKind): Promise<void>;

  abstract appendToLog(taskId: string, stream: LogStream, text: string): Promise<void>;
  abstract readLog(taskId: string, stream: LogStream): Promise<string | null>;
  abstract tailLog(taskId: string, stream: LogStream, lines: number): Promise<string | null>;
  abstract logPath(taskId: string, stream: LogStream): string;

  abstract writePid(taskId: string, pid: number): Promise<void>;
  abstract readPid(taskId: string): Promise<number | null>;

  abstract healthCheck(): Promise<HealthStatus>;
}
