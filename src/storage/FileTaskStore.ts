import path from 'path';
import { promises as fs } from 'fs';
import {
  DocumentKind,
  HealthStatus,
  LogStream,
  TaskDocuments,
} from '../types/index.js';
import {
  AlreadyExistsError,
  CorruptDocumentError,
  NotFoundError,
  getErrorCode,
  getErrorMessage,
} from '../types/errors.js';
import { BaseTaskStore } from './TaskStore.js';
import {
  ensureDirectory,
  isDirectory,
  isNotFound,
  listDirectories,
  readFileSafe,
  removeFileSafe,
  tailLines,
  writeFileAtomic,
} from '../utils/fileUtils.js';
import { DOCUMENT_SCHEMAS, validateTaskId } from '../utils/validation.js';
import { logger } from '../utils/logger.js';

const DOCUMENT_FILES: Record<DocumentKind, string> = {
  status: 'status.json',
  question: 'question.json',
  answer: 'answer.json',
  result: 'result.json',
  task: 'task.json',
};

const LOG_FILES: Record<LogStream, string> = {
  output: 'output.log',
  bridge: 'bridge.log',
};

const PID_FILE = 'bridge.pid';

/**
 * File-backed task store:
 *
 *   <homeDir>/tasks/<taskId>/
 *     status.json  question.json  answer.json  result.json  task.json
 *     output.log   bridge.log     bridge.pid
 *
 * No locks: each document has a single writer, and every document write is a
 * stage-then-rename within the task directory.
 */
export class FileTaskStore extends BaseTaskStore {
  private homeDir: string;
  private tasksDir: string;

  constructor(homeDir: string) {
    super();
    this.homeDir = path.resolve(homeDir);
    this.tasksDir = path.join(this.homeDir, 'tasks');
  }

  protected async doInitialize(): Promise<void> {
    await ensureDirectory(this.tasksDir);
  }

  protected async doClose(): Promise<void> {
    // Nothing held open between calls
  }

  getHomeDir(): string {
    return this.homeDir;
  }

  taskDir(taskId: string): string {
    return path.join(this.tasksDir, validateTaskId(taskId));
  }

  private documentPath(taskId: string, kind: DocumentKind): string {
    return path.join(this.taskDir(taskId), DOCUMENT_FILES[kind]);
  }

  logPath(taskId: string, stream: LogStream): string {
    return path.join(this.taskDir(taskId), LOG_FILES[stream]);
  }

  async create(taskId: string): Promise<void> {
    this.ensureInitialized();
    const dir = this.taskDir(taskId);

    try {
      // Non-recursive: an existing directory is a collision, never reused
      await fs.mkdir(dir);
    } catch (error) {
      if (getErrorCode(error) === 'EEXIST') {
        throw new AlreadyExistsError(taskId);
      }
      throw error;
    }

    logger.debug('Task directory created', { operation: 'create', taskId, dir });
  }

  async exists(taskId: string): Promise<boolean> {
    this.ensureInitialized();
    return isDirectory(this.taskDir(taskId));
  }

  async listTaskIds(): Promise<string[]> {
    this.ensureInitialized();
    return listDirectories(this.tasksDir);
  }

  async writeDocument<K extends DocumentKind>(
    taskId: string,
    kind: K,
    content: TaskDocuments[K]
  ): Promise<void> {
    this.ensureInitialized();
    const filePath = this.documentPath(taskId, kind);

    try {
      await writeFileAtomic(filePath, JSON.stringify(content, null, 2));
    } catch (error) {
      if (isNotFound(error)) {
        throw new NotFoundError(taskId);
      }
      throw error;
    }

    logger.trace('Document written', { operation: 'writeDocument', taskId, kind });
  }

  async readDocument<K extends DocumentKind>(taskId: string, kind: K): Promise<TaskDocuments[K] | null> {
    this.ensureInitialized();
    const filePath = this.documentPath(taskId, kind);
    const content = await readFileSafe(filePath);

    if (content === null) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new CorruptDocumentError(filePath, getErrorMessage(error));
    }

    const schema = DOCUMENT_SCHEMAS[kind];
    const { error, value } = schema.validate(parsed);
    if (error) {
      throw new CorruptDocumentError(filePath, error.message);
    }

    return value;
  }

  async removeDocument(taskId: string, kind: DocumentKind): Promise<void> {
    this.ensureInitialized();
    await removeFileSafe(this.documentPath(taskId, kind));
  }

  async appendToLog(taskId: string, stream: LogStream, text: string): Promise<void> {
    this.ensureInitialized();

    try {
      await fs.appendFile(this.logPath(taskId, stream), text, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new NotFoundError(taskId);
      }
      throw error;
    }
  }

  async readLog(taskId: string, stream: LogStream): Promise<string | null> {
    this.ensureInitialized();
    return readFileSafe(this.logPath(taskId, stream));
  }

  async tailLog(taskId: string, stream: LogStream, lines: number): Promise<string | null> {
    const content = await this.readLog(taskId, stream);
    return content === null ? null : tailLines(content, lines);
  }

  async writePid(taskId: string, pid: number): Promise<void> {
    this.ensureInitialized();

    try {
      await writeFileAtomic(path.join(this.taskDir(taskId), PID_FILE), `${pid}\n`);
    } catch (error) {
      if (isNotFound(error)) {
        throw new NotFoundError(taskId);
      }
      throw error;
    }
  }

  async readPid(taskId: string): Promise<number | null> {
    this.ensureInitialized();
    const content = await readFileSafe(path.join(this.taskDir(taskId), PID_FILE));
    if (content === null) {
      return null;
    }
    const pid = parseInt(content.trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  }

  async healthCheck(): Promise<HealthStatus> {
    try {
      this.ensureInitialized();
      const probe = path.join(this.homeDir, `.health-${process.pid}`);
      await writeFileAtomic(probe, new Date().toISOString());
      await removeFileSafe(probe);
      const taskCount = (await this.listTaskIds()).length;
      return { healthy: true, message: `${this.tasksDir} is writable (${taskCount} tasks)` };
    } catch (error) {
      return { healthy: false, message: `Task store unavailable: ${getErrorMessage(error)}` };
    }
  }
}
