import { BridgeConfig } from '../config/index.js';
import { TaskStore } from './TaskStore.js';
import { FileTaskStore } from './FileTaskStore.js';

/**
 * Create the task store described by configuration
 */
export function createTaskStore(config: BridgeConfig): TaskStore {
  return new FileTaskStore(config.storage.homeDir);
}

export * from './TaskStore.js';
export * from './FileTaskStore.js';
