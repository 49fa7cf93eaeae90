/**
 * Service context creation for command handlers
 */

import { BridgeConfig } from '../config/index.js';
import { TaskStore } from '../storage/index.js';
import { AnswerService } from '../services/AnswerService.js';
import { DispatchService } from '../services/DispatchService.js';
import { DetachedProcessLauncher, ProcessLauncher } from '../services/ProcessLauncher.js';
import { StatusService } from '../services/StatusService.js';
import { ProcessProbe } from '../utils/index.js';
import { ServiceContext } from './types.js';

export interface ServiceContextOverrides {
  launcher?: ProcessLauncher;
  isAlive?: ProcessProbe;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Create service context from an initialized task store
 */
export function createServiceContext(
  config: BridgeConfig,
  store: TaskStore,
  overrides: ServiceContextOverrides = {}
): ServiceContext {
  const launcher = overrides.launcher ?? new DetachedProcessLauncher(config.storage.homeDir);
  const dispatch = new DispatchService(store, launcher, {
    launchGraceMs: config.dispatch.launchGraceMs,
    isAlive: overrides.isAlive,
    sleep: overrides.sleep,
  });
  const status = new StatusService(store, overrides.isAlive);
  const answer = new AnswerService(store);

  return {
    config,
    store,
    dispatch,
    status,
    answer
  };
}
