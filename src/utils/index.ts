export * from './fileUtils.js';
export * from './validation.js';
export * from './process.js';

/**
 * Generate a timestamp-based task identifier: task-YYYYMMDD-HHMMSS (local time)
 */
export function generateTaskId(now: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `task-${date}-${time}`;
}

/**
 * ISO-8601 timestamp used in every document
 */
export function nowIso(now: Date = new Date()): string {
  return now.toISOString();
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
