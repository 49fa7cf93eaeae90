export * from './Task.js';
export * from './errors.js';

export interface HealthStatus {
  healthy: boolean;
  message?: string;
}
