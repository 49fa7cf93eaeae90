export * from './types.js';
export * from './ClaudeAgentRunner.js';
