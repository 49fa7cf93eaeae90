#!/usr/bin/env node

/**
 * task-bridge entry point
 */

import { runCLI } from './cli.js';

runCLI().catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
