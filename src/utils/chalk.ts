/**
 * Chalk configuration with auto-detection for MCP mode and non-TTY environments
 */

import { Chalk } from 'chalk';

// Detect if we're in MCP mode or other scenarios where colors should be disabled
function shouldDisableColors(): boolean {
  // Check if we're in MCP mode (when stdin/stdout are not TTY)
  if (!process.stdout.isTTY) {
    return true;
  }

  if (process.env.NO_COLOR) {
    return true;
  }

  if (process.env.FORCE_COLOR === '0' || process.env.FORCE_COLOR === 'false') {
    return true;
  }

  // Common CI environments set this
  if (process.env.CI && !process.env.FORCE_COLOR) {
    return true;
  }

  return false;
}

const configuredChalk = new Chalk(shouldDisableColors() ? { level: 0 } : {});

export default configuredChalk;
