/**
 * Generated MCP Tools from Command Definitions
 */

import { CallToolRequest, CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { COMMAND_DEFINITIONS } from '../commands/index.js';
import { generateMcpHandler, generateMcpTool } from '../commands/generators.js';
import { ServiceContext } from '../commands/types.js';

export class GeneratedToolHandlers {
  private handlers: Map<string, (args?: Record<string, unknown>) => Promise<CallToolResult>>;

  constructor(context: ServiceContext) {
    this.handlers = new Map();

    // Generate handlers for all command definitions
    for (const def of COMMAND_DEFINITIONS) {
      this.handlers.set(def.mcpName, generateMcpHandler(def, context));
    }
  }

  /**
   * Handle tool calls
   */
  async handleToolCall(request: CallToolRequest): Promise<CallToolResult> {
    const { name, arguments: args } = request.params;

    const handler = this.handlers.get(name);
    if (!handler) {
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              success: false,
              error: `Unknown tool: ${name}`
            }, null, 2)
          }
        ],
        isError: true
      };
    }

    return handler(args);
  }
}

// Export generated tools
export const tools: Tool[] = COMMAND_DEFINITIONS.map(def => generateMcpTool(def));
