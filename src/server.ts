import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { ToolRegistry } from './services/tools/registry.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

export const SERVER_INFO = {
  name: 'container-tool-bridge',
  version: '1.0.0',
};

/**
 * Build the MCP server answering list_tools / call_tool from a registry
 *
 * call_tool never raises a protocol error: failures are returned as text content.
 */
export function createBridgeServer(registry: ToolRegistry): Server {
  const server = new Server(SERVER_INFO, {
    capabilities: {
      tools: {},
    },
  });

  server.setRequestHandler(ListToolsRequestSchema, () => {
    const tools = registry.listTools();
    logger.info('Listing tools', { count: tools.length });
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    logger.info('Calling tool', { tool: name, argumentKeys: Object.keys(args ?? {}) });

    let text: string;
    try {
      text = await registry.executeTool(name, args ?? {});
    } catch (error) {
      logger.error('Error executing tool', { tool: name, error: errorMessage(error) });
      text = `Error: ${errorMessage(error)}`;
    }

    return {
      content: [
        {
          type: 'text',
          text,
        },
      ],
    };
  });

  return server;
}
