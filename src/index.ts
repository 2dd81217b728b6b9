#!/usr/bin/env node

/**
 * Container Tool Bridge
 *
 * MCP stdio server exposing configured tools to a coding agent. Command tools
 * run inside the project's sandbox container; mcp_server tools are proxied to
 * remote JSON-RPC tool servers.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/index.js';
import { loadToolEntries } from './config/loader.js';
import { SandboxExecutor } from './executors/docker.js';
import { ToolRegistry, type BridgeContext } from './services/tools/registry.js';
import { createBridgeServer } from './server.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

/**
 * Build the startup context and a loaded registry
 */
async function initializeBridge(): Promise<ToolRegistry> {
  const config = loadConfig();
  logger.info('Initialized for project', { project: config.project });

  const context: BridgeContext = {
    config,
    sandbox: new SandboxExecutor({
      project: config.project,
      containerTemplate: config.containerTemplate,
      siteLabel: config.siteLabel,
      dockerPath: config.dockerPath,
      maxBuffer: config.maxBufferKb * 1024,
    }),
  };

  const registry = new ToolRegistry(context);
  const count = await registry.load(await loadToolEntries(config.toolsConfigDir));
  logger.info('Bridge initialized', { tools: count });

  if (count === 0) {
    logger.warn('No tools loaded! Check the tools config directory.', { dir: config.toolsConfigDir });
  }

  return registry;
}

async function main(): Promise<void> {
  logger.info('Starting container tool bridge');
  const registry = await initializeBridge();
  const server = createBridgeServer(registry);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Container tool bridge running on stdio');
}

main().catch((error: unknown) => {
  logger.error('Fatal error', { error: errorMessage(error) });
  process.exit(1);
});
