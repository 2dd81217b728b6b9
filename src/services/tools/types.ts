import type { ToolInputSchema } from '../../config/schema.js';

/**
 * Tool as advertised to the agent (MCP tool shape)
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

/**
 * Registered tool name and what it runs
 *
 * Discovered remote tools share one executor; `remoteName` and `prefix`
 * record how the local name maps back to the remote catalog.
 */
export interface ToolBinding {
  executorId: string;
  descriptor: ToolDescriptor;
  remoteName?: string;
  prefix?: string;
}

/**
 * Remote catalog discovery progress for one proxy tool
 */
export type DiscoveryState =
  | { status: 'idle' }
  | { status: 'fetching' }
  | { status: 'expanded'; count: number }
  | { status: 'failed'; reason: string };
