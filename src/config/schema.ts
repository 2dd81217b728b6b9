import { z } from 'zod';
import { isValidPattern } from '../services/tools/validation.js';

/**
 * Project binding that disables the container ownership comparison
 */
export const DEFAULT_PROJECT = 'default-project';

/**
 * Bridge environment configuration
 */
export const BridgeConfigSchema = z.object({
  /** Project identifier scoping ownership checks and container names */
  project: z.string().min(1).default(DEFAULT_PROJECT),
  /** Project root as seen by the agent (host / devcontainer side) */
  hostProjectRoot: z.string().startsWith('/', 'Host project root must be an absolute path').default('/workspace'),
  /** Same root as mounted inside the sandbox container */
  containerProjectRoot: z.string().startsWith('/', 'Container project root must be an absolute path').default('/var/www/html'),
  /** Directory holding *.yml tool definition files */
  toolsConfigDir: z.string().min(1),
  /** Container name derived from the project when a tool names none */
  containerTemplate: z.string().min(1).default('ddev-{project}-web'),
  /** Container label holding the owning project's name */
  siteLabel: z.string().regex(/^[a-zA-Z0-9_./-]+$/, 'Site label contains invalid characters').default('com.ddev.site-name'),
  /** Container runtime CLI */
  dockerPath: z.string().regex(/^[a-zA-Z0-9_./-]+$/, 'Docker path contains invalid characters').default('docker'),
  /** Per-stream output cap for sandboxed commands */
  maxBufferKb: z.number().int().positive().default(10240),
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

/**
 * JSON-schema-like description of a tool's arguments
 */
export const InputSchemaSchema = z
  .object({
    type: z.literal('object').default('object'),
    properties: z.record(z.unknown()).default({}),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

export type ToolInputSchema = z.infer<typeof InputSchemaSchema>;

const ValidationRuleSchema = z.object({
  pattern: z.string().refine(isValidPattern, 'Validation rule pattern is not a valid regular expression'),
  message: z.string().optional(),
});

/**
 * Fields shared by every tool type
 */
const ToolBaseSchema = z.object({
  name: z.string().min(1, 'Tool name cannot be empty'),
  enabled: z.boolean().default(false),
  description: z.string().optional(),
  input_schema: InputSchemaSchema.optional(),
});

/**
 * `command`: templated shell command run inside the sandbox container
 */
export const CommandToolSchema = ToolBaseSchema.extend({
  type: z.literal('command'),
  command_template: z.string().min(1, 'command_template is required'),
  container: z.string().min(1).optional(),
  user: z.string().min(1).default('www-data'),
  default_args: z.record(z.unknown()).default({}),
  disallowed_commands: z.array(z.string()).default([]),
  validation_rules: z.array(ValidationRuleSchema).default([]),
  shell: z.string().startsWith('/', 'shell must be an absolute path').default('/bin/bash'),
});

/**
 * Largest timeout in seconds that still fits a timer delay (2^31-1 ms)
 */
export const MAX_TIMEOUT_SECONDS = 2147483;

/**
 * `mcp_server`: JSON-RPC proxy to a remote tool server
 */
export const RemoteToolSchema = ToolBaseSchema.extend({
  type: z.literal('mcp_server'),
  server_url: z.string().url('server_url must be a valid URL'),
  forward_args: z.boolean().default(true),
  /** Seconds */
  timeout: z.number().positive().max(MAX_TIMEOUT_SECONDS).default(10),
  auth_username: z.string().optional(),
  auth_password: z.string().optional(),
  auth_token: z.string().optional(),
  auth_token_basic: z.boolean().default(false),
  verify_ssl: z.boolean().default(true),
  expose_remote_tools: z.boolean().default(false),
  /** Keep the proxy tool registered next to the discovered ones */
  expose_proxy_tool: z.boolean().default(false),
  tool_prefix: z.string().default(''),
  /** Seconds */
  init_timeout: z.number().positive().max(MAX_TIMEOUT_SECONDS).default(30),
});

/**
 * Any tool definition; `type` defaults to `command`
 */
export const ToolDefinitionSchema = z.preprocess(
  (raw) => {
    if (typeof raw === 'object' && raw !== null && !('type' in raw)) {
      return { ...raw, type: 'command' };
    }
    return raw;
  },
  z.discriminatedUnion('type', [CommandToolSchema, RemoteToolSchema])
);

export type CommandToolDefinition = z.infer<typeof CommandToolSchema>;
export type RemoteToolDefinition = z.infer<typeof RemoteToolSchema>;
export type ToolDefinition = z.infer<typeof ToolDefinitionSchema>;

/**
 * Minimal view used to decide whether a raw entry is worth validating
 */
export const ToolHeaderSchema = z.object({
  name: z.string().min(1),
  enabled: z.boolean().default(false),
});

/**
 * Format zod issues as a single line
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
