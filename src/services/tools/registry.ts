import {
  InputSchemaSchema,
  ToolDefinitionSchema,
  ToolHeaderSchema,
  formatIssues,
  type BridgeConfig,
  type CommandToolDefinition,
  type RemoteToolDefinition,
  type ToolDefinition,
  type ToolInputSchema,
} from '../../config/schema.js';
import { interpolateContainerName } from '../../config/index.js';
import type { RawToolEntry } from '../../config/loader.js';
import { CommandToolExecutor } from '../../executors/command.js';
import type { SandboxExecutor } from '../../executors/docker.js';
import { RemoteProxyExecutor, type RemoteToolSummary } from '../../executors/remote.js';
import type { ToolArguments, ToolExecutor } from '../../executors/types.js';
import { errorMessage } from '../../utils/errors.js';
import { auditToolCall, logger } from '../../utils/logger.js';
import { withTimeout } from '../../utils/timeout.js';
import type { DiscoveryState, ToolBinding, ToolDescriptor } from './types.js';

/**
 * Everything a registry needs, built once at startup
 */
export interface BridgeContext {
  config: BridgeConfig;
  sandbox: SandboxExecutor;
}

const DEFAULT_DESCRIPTION = 'Tool with no description';

function emptyInputSchema(): ToolInputSchema {
  return { type: 'object', properties: {}, required: [] };
}

/**
 * Binds tool names to executors and dispatches calls
 *
 * `executeTool` is total: every outcome, including unknown tools and
 * executor faults, comes back as text.
 */
export class ToolRegistry {
  private readonly context: BridgeContext;
  /** executor id -> executor; one executor may serve many names */
  private readonly executors = new Map<string, ToolExecutor>();
  /** tool name -> binding */
  private readonly bindings = new Map<string, ToolBinding>();
  /** proxy tool name -> discovery progress */
  private readonly discovery = new Map<string, DiscoveryState>();

  constructor(context: BridgeContext) {
    this.context = context;
  }

  /**
   * Register every usable entry; returns the number of tool names added
   * Disabled, duplicate or malformed entries are logged and skipped.
   */
  async load(entries: readonly RawToolEntry[]): Promise<number> {
    let loaded = 0;
    for (const entry of entries) {
      loaded += await this.loadEntry(entry);
    }
    logger.info('Loaded tools', { count: loaded });
    return loaded;
  }

  private async loadEntry(entry: RawToolEntry): Promise<number> {
    const header = ToolHeaderSchema.safeParse(entry.definition);
    if (!header.success) {
      logger.warn('Skipping tool with invalid name or enabled flag', {
        file: entry.source,
        error: formatIssues(header.error),
      });
      return 0;
    }

    const { name, enabled } = header.data;
    if (!enabled) {
      logger.info('Tool disabled', { tool: name });
      return 0;
    }

    if (this.bindings.has(name) || this.executors.has(name)) {
      logger.warn('Duplicate tool name, keeping first definition', { tool: name, file: entry.source });
      return 0;
    }

    const parsed = ToolDefinitionSchema.safeParse(entry.definition);
    if (!parsed.success) {
      logger.warn('Skipping malformed tool definition', {
        tool: name,
        file: entry.source,
        error: formatIssues(parsed.error),
      });
      return 0;
    }

    const definition = parsed.data;

    if (definition.type === 'mcp_server') {
      const executor = this.createRemoteExecutor(definition);
      this.executors.set(definition.name, executor);

      if (definition.expose_remote_tools) {
        let count = await this.expandRemoteTools(definition, executor);
        if (definition.expose_proxy_tool) {
          count += this.bind(definition.name, { executorId: definition.name, descriptor: this.describe(definition) });
        }
        if (count === 0) this.executors.delete(definition.name);
        return count;
      }
    } else {
      this.executors.set(definition.name, this.createCommandExecutor(definition));
    }

    return this.bind(definition.name, { executorId: definition.name, descriptor: this.describe(definition) });
  }

  private createCommandExecutor(definition: CommandToolDefinition): CommandToolExecutor {
    const { config, sandbox } = this.context;
    return new CommandToolExecutor(sandbox, {
      commandTemplate: definition.command_template,
      container: definition.container ? interpolateContainerName(definition.container, config.project) : undefined,
      user: definition.user,
      defaultArgs: definition.default_args,
      disallowedCommands: definition.disallowed_commands,
      validationRules: definition.validation_rules,
      shell: definition.shell,
      pathMapping: {
        hostRoot: config.hostProjectRoot,
        containerRoot: config.containerProjectRoot,
      },
    });
  }

  private createRemoteExecutor(definition: RemoteToolDefinition): RemoteProxyExecutor {
    return new RemoteProxyExecutor({
      serverUrl: definition.server_url,
      forwardArgs: definition.forward_args,
      timeout: definition.timeout,
      authUsername: definition.auth_username,
      authPassword: definition.auth_password,
      authToken: definition.auth_token,
      authTokenBasic: definition.auth_token_basic,
      verifySsl: definition.verify_ssl,
    });
  }

  /**
   * One-shot discovery: idle -> fetching -> expanded | failed, never retried
   */
  private async expandRemoteTools(definition: RemoteToolDefinition, executor: RemoteProxyExecutor): Promise<number> {
    const proxyName = definition.name;
    this.discovery.set(proxyName, { status: 'fetching' });
    logger.info('Fetching remote tools from MCP server', { tool: proxyName });

    let remoteTools: RemoteToolSummary[];
    try {
      remoteTools = await withTimeout(
        executor.fetchRemoteTools(),
        definition.init_timeout * 1000,
        `Remote tool discovery for ${proxyName}`
      );
    } catch (error) {
      const reason = errorMessage(error);
      logger.error('Failed to load remote tools', { tool: proxyName, error: reason });
      this.discovery.set(proxyName, { status: 'failed', reason });
      return 0;
    }

    if (remoteTools.length === 0) {
      logger.warn('No tools fetched', { tool: proxyName });
      this.discovery.set(proxyName, { status: 'failed', reason: 'No tools fetched' });
      return 0;
    }

    const prefix = definition.tool_prefix;
    let count = 0;
    for (const remote of remoteTools) {
      const localName = `${prefix}${remote.name}`;
      const schema = InputSchemaSchema.safeParse(remote.inputSchema ?? {});
      count += this.bind(localName, {
        executorId: proxyName,
        descriptor: {
          name: localName,
          description: remote.description ?? '',
          inputSchema: schema.success ? schema.data : emptyInputSchema(),
        },
        remoteName: remote.name,
        prefix,
      });
    }

    logger.info('Loaded tools from remote MCP server', { tool: proxyName, count });
    this.discovery.set(proxyName, { status: 'expanded', count });
    return count;
  }

  private bind(name: string, binding: ToolBinding): number {
    if (this.bindings.has(name)) {
      logger.warn('Duplicate tool name, keeping first definition', { tool: name });
      return 0;
    }
    this.bindings.set(name, binding);
    logger.info('Loaded tool', binding.remoteName ? { tool: name, remoteName: binding.remoteName } : { tool: name });
    return 1;
  }

  private describe(definition: ToolDefinition): ToolDescriptor {
    return {
      name: definition.name,
      description: definition.description ?? DEFAULT_DESCRIPTION,
      inputSchema: definition.input_schema ?? emptyInputSchema(),
    };
  }

  get size(): number {
    return this.bindings.size;
  }

  /**
   * Descriptor for one tool, or undefined when not registered
   */
  getToolDefinition(name: string): ToolDescriptor | undefined {
    return this.bindings.get(name)?.descriptor;
  }

  getBinding(name: string): ToolBinding | undefined {
    return this.bindings.get(name);
  }

  listTools(): ToolDescriptor[] {
    return [...this.bindings.values()].map((binding) => binding.descriptor);
  }

  getDiscoveryState(proxyName: string): DiscoveryState {
    return this.discovery.get(proxyName) ?? { status: 'idle' };
  }

  /**
   * Dispatch a call; always resolves to text
   */
  async executeTool(name: string, args: ToolArguments = {}): Promise<string> {
    const startedAt = Date.now();
    const audit = (outcome: Parameters<typeof auditToolCall>[0]['outcome']): void => {
      auditToolCall({ tool: name, argumentKeys: Object.keys(args), outcome, durationMs: Date.now() - startedAt });
    };

    const binding = this.bindings.get(name);
    const executor = binding ? this.executors.get(binding.executorId) : undefined;
    if (!binding || !executor) {
      logger.warn('Unknown tool requested', { tool: name });
      audit('unknown_tool');
      return `Error: Unknown tool '${name}'`;
    }

    try {
      const check = executor.validate(args);
      if (!check.valid) {
        audit('invalid_arguments');
        return `Validation error: ${check.error}`;
      }

      const result = await executor.execute(args, { remoteToolName: binding.remoteName });
      audit('ok');
      return result;
    } catch (error) {
      const message = errorMessage(error);
      logger.error('Error executing tool', { tool: name, error: message });
      audit('error');
      return `Error: ${message}`;
    }
  }
}
