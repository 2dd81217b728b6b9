import { Agent, fetch } from 'undici';
import { z } from 'zod';
import { TransportError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { ARGUMENTS_OK, type ArgumentCheck, type ExecutionContext, type ToolArguments, type ToolExecutor } from './types.js';

/**
 * Remote proxy settings
 */
export interface RemoteProxyOptions {
  serverUrl: string;
  /** Legacy mode: send the raw arguments as the request body */
  forwardArgs: boolean;
  /** Seconds, applied to proxied calls and discovery alike */
  timeout: number;
  authUsername?: string;
  authPassword?: string;
  authToken?: string;
  /** Deliver the token base64-encoded as Basic credentials */
  authTokenBasic: boolean;
  verifySsl: boolean;
}

/**
 * JSON-RPC 2.0 request envelope
 */
export interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: string;
  params: unknown;
  id: number;
}

/**
 * Tool advertised by a remote server's `tools/list`
 */
export const RemoteToolSummarySchema = z
  .object({
    name: z.string().min(1),
    description: z.string().nullish(),
    inputSchema: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export type RemoteToolSummary = z.infer<typeof RemoteToolSummarySchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringify(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Authorization header for the configured mode; token forms win over username/password
 */
export function buildAuthHeaders(options: RemoteProxyOptions): Record<string, string> {
  if (options.authToken) {
    if (options.authTokenBasic) {
      return { Authorization: `Basic ${Buffer.from(options.authToken).toString('base64')}` };
    }
    return { Authorization: `Bearer ${options.authToken}` };
  }

  if (options.authUsername && options.authPassword) {
    const credentials = Buffer.from(`${options.authUsername}:${options.authPassword}`).toString('base64');
    return { Authorization: `Basic ${credentials}` };
  }

  return {};
}

/**
 * Choose the request shape for a call
 *
 * 1. known remote tool name: `tools/call` envelope
 * 2. `method` in arguments: JSON-RPC passthrough
 * 3. otherwise the raw arguments (or `{}` when forwarding is off)
 */
export function buildPayload(
  args: ToolArguments,
  forwardArgs: boolean,
  toolName?: string
): JsonRpcRequest | ToolArguments {
  if (toolName) {
    return {
      jsonrpc: '2.0',
      method: 'tools/call',
      params: { name: toolName, arguments: args },
      id: 1,
    };
  }

  const method = args.method;
  if (typeof method === 'string' && method.length > 0) {
    return {
      jsonrpc: '2.0',
      method,
      params: args.params ?? {},
      id: 1,
    };
  }

  return forwardArgs ? args : {};
}

/**
 * Pull the text out of a response body
 *
 * Order: JSON-RPC `result`, first MCP content block's text, `error`, raw body.
 */
export function extractResult(body: unknown): string {
  if (!isRecord(body)) return stringify(body);

  if ('result' in body) {
    return stringify(body.result ?? '');
  }

  const content = body.content;
  if (Array.isArray(content) && content.length > 0) {
    const first: unknown = content[0];
    if (isRecord(first) && typeof first.text === 'string') return first.text;
    return stringify(body);
  }

  if ('error' in body) {
    const error = body.error;
    const message = isRecord(error) && typeof error.message === 'string' ? error.message : stringify(error);
    return `RPC Error: ${message}`;
  }

  return stringify(body);
}

/**
 * Tool list from any of the accepted `tools/list` response shapes
 */
export function extractToolList(body: unknown): unknown[] | undefined {
  if (Array.isArray(body)) return body;
  if (!isRecord(body)) return undefined;

  if (Array.isArray(body.tools)) return body.tools;
  if (isRecord(body.result) && Array.isArray(body.result.tools)) return body.result.tools;
  return [];
}

/**
 * Proxies tool calls to a remote tool server over HTTP JSON-RPC
 */
export class RemoteProxyExecutor implements ToolExecutor {
  readonly kind = 'remote_proxy';

  private readonly options: RemoteProxyOptions;
  private readonly headers: Record<string, string>;
  private readonly dispatcher: Agent | undefined;

  constructor(options: RemoteProxyOptions) {
    this.options = options;
    this.headers = {
      'Content-Type': 'application/json',
      Accept: 'application/json, text/event-stream',
      ...buildAuthHeaders(options),
    };
    this.dispatcher = options.verifySsl
      ? undefined
      : new Agent({ connect: { rejectUnauthorized: false } });
  }

  /**
   * Remote servers validate their own arguments
   */
  validate(_args: ToolArguments): ArgumentCheck {
    return ARGUMENTS_OK;
  }

  /**
   * POST a JSON body and parse the reply (raw text when it is not JSON)
   *
   * @throws TransportError on timeout, network failure, or non-2xx status
   */
  private async post(payload: unknown): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => { controller.abort(); }, this.options.timeout * 1000);

    try {
      const response = await fetch(this.options.serverUrl, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new TransportError(
          `HTTP ${String(response.status)} ${response.statusText} from ${this.options.serverUrl}`
        );
      }

      const text = await response.text();
      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch {
        return text;
      }
    } catch (error) {
      if (error instanceof TransportError) throw error;
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`Request timeout after ${String(this.options.timeout)}s`, true, { cause: error });
      }
      if (error instanceof TypeError) {
        const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
        throw new TransportError(`${error.message}${cause}`, false, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async execute(args: ToolArguments, context: ExecutionContext = {}): Promise<string> {
    const payload = buildPayload(args, this.options.forwardArgs, context.remoteToolName);

    try {
      const body = await this.post(payload);
      return extractResult(body);
    } catch (error) {
      if (error instanceof TransportError) {
        return error.timedOut ? error.message : `HTTP error: ${error.message}`;
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error('Remote proxy error', { serverUrl: this.options.serverUrl, error: message });
      return `Error: ${message}`;
    }
  }

  /**
   * Enumerate the remote server's tools with `tools/list`
   * Never throws; any failure is logged and yields an empty list
   */
  async fetchRemoteTools(): Promise<RemoteToolSummary[]> {
    const { serverUrl, timeout } = this.options;
    logger.info('Fetching remote tools', { serverUrl, timeout });

    try {
      const body = await this.post({ jsonrpc: '2.0', method: 'tools/list', params: {}, id: 1 });
      const entries = extractToolList(body);

      if (entries === undefined) {
        logger.warn('Unexpected tools/list response format', { serverUrl });
        return [];
      }

      const tools: RemoteToolSummary[] = [];
      for (const entry of entries) {
        const parsed = RemoteToolSummarySchema.safeParse(entry);
        if (parsed.success) {
          tools.push(parsed.data);
        } else {
          logger.debug('Skipping malformed remote tool entry', { serverUrl });
        }
      }

      logger.info('Fetched remote tools', { serverUrl, count: tools.length });
      return tools;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error('Failed to fetch remote tools', { serverUrl, error: message });
      return [];
    }
  }
}
