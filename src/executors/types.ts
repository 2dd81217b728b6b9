import type { RuleCheckResult } from '../services/tools/validation.js';

/**
 * Arguments as received from the agent
 */
export type ToolArguments = Record<string, unknown>;

/**
 * Outcome of pre-call argument validation
 */
export type ArgumentCheck = RuleCheckResult;

/**
 * Per-call details the registry knows about the invoked tool
 */
export interface ExecutionContext {
  /** Name of the tool on the remote server, for discovered remote tools */
  remoteToolName?: string;
}

/**
 * Execution strategy bound to one or more tool names
 *
 * `execute` resolves to text for every expected failure; a rejection is
 * reserved for faults the registry converts at the dispatch boundary.
 */
export interface ToolExecutor {
  readonly kind: 'command' | 'remote_proxy';
  validate(args: ToolArguments): ArgumentCheck;
  execute(args: ToolArguments, context?: ExecutionContext): Promise<string>;
}

export const ARGUMENTS_OK: ArgumentCheck = { valid: true };
