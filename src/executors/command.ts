import {
  BridgeError,
  DisallowedCommandError,
  MissingArgumentError,
  ValidationFailedError,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { checkRules, compileRules, type CompiledRule, type ValidationRule } from '../services/tools/validation.js';
import { DEFAULT_EXEC_USER, type SandboxExecutor } from './docker.js';
import type { ArgumentCheck, ToolArguments, ToolExecutor } from './types.js';

/**
 * `{name}` placeholder; `{{` and `}}` are literal braces
 */
const TEMPLATE_TOKEN = /\{\{|\}\}|\{(\w+)\}/g;

const UID_DIRECTIVE = 'auto:uid-from-path';
const DEFAULT_UID_PATH = '/var/www/html';

/**
 * Command tool settings
 */
export interface CommandToolOptions {
  commandTemplate: string;
  container?: string;
  user: string;
  defaultArgs: ToolArguments;
  disallowedCommands: string[];
  validationRules: ValidationRule[];
  shell: string;
  /** Path prefix rewriting from the agent's view to the container's */
  pathMapping: { hostRoot: string; containerRoot: string };
}

/**
 * Placeholder names in a template, in order of first appearance
 */
export function extractPlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(TEMPLATE_TOKEN)) {
    if (match[1] !== undefined) names.add(match[1]);
  }
  return [...names];
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value === null || value === undefined) return '';
  return JSON.stringify(value);
}

/**
 * Substitute `{name}` placeholders
 *
 * @throws MissingArgumentError for a placeholder without a key in `args`
 */
export function renderTemplate(template: string, args: ToolArguments): string {
  return template.replace(TEMPLATE_TOKEN, (token, name: string | undefined) => {
    if (name === undefined) return token === '{{' ? '{' : '}';
    if (!Object.hasOwn(args, name)) {
      throw new MissingArgumentError(name);
    }
    return formatValue(args[name]);
  });
}

/**
 * Rewrite host-side paths to their in-container location, recursively
 */
export function normalizePaths(value: unknown, hostRoot: string, containerRoot: string): unknown {
  if (typeof value === 'string') {
    return value.startsWith(`${hostRoot}/`) ? containerRoot + value.slice(hostRoot.length) : value;
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => normalizePaths(item, hostRoot, containerRoot));
  }

  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, normalizePaths(item, hostRoot, containerRoot)])
    );
  }

  return value;
}

/**
 * Path named by an `auto:uid-from-path[:path]` directive, or undefined for a literal user
 */
export function parseUidDirective(user: string): string | undefined {
  if (!user.startsWith(UID_DIRECTIVE)) return undefined;
  const rest = user.slice(UID_DIRECTIVE.length);
  const path = rest.startsWith(':') ? rest.slice(1) : '';
  return path || DEFAULT_UID_PATH;
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Runs a templated shell command inside the sandbox container
 */
export class CommandToolExecutor implements ToolExecutor {
  readonly kind = 'command';

  private readonly sandbox: SandboxExecutor;
  private readonly options: CommandToolOptions;
  private readonly rules: CompiledRule[];
  private readonly requiredArgs: string[];

  constructor(sandbox: SandboxExecutor, options: CommandToolOptions) {
    this.sandbox = sandbox;
    this.options = options;
    this.rules = compileRules(options.validationRules);
    this.requiredArgs = extractPlaceholders(options.commandTemplate).filter(
      (name) => !Object.hasOwn(options.defaultArgs, name)
    );
  }

  /**
   * Rules against the raw arguments, then required placeholders
   */
  validate(args: ToolArguments): ArgumentCheck {
    const ruleCheck = checkRules(JSON.stringify(args), this.rules);
    if (!ruleCheck.valid) return ruleCheck;

    const missing = this.requiredArgs.filter((name) => !Object.hasOwn(args, name));
    return missing.length === 0
      ? { valid: true }
      : { valid: false, error: `Missing: ${missing.join(', ')}` };
  }

  /**
   * Resolve the execution user; `auto:uid-from-path` asks the container
   * Never throws: every lookup failure falls back to the default user
   */
  async resolveUser(): Promise<string> {
    const targetPath = parseUidDirective(this.options.user);
    if (targetPath === undefined) return this.options.user;

    try {
      const result = await this.sandbox.execute(
        ['/bin/sh', '-c', `stat -c %u ${shellQuote(targetPath)}`],
        { container: this.options.container, user: 'root' }
      );
      const uid = result.stdout.trim();

      if (result.exitCode === 0 && /^\d+$/.test(uid)) {
        logger.info('Resolved uid from path', { path: targetPath, uid });
        return uid;
      }

      logger.warn('Failed to get uid from path, falling back', {
        path: targetPath,
        stderr: result.stderr.trim(),
        fallback: DEFAULT_EXEC_USER,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error('Error resolving uid from path, falling back', {
        path: targetPath,
        error: message,
        fallback: DEFAULT_EXEC_USER,
      });
    }

    return DEFAULT_EXEC_USER;
  }

  /**
   * Merge, normalize, check and render the command line
   *
   * @throws DisallowedCommandError | MissingArgumentError | ValidationFailedError
   */
  renderCommand(args: ToolArguments): string {
    const { hostRoot, containerRoot } = this.options.pathMapping;
    const mergedArgs: ToolArguments = Object.fromEntries(
      Object.entries({ ...this.options.defaultArgs, ...args }).map(([key, value]) => [
        key,
        normalizePaths(value, hostRoot, containerRoot),
      ])
    );

    const command = mergedArgs.command;
    if (typeof command === 'string' && this.options.disallowedCommands.includes(command)) {
      logger.warn('Blocked disallowed command', { command });
      throw new DisallowedCommandError(command);
    }

    const rendered = renderTemplate(this.options.commandTemplate, mergedArgs);

    // Last line of defense: rules may target characters only present after substitution
    const ruleCheck = checkRules(rendered, this.rules);
    if (!ruleCheck.valid) {
      throw new ValidationFailedError(ruleCheck.error);
    }

    return rendered;
  }

  async execute(args: ToolArguments): Promise<string> {
    const user = await this.resolveUser();

    try {
      const rendered = this.renderCommand(args);
      const result = await this.sandbox.execute([this.options.shell, '-c', rendered], {
        container: this.options.container,
        user,
      });

      if (result.exitCode !== 0) {
        return `Execution failed (code ${String(result.exitCode)})\nStderr: ${result.stderr}`;
      }
      return result.stdout.trim();
    } catch (error) {
      if (error instanceof ValidationFailedError) return `Validation error: ${error.message}`;
      if (error instanceof BridgeError) return `Error: ${error.message}`;
      throw error;
    }
  }
}
