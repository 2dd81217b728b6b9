import { executeFile, type ShellResult } from '../utils/shell.js';
import {
  DangerousCharacterError,
  InvalidCommandError,
  PermissionDeniedError,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { interpolateContainerName } from '../config/index.js';
import { DEFAULT_PROJECT } from '../config/schema.js';

/**
 * SECURITY: characters rejected in argv positions 0 and 1
 *
 * Position 0 is the interpreter and position 1 its flag. Positions 2+ are
 * exempt: by convention they carry one opaque script string that the
 * interpreter receives as a single argument, so operators there are intended.
 */
const DANGEROUS_CHARACTERS = [';', '|', '&', '>', '<', '$', '`', '\n', '\r'];

/**
 * Number of leading argv positions subject to the character check
 */
const GUARDED_POSITIONS = 2;

/**
 * argv tokens included in the exec log line
 */
const LOGGED_TOKENS = 3;

/**
 * Sandbox executor settings
 */
export interface SandboxOptions {
  /** Project binding; `default-project` skips the label comparison */
  project: string;
  /** Container name used when a call names none; may contain `{project}` */
  containerTemplate: string;
  /** Container label holding the owning project's name */
  siteLabel: string;
  /** Container runtime CLI */
  dockerPath: string;
  /** Per-stream output cap in bytes */
  maxBuffer?: number;
}

/**
 * Per-call execution target
 */
export interface SandboxExecOptions {
  container?: string;
  user?: string;
}

export const DEFAULT_EXEC_USER = 'www-data';

/**
 * SECURITY: Validate an argv vector before it reaches the runtime
 *
 * @throws InvalidCommandError if the vector is empty or holds a non-string
 * @throws DangerousCharacterError for injection characters at positions 0-1
 */
export function assertSafeCommand(command: unknown): asserts command is string[] {
  if (!Array.isArray(command) || command.length === 0) {
    throw new InvalidCommandError('Command must be non-empty list');
  }

  const args: unknown[] = command;
  for (const [i, arg] of args.entries()) {
    if (typeof arg !== 'string') {
      throw new InvalidCommandError(`Argument ${String(i)} must be string`);
    }
    if (i < GUARDED_POSITIONS && DANGEROUS_CHARACTERS.some((c) => arg.includes(c))) {
      throw new DangerousCharacterError(i);
    }
  }
}

/**
 * Runs argv vectors inside containers owned by the bound project
 *
 * Ownership is looked up on every call and never cached.
 */
export class SandboxExecutor {
  private readonly options: SandboxOptions;

  constructor(options: SandboxOptions) {
    this.options = options;
  }

  /**
   * Container for a call: the explicit name, else the project's default
   */
  resolveContainer(container?: string): string {
    return container ?? interpolateContainerName(this.options.containerTemplate, this.options.project);
  }

  /**
   * SECURITY: Check the container's site label against the project binding
   *
   * A label that cannot be read is logged and the call proceeds (fail-open,
   * see DESIGN.md).
   *
   * @throws PermissionDeniedError when the label names another project
   */
  async verifyOwnership(container: string): Promise<void> {
    const { dockerPath, siteLabel, project } = this.options;
    let result: ShellResult;

    try {
      result = await executeFile(dockerPath, [
        'inspect',
        '--format',
        `{{index .Config.Labels "${siteLabel}"}}`,
        container,
      ]);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.warn('Container validation error (continuing)', { container, error: message });
      return;
    }

    if (result.exitCode !== 0) {
      logger.warn('Container validation failed, proceeding anyway', {
        container,
        stderr: result.stderr.trim(),
      });
      return;
    }

    const siteName = result.stdout.trim();
    if (project !== DEFAULT_PROJECT && siteName !== project) {
      throw new PermissionDeniedError(
        `Container '${container}' belongs to '${siteName}', not '${project}'`
      );
    }
  }

  /**
   * Execute an argv vector in a sandbox container
   *
   * No shell wraps the runtime call; a non-zero exit is returned, not thrown.
   *
   * @throws InvalidCommandError | DangerousCharacterError before anything runs
   * @throws PermissionDeniedError if the container belongs to another project
   * @throws ExecutionError if the runtime itself could not be run
   */
  async execute(command: unknown, options: SandboxExecOptions = {}): Promise<ShellResult> {
    assertSafeCommand(command);

    const container = this.resolveContainer(options.container);
    const user = options.user ?? DEFAULT_EXEC_USER;

    await this.verifyOwnership(container);

    logger.info('EXEC', {
      container,
      user,
      command: command.slice(0, LOGGED_TOKENS).join(' '),
    });

    try {
      return await executeFile(
        this.options.dockerPath,
        ['exec', '-u', user, container, ...command],
        { maxBuffer: this.options.maxBuffer }
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error('Execution error', { container, user, error: message });
      throw error;
    }
  }
}
