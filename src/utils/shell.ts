import { execFile, type ExecFileOptions } from 'child_process';
import { promisify } from 'util';
import { ExecutionError } from './errors.js';

const execFileAsync = promisify(execFile);

/**
 * Result from a process execution
 */
export interface ShellResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Options for a single process execution
 */
export interface ShellOptions {
  /** Maximum bytes buffered per stream */
  maxBuffer?: number;
}

const DEFAULT_MAX_BUFFER = 10 * 1024 * 1024;

/**
 * Shape of the error execFile rejects with
 */
interface ExecFailure extends Error {
  code?: number | string;
  stdout?: string;
  stderr?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error && 'code' in error;
}

/**
 * Run a binary directly with an argument vector; no timeout is applied
 *
 * SECURITY: shell is always false, so arguments are never re-interpreted by
 * an outer shell. Non-zero exits are returned as results; failures to spawn
 * the process at all (missing binary, buffer overflow, kill) throw.
 *
 * @throws ExecutionError when the process could not run to completion
 */
export async function executeFile(
  file: string,
  args: readonly string[],
  options: ShellOptions = {}
): Promise<ShellResult> {
  const execOptions: ExecFileOptions = {
    maxBuffer: options.maxBuffer ?? DEFAULT_MAX_BUFFER,
    shell: false, // CRITICAL: Never use shell interpolation
    windowsHide: true,
    encoding: 'utf8',
  };

  try {
    const result = await execFileAsync(file, [...args], execOptions);
    return {
      stdout: String(result.stdout),
      stderr: String(result.stderr),
      exitCode: 0,
    };
  } catch (error: unknown) {
    // Numeric code: the process ran and exited non-zero
    if (isExecFailure(error) && typeof error.code === 'number') {
      return {
        stdout: error.stdout ?? '',
        stderr: error.stderr ?? '',
        exitCode: error.code,
      };
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new ExecutionError(`Failed to run ${file}: ${message}`, { cause: error });
  }
}
