/**
 * Failure kinds raised inside the bridge
 *
 * None of these may reach the MCP transport as an exception: executors and
 * the registry turn them into text results.
 */
export type BridgeErrorKind =
  | 'InvalidCommand'
  | 'DangerousCharacter'
  | 'PermissionDenied'
  | 'MissingArgument'
  | 'ValidationFailed'
  | 'DisallowedCommand'
  | 'ExecutionError'
  | 'TransportError'
  | 'ConfigurationError';

/**
 * Base class for all bridge errors
 */
export class BridgeError extends Error {
  readonly kind: BridgeErrorKind;

  constructor(kind: BridgeErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.kind = kind;
    this.name = kind;
  }
}

/** argv vector is not a non-empty list of strings */
export class InvalidCommandError extends BridgeError {
  constructor(message: string) {
    super('InvalidCommand', message);
  }
}

/** Injection-risk character in a guarded argv position */
export class DangerousCharacterError extends BridgeError {
  readonly position: number;

  constructor(position: number) {
    super('DangerousCharacter', `Dangerous character in argument ${String(position)}`);
    this.position = position;
  }
}

/** Target container belongs to another project */
export class PermissionDeniedError extends BridgeError {
  constructor(message: string) {
    super('PermissionDenied', message);
  }
}

/** Template placeholder without a value */
export class MissingArgumentError extends BridgeError {
  readonly argument: string;

  constructor(argument: string) {
    super('MissingArgument', `Missing required argument '${argument}'`);
    this.argument = argument;
  }
}

/** A validation rule pattern matched */
export class ValidationFailedError extends BridgeError {
  constructor(message: string) {
    super('ValidationFailed', message);
  }
}

/** `command` argument is on the tool's blacklist */
export class DisallowedCommandError extends BridgeError {
  constructor(command: string) {
    super('DisallowedCommand', `Command '${command}' is not allowed`);
  }
}

/** Subprocess could not be run */
export class ExecutionError extends BridgeError {
  constructor(message: string, options?: ErrorOptions) {
    super('ExecutionError', message, options);
  }
}

/** HTTP failure or timeout talking to a remote tool server */
export class TransportError extends BridgeError {
  readonly timedOut: boolean;

  constructor(message: string, timedOut = false, options?: ErrorOptions) {
    super('TransportError', message, options);
    this.timedOut = timedOut;
  }
}

/** Malformed or incomplete configuration */
export class ConfigurationError extends BridgeError {
  constructor(message: string) {
    super('ConfigurationError', message);
  }
}

/**
 * Normalize anything thrown into a message
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
