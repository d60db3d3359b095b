/**
 * Error types shared across the cleanup run.
 *
 * Fatal errors (configuration, lock contention) stop the run before any deletion.
 * Everything else is handled per resource and logged.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class LockContentionError extends Error {
  constructor(
    readonly lockPath: string,
    readonly holderPid?: number
  ) {
    super(`Another instance is already running. Lock file: ${lockPath}`);
    this.name = 'LockContentionError';
  }
}

export class CallTimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'CallTimeoutError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
