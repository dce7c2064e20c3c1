/**
 * Custom error class for CLI errors with exit codes
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
    public readonly details?: string,
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

/**
 * Error types with specific exit codes
 */
export const ErrorCodes = {
  GENERAL_ERROR: 1,
  CONFIGURATION_ERROR: 6,
  INTERNAL_ERROR: 70,
} as const;

export type FailureKind =
  | 'config'
  | 'driver'
  | 'auth'
  | 'transient-api'
  | 'registration-timeout'
  | 'invariant';

/**
 * Invalid or missing configuration. Only raised at startup.
 */
export class ConfigError extends CLIError {
  readonly kind = 'config' as const;

  constructor(message: string, details?: string) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * A hypervisor command failed or one of its waits ran out of time.
 */
export class DriverFailure extends Error {
  readonly kind = 'driver' as const;
  readonly operation: string;
  readonly vmName: string | undefined;
  readonly exitCode: number | null;
  readonly timedOut: boolean;

  constructor(
    message: string,
    options: {
      operation: string;
      vmName?: string;
      exitCode?: number | null;
      timedOut?: boolean;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = 'DriverFailure';
    this.operation = options.operation;
    this.vmName = options.vmName;
    this.exitCode = options.exitCode ?? null;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * The API rejected our credentials (401/403, revoked app, clock skew on the JWT).
 */
export class AuthFailure extends Error {
  readonly kind = 'auth' as const;

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AuthFailure';
  }
}

/**
 * Network or 5xx failure that outlived the client's retries.
 */
export class TransientAPIFailure extends Error {
  readonly kind = 'transient-api' as const;

  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TransientAPIFailure';
  }
}

/**
 * The VM booted but its runner never showed up online.
 */
export class RegistrationTimeout extends Error {
  readonly kind = 'registration-timeout' as const;

  constructor(
    public readonly runnerName: string,
    public readonly timeoutMs: number,
  ) {
    super(`Runner ${runnerName} did not come online within ${Math.round(timeoutMs / 1000)}s`);
    this.name = 'RegistrationTimeout';
  }
}

/**
 * Internal bookkeeping is corrupt. The process cannot continue safely.
 */
export class InvariantViolation extends Error {
  readonly kind = 'invariant' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
  }
}

export type RunnerError =
  | ConfigError
  | DriverFailure
  | AuthFailure
  | TransientAPIFailure
  | RegistrationTimeout
  | InvariantViolation;

export function isRunnerError(error: unknown): error is RunnerError {
  return (
    error instanceof ConfigError ||
    error instanceof DriverFailure ||
    error instanceof AuthFailure ||
    error instanceof TransientAPIFailure ||
    error instanceof RegistrationTimeout ||
    error instanceof InvariantViolation
  );
}

export function failureKind(error: unknown): FailureKind | 'unknown' {
  return isRunnerError(error) ? error.kind : 'unknown';
}

/**
 * Read the HTTP status off an Octokit RequestError (or anything shaped like one)
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === 'number' ? status : undefined;
}

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unknown error occurred';
}
