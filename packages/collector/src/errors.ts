/**
 * Error codes for the collection engine.
 *
 * Resource-scoped errors (configuration, lock, store) abort a run.
 * Batch-scoped errors (process, output) only change the state of the
 * entities in that batch.
 */
export enum ErrorCode {
  CONFIG_MUTATION_FAILED = 'E1000',
  CONFIG_RESTORE_FAILED = 'E1001',

  PROCESS_TIMEOUT = 'E2000',
  PROCESS_CRASHED = 'E2001',

  OUTPUT_PARSE_FAILED = 'E3000',

  RUN_LOCK_HELD = 'E4000',
  STORE_FAILED = 'E4001',
  STORE_INVALID_TRANSITION = 'E4002',

  SETTINGS_INVALID = 'E9000',
}

export class CollectorError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CollectorError';
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * The crawler's configuration artifact could not be read, backed up or
 * written. Raised before any process launch.
 */
export class ConfigMutationError extends CollectorError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, ErrorCode.CONFIG_MUTATION_FAILED, context, options);
    this.name = 'ConfigMutationError';
  }
}

/**
 * The configuration artifact could not be returned to its pre-run bytes.
 * Every later run is unsafe until the snapshot is restored.
 */
export class ConfigRestoreError extends CollectorError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, ErrorCode.CONFIG_RESTORE_FAILED, context, options);
    this.name = 'ConfigRestoreError';
  }
}

export class ExternalProcessTimeout extends CollectorError {
  readonly timeoutSeconds: number;

  constructor(timeoutSeconds: number, context?: Record<string, unknown>) {
    super(
      `Crawler exceeded its ${timeoutSeconds}s timeout and was terminated`,
      ErrorCode.PROCESS_TIMEOUT,
      context,
    );
    this.name = 'ExternalProcessTimeout';
    this.timeoutSeconds = timeoutSeconds;
  }
}

export class ExternalProcessCrash extends CollectorError {
  readonly exitCode: number | null;
  readonly diagnostic: string;
  readonly signal: string | null;

  constructor(
    exitCode: number | null,
    diagnostic: string,
    context?: Record<string, unknown>,
    signal: string | null = null,
  ) {
    let prefix = `Crawler exited with code ${exitCode}`;
    if (exitCode === null) {
      prefix = signal
        ? `Crawler was killed by ${signal}`
        : 'Crawler could not be launched';
    }
    super(
      diagnostic ? `${prefix}: ${diagnostic}` : prefix,
      ErrorCode.PROCESS_CRASHED,
      context,
    );
    this.name = 'ExternalProcessCrash';
    this.exitCode = exitCode;
    this.diagnostic = diagnostic;
    this.signal = signal;
  }
}

export class OutputParseError extends CollectorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.OUTPUT_PARSE_FAILED, context);
    this.name = 'OutputParseError';
  }
}

export class RunLockError extends CollectorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.RUN_LOCK_HELD, context);
    this.name = 'RunLockError';
  }
}

export class ProgressStoreError extends CollectorError {
  constructor(
    message: string,
    code: ErrorCode.STORE_FAILED | ErrorCode.STORE_INVALID_TRANSITION = ErrorCode.STORE_FAILED,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, code, context, options);
    this.name = 'ProgressStoreError';
  }
}

export class SettingsError extends CollectorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.SETTINGS_INVALID, context);
    this.name = 'SettingsError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
