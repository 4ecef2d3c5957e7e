/**
 * Structured error types for clipkeep.
 *
 * ClipkeepError carries an error code, severity and recovery hint so the
 * monitor loop can decide whether to skip a capture or surface a failure.
 */

// ─── Error Codes ───

export enum ErrorCode {
  // Capture pipeline
  CAPTURE_ERROR = 'CAPTURE_ERROR',
  CLASSIFICATION_DEGRADED = 'CLASSIFICATION_DEGRADED',

  // Storage
  STORAGE_IO_ERROR = 'STORAGE_IO_ERROR',
  INTEGRITY_VIOLATION = 'INTEGRITY_VIOLATION',
  DB_CONNECTION_ERROR = 'DB_CONNECTION_ERROR',
  DB_MIGRATION_ERROR = 'DB_MIGRATION_ERROR',

  // File System
  FS_READ_ERROR = 'FS_READ_ERROR',
  FS_WRITE_ERROR = 'FS_WRITE_ERROR',

  // Config
  CONFIG_LOAD_ERROR = 'CONFIG_LOAD_ERROR',
  CONFIG_SAVE_ERROR = 'CONFIG_SAVE_ERROR',

  // Generic
  INVALID_STATE = 'INVALID_STATE',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

// ─── Severity ───

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'info';

// ─── ClipkeepError ───

export class ClipkeepError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;
  /** How severe is this error */
  public readonly severity: ErrorSeverity;
  /** Whether the monitor can keep polling after this error */
  public readonly recoverable: boolean;
  /** Additional structured context */
  public readonly context?: Record<string, unknown>;
  /** Original error that caused this one */
  public readonly originalError?: Error;
  /** ISO timestamp of when the error occurred */
  public readonly timestamp: string;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      severity?: ErrorSeverity;
      recoverable?: boolean;
      context?: Record<string, unknown>;
      originalError?: Error;
    } = {},
  ) {
    super(message);
    this.name = 'ClipkeepError';
    this.code = code;
    this.severity = options.severity ?? 'error';
    this.recoverable = options.recoverable ?? true;
    this.context = options.context;
    this.originalError = options.originalError;
    this.timestamp = new Date().toISOString();

    if (options.originalError?.stack) {
      this.stack = `${this.stack}\n\nCaused by: ${options.originalError.stack}`;
    }
  }

  /** Serialize for logging or a diagnostics sink */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  static isClipkeepError(value: unknown): value is ClipkeepError {
    return value instanceof ClipkeepError;
  }

  /** Wrap any thrown value into a ClipkeepError */
  static from(
    error: unknown,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
  ): ClipkeepError {
    if (error instanceof ClipkeepError) return error;

    const originalError = error instanceof Error ? error : new Error(String(error));
    return new ClipkeepError(originalError.message, code, {
      originalError,
      context,
    });
  }
}
