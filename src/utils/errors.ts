/**
 * Error handling utilities and error types
 */

export enum ErrorType {
  // Transient errors - safe to retry
  DATABASE_LOCKED = 'DATABASE_LOCKED',

  // Permanent errors - don't retry
  STORAGE_ERROR = 'STORAGE_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  PARSING_ERROR = 'PARSING_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export interface ErrorDetails {
  type: ErrorType;
  message: string;
  originalError?: unknown;
  context?: Record<string, unknown>;
  retryable: boolean;
  code?: string;
}

export class AppError extends Error {
  public readonly type: ErrorType;
  public readonly retryable: boolean;
  public readonly context?: Record<string, unknown>;
  public readonly code?: string;
  public readonly originalError?: unknown;

  constructor(details: ErrorDetails) {
    super(details.message);
    this.name = 'AppError';
    this.type = details.type;
    this.retryable = details.retryable;
    this.context = details.context;
    this.code = details.code;
    this.originalError = details.originalError;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Classify an error and create an AppError
 */
export function classifyError(error: unknown, context?: Record<string, unknown>): AppError {
  // If it's already an AppError, return it
  if (error instanceof AppError) {
    return error;
  }

  const code = errorCode(error);
  const message = errorMessage(error);

  // SQLite errors (better-sqlite3 reports them as SqliteError with a SQLITE_* code)
  if (code === 'SQLITE_BUSY' || code === 'SQLITE_LOCKED') {
    return new AppError({
      type: ErrorType.DATABASE_LOCKED,
      message: `Database is locked: ${message}`,
      retryable: true,
      code,
      context,
      originalError: error,
    });
  }

  if (code?.startsWith('SQLITE_')) {
    return new AppError({
      type: ErrorType.STORAGE_ERROR,
      message: `Database error: ${message}`,
      retryable: false,
      code,
      context,
      originalError: error,
    });
  }

  // File system errors on the config / rules files
  if (code === 'ENOENT') {
    return new AppError({
      type: ErrorType.NOT_FOUND,
      message,
      retryable: false,
      code,
      context,
      originalError: error,
    });
  }

  if (code === 'EACCES' || code === 'EPERM' || code === 'EISDIR') {
    return new AppError({
      type: ErrorType.CONFIGURATION_ERROR,
      message,
      retryable: false,
      code,
      context,
      originalError: error,
    });
  }

  if (error instanceof SyntaxError) {
    return new AppError({
      type: ErrorType.PARSING_ERROR,
      message,
      retryable: false,
      context,
      originalError: error,
    });
  }

  // Unknown error
  return new AppError({
    type: ErrorType.UNKNOWN_ERROR,
    message: message || 'Unknown error occurred',
    retryable: false,
    code,
    context,
    originalError: error,
  });
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof AppError) {
    const parts = [
      `[${error.type}] ${error.message}`,
      error.context ? `Context: ${JSON.stringify(error.context)}` : '',
      error.code ? `Code ${error.code}` : '',
    ].filter(Boolean);
    return parts.join(' | ');
  }

  return errorMessage(error);
}
