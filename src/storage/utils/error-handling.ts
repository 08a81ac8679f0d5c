/**
 * Error handling utilities for the expiring store
 */

/**
 * Consistent storage error class for every failure the store raises
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public code: string,
    public adapter?: string,
    public operation?: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

/**
 * The database file could not be opened
 */
export class ConnectionError extends StorageError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONNECTION_ERROR', undefined, undefined, cause);
    this.name = 'ConnectionError';
  }
}

export class ValidationError extends StorageError {
  constructor(message: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', undefined, undefined, cause);
    this.name = 'ValidationError';
  }
}

export class SerializationError extends StorageError {
  constructor(message: string, cause?: Error) {
    super(message, 'SERIALIZATION_ERROR', undefined, undefined, cause);
    this.name = 'SerializationError';
  }
}

/**
 * Raised by `get`, `delete` and `pop` when the key is absent
 */
export class NotFoundError extends StorageError {
  constructor(
    public readonly key: string,
    cause?: Error
  ) {
    super(`Key not found: ${key}`, 'NOT_FOUND', undefined, undefined, cause);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends StorageError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFLICT', undefined, undefined, cause);
    this.name = 'ConflictError';
  }
}

export class QuotaExceededError extends StorageError {
  constructor(message: string, cause?: Error) {
    super(message, 'QUOTA_EXCEEDED', undefined, undefined, cause);
    this.name = 'QuotaExceededError';
  }
}

export class InvalidIdentifierError extends StorageError {
  constructor(message: string) {
    super(message, 'INVALID_IDENTIFIER');
    this.name = 'InvalidIdentifierError';
  }
}

/**
 * The file carries another application's identifier
 */
export class IncompatibleFileError extends StorageError {
  constructor(public readonly applicationId: number) {
    super(
      `Refusing to open database with foreign application id ${applicationId}`,
      'INCOMPATIBLE_FILE'
    );
    this.name = 'IncompatibleFileError';
  }
}

/**
 * The file was written by a newer schema than this build understands
 */
export class UnsupportedSchemaError extends StorageError {
  constructor(
    public readonly version: number,
    public readonly supported: number
  ) {
    super(
      `Schema version ${version} is newer than the supported version ${supported}`,
      'UNSUPPORTED_SCHEMA'
    );
    this.name = 'UnsupportedSchemaError';
  }
}

export class ReadOnlyViolationError extends StorageError {
  constructor(operation: string) {
    super(
      `Cannot ${operation}: store was opened read-only`,
      'READ_ONLY',
      undefined,
      operation
    );
    this.name = 'ReadOnlyViolationError';
  }
}

export class DirectoryNotFoundError extends StorageError {
  constructor(public readonly directory: string) {
    super(`Directory does not exist: ${directory}`, 'DIRECTORY_NOT_FOUND');
    this.name = 'DirectoryNotFoundError';
  }
}

export class ReentrancyError extends StorageError {
  constructor(component: string) {
    super(
      `${component} cannot be entered more than once at a time`,
      'REENTRANCY'
    );
    this.name = 'ReentrancyError';
  }
}

/**
 * SQLite result codes the mapper distinguishes.
 * better-sqlite3 reports extended codes (SQLITE_IOERR_WRITE, ...) so
 * matching is done on the primary code prefix.
 */
export const ERROR_CODES = {
  SQLITE_BUSY: 'SQLITE_BUSY',
  SQLITE_LOCKED: 'SQLITE_LOCKED',
  SQLITE_READONLY: 'SQLITE_READONLY',
  SQLITE_IOERR: 'SQLITE_IOERR',
  SQLITE_CORRUPT: 'SQLITE_CORRUPT',
  SQLITE_FULL: 'SQLITE_FULL',
  SQLITE_NOTADB: 'SQLITE_NOTADB'
} as const;

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function primaryCode(code: string | undefined): string | undefined {
  if (!code) return undefined;
  return Object.values(ERROR_CODES).find(
    (primary) => code === primary || code.startsWith(`${primary}_`)
  );
}

/**
 * Error mapper for converting engine errors to storage errors
 */
export class ErrorMapper {
  /**
   * Map SQLite errors to storage errors
   */
  static mapSQLiteError(thrown: unknown): StorageError {
    if (thrown instanceof StorageError) {
      return thrown;
    }

    const error = toError(thrown);
    const code = errorCode(error);
    const message = error.message || 'SQLite error';

    switch (primaryCode(code)) {
      case ERROR_CODES.SQLITE_BUSY:
      case ERROR_CODES.SQLITE_LOCKED:
        return new ConflictError(`Database locked: ${message}`, error);

      case ERROR_CODES.SQLITE_READONLY:
        return new StorageError(
          `Database is read-only: ${message}`,
          'READ_ONLY',
          undefined,
          undefined,
          error
        );

      case ERROR_CODES.SQLITE_IOERR:
        return new StorageError(
          `I/O error: ${message}`,
          'IO_ERROR',
          undefined,
          undefined,
          error
        );

      case ERROR_CODES.SQLITE_CORRUPT:
      case ERROR_CODES.SQLITE_NOTADB:
        return new StorageError(
          `Database corrupted: ${message}`,
          'CORRUPTED',
          undefined,
          undefined,
          error
        );

      case ERROR_CODES.SQLITE_FULL:
        return new QuotaExceededError(`Database full: ${message}`, error);

      default:
        return new StorageError(
          message,
          code ?? 'SQLITE_ERROR',
          undefined,
          undefined,
          error
        );
    }
  }

  /**
   * Map an error and attach the adapter/operation it happened in
   */
  static withContext(
    thrown: unknown,
    adapter: string,
    operation: string
  ): StorageError {
    const mapped = this.mapSQLiteError(thrown);
    mapped.adapter ??= adapter;
    mapped.operation ??= operation;
    return mapped;
  }
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof StorageError) {
    const retryableCodes = ['CONNECTION_ERROR', 'CONFLICT', 'IO_ERROR'];
    return retryableCodes.includes(error.code);
  }

  const message = error.message.toLowerCase();
  return (
    message.includes('timeout') ||
    message.includes('lock') ||
    message.includes('busy')
  );
}
