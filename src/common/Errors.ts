/**
 * Custom error types for the store.
 *
 * Missing keys are never errors: lookups return null and mutations on
 * absent keys are no-ops. These types cover the conditions that do throw.
 */

export class StorageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StorageError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidTtlError extends StorageError {
  constructor(ttlMinutes: number) {
    super(`Invalid TTL: ${ttlMinutes} (must be a finite number of minutes)`);
    this.name = 'InvalidTtlError';
  }
}

export class StoreFileError extends StorageError {
  public readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write store file ${filePath}: ${reason}`, { cause });
    this.name = 'StoreFileError';
    this.filePath = filePath;
  }
}

export class ConfigError extends StorageError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
