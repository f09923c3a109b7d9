/**
 * Base error class for all library errors.
 * Provides an optional error code for programmatic handling.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/**
 * Error thrown when a scanned directory does not exist
 * (or the path names something that is not a directory).
 */
export class NotFoundError extends AppError {
  constructor(
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Directory not found: ${path}`, 'NOT_FOUND', options);
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when a directory exists but its entries cannot be read.
 */
export class PermissionError extends AppError {
  constructor(
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Permission denied reading directory: ${path}`, 'PERMISSION_DENIED', options);
    this.name = 'PermissionError';
  }
}

/**
 * Error thrown when invalid arguments are passed to a sequence query
 * (e.g., non-positive step, fractional frame number, zero padding).
 */
export class InvalidArgumentError extends AppError {
  constructor(detail: string) {
    super(detail, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}
