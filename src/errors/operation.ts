import { BlobStorageError } from './base.js';

/**
 * Thrown when an operation argument is missing or blank.
 * Always raised before any request is sent.
 */
export class InvalidArgumentError extends BlobStorageError {
  /** The argument name that failed validation. */
  public readonly parameter: string;

  constructor(message: string, parameter: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
    this.parameter = parameter;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown by uploadFromPath when the local path does not exist or is not a regular file.
 */
export class LocalFileNotFoundError extends BlobStorageError {
  public readonly filePath: string;

  constructor(message: string, filePath: string, options?: ErrorOptions) {
    super(message, 'LOCAL_FILE_NOT_FOUND', options);
    this.name = 'LocalFileNotFoundError';
    this.filePath = filePath;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when an operation is aborted through its AbortSignal.
 *
 * Trigger conditions:
 * - The signal was already aborted when the operation was called
 * - The signal fired while a request or a local file transfer was in flight
 *
 * When the abort interrupted an in-flight request, the SDK's AbortError is kept as `cause`.
 */
export class OperationCancelledError extends BlobStorageError {
  /** Name of the facade operation that was cancelled. Example: "downloadBytes" */
  public readonly operation: string;

  constructor(message: string, operation: string, options?: ErrorOptions) {
    super(message, 'OPERATION_CANCELLED', options);
    this.name = 'OperationCancelledError';
    this.operation = operation;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
