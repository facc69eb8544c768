/**
 * Base error class for all errors raised by this library.
 * Errors coming back from the storage service are not wrapped in this type.
 */
export class BlobStorageError extends Error {
  /** Machine-readable error code for programmatic handling. */
  public readonly code: string;

  constructor(message: string, code: string = 'BLOB_STORAGE_ERROR', options?: ErrorOptions) {
    super(message, options);
    this.name = 'BlobStorageError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
