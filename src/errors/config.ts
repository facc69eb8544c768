import { BlobStorageError } from './base.js';

/**
 * Thrown when required configuration is missing or invalid.
 *
 * Trigger conditions:
 * - accountName is missing, null or blank
 * - containerName is missing, null or blank
 * - An optional identity field is not a string
 * - The CLI log level is not one of debug, info, warn, error
 */
export class ConfigurationError extends BlobStorageError {
  /** The configuration parameter name that caused the error. */
  public readonly parameter: string;

  constructor(message: string, parameter: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.parameter = parameter;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
