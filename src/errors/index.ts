export { BlobStorageError } from './base.js';
export { ConfigurationError } from './config.js';
export { InvalidArgumentError, LocalFileNotFoundError, OperationCancelledError } from './operation.js';
export { isRemoteNotFound, isAbortError } from './remote.js';
