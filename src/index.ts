// Service
export { ManagedBlobStorageService } from './storage/service.js';
export type {
  BlobStorageService,
  OperationOptions,
  UploadOptions,
  StorageServiceDependencies,
} from './storage/service.js';

// Container resolution
export { resolveContainer } from './storage/resolver.js';
export type { ResolvedContainer } from './storage/resolver.js';
export { resolveCredentialRequest, azureIdentityProvider } from './auth/credential.js';
export type { CredentialRequest, IdentityProvider } from './auth/credential.js';
export { buildServiceUrl, AzureContainerHandle, createAzureContainerHandle } from './azure/client.js';

// Configuration
export { validateStorageOptions } from './config/validator.js';
export type { StorageOptions, ResolvedStorageConfig, LogLevel } from './config/types.js';

// Azure types
export type {
  BlobDescriptor,
  ContainerHandle,
  ContainerHandleFactory,
  HandleCallOptions,
  HandleUploadOptions,
} from './azure/types.js';

// Logger
export { createLogger } from './logging/logger.js';
export type { Logger } from './logging/logger.js';

// Error classes (exported as values, not just types)
export {
  BlobStorageError,
  ConfigurationError,
  InvalidArgumentError,
  LocalFileNotFoundError,
  OperationCancelledError,
  isRemoteNotFound,
} from './errors/index.js';
