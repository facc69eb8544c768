import type { StorageOptions, ResolvedStorageConfig } from '../config/types.js';
import type { ContainerHandle, ContainerHandleFactory } from '../azure/types.js';
import type { CredentialRequest, IdentityProvider } from '../auth/credential.js';
import { validateStorageOptions } from '../config/validator.js';
import { azureIdentityProvider, resolveCredentialRequest } from '../auth/credential.js';
import { buildServiceUrl, createAzureContainerHandle } from '../azure/client.js';

/**
 * Everything produced while binding a service instance to its container.
 */
export interface ResolvedContainer {
  readonly config: ResolvedStorageConfig;
  readonly credentialRequest: CredentialRequest;
  readonly serviceUrl: string;
  readonly handle: ContainerHandle;
}

/**
 * Validate options, pick the identity, and build the container handle.
 *
 * @throws ConfigurationError if accountName or containerName is missing or blank.
 *
 * Contract:
 *   - Validation completes before the identity provider or the handle factory is called
 *   - The identity provider is asked for exactly one credential
 *   - No request is sent; token acquisition and container existence are discovered
 *     on the first operation
 */
export function resolveContainer(
  options: StorageOptions,
  identityProvider: IdentityProvider = azureIdentityProvider,
  createHandle: ContainerHandleFactory = createAzureContainerHandle,
): ResolvedContainer {
  const config = validateStorageOptions(options);
  const credentialRequest = resolveCredentialRequest(config);
  const credential = identityProvider.createCredential(credentialRequest);
  const serviceUrl = buildServiceUrl(config.accountName);
  const handle = createHandle(serviceUrl, config.containerName, credential);

  return { config, credentialRequest, serviceUrl, handle };
}
