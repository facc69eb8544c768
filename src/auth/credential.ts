import { DefaultAzureCredential } from '@azure/identity';
import type { TokenCredential } from '@azure/identity';
import type { ResolvedStorageConfig } from '../config/types.js';

/**
 * Which identity the service asks the identity provider for.
 *
 * - default-chain: the provider's own ordered chain (environment, managed identity,
 *   developer tools), optionally pinned to a tenant.
 * - user-assigned: one specific user-assigned managed identity, optionally pinned to a tenant.
 */
export type CredentialRequest =
  | { readonly kind: 'default-chain'; readonly tenantId?: string }
  | { readonly kind: 'user-assigned'; readonly clientId: string; readonly tenantId?: string };

/**
 * Source of credentials. Substitutable so identity selection can be tested without
 * touching the network.
 */
export interface IdentityProvider {
  createCredential(request: CredentialRequest): TokenCredential;
}

/**
 * Select the identity request from the optional identity fields of a validated config.
 *
 * | tenantId | clientId | result                                  |
 * |----------|----------|-----------------------------------------|
 * | absent   | absent   | default chain                           |
 * | present  | absent   | default chain scoped to the tenant      |
 * | absent   | present  | user-assigned identity                  |
 * | present  | present  | user-assigned identity scoped to tenant |
 */
export function resolveCredentialRequest(
  config: Pick<ResolvedStorageConfig, 'tenantId' | 'clientId'>,
): CredentialRequest {
  const { tenantId, clientId } = config;

  if (clientId !== undefined) {
    return tenantId !== undefined
      ? { kind: 'user-assigned', clientId, tenantId }
      : { kind: 'user-assigned', clientId };
  }

  return tenantId !== undefined
    ? { kind: 'default-chain', tenantId }
    : { kind: 'default-chain' };
}

/**
 * Identity provider backed by @azure/identity's DefaultAzureCredential.
 * A user-assigned request sets managedIdentityClientId; the rest of the chain is left as is.
 * Token acquisition is deferred by the credential until the first request.
 */
export const azureIdentityProvider: IdentityProvider = {
  createCredential(request: CredentialRequest): TokenCredential {
    if (request.kind === 'user-assigned') {
      return new DefaultAzureCredential({
        tenantId: request.tenantId,
        managedIdentityClientId: request.clientId,
      });
    }
    return new DefaultAzureCredential({ tenantId: request.tenantId });
  },
};
