/**
 * Log level enumeration. Levels are ordered from most verbose (debug) to least verbose (error).
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Caller-supplied options for a storage service instance.
 *
 * Given: { accountName: "myaccount", containerName: "reports" }
 * Endpoint: https://myaccount.blob.core.windows.net, container "reports"
 */
export interface StorageOptions {
  /** Storage account name, without the domain. Example: "myaccount" */
  readonly accountName: string;

  /** Container every operation of the service is bound to. */
  readonly containerName: string;

  /** Microsoft Entra tenant to authenticate against. Omit to use the credential's default tenant. */
  readonly tenantId?: string | null;

  /** Client id of a user-assigned managed identity. Omit to use the default credential chain. */
  readonly clientId?: string | null;
}

/**
 * Validated storage options. Required fields are trimmed and non-blank;
 * blank optional fields have been normalised to undefined.
 */
export interface ResolvedStorageConfig {
  readonly accountName: string;
  readonly containerName: string;
  readonly tenantId: string | undefined;
  readonly clientId: string | undefined;
}

/**
 * Options as read by the CLI from flags, the OS environment and a local .env file.
 * Every field may still be missing at this stage; validation happens when the service is built.
 */
export interface CliStorageSettings {
  accountName?: string;
  containerName?: string;
  tenantId?: string;
  clientId?: string;
  logLevel?: string;
}

/**
 * Environment variables the CLI understands.
 */
export interface RawEnvConfig {
  BLOB_STORAGE_ACCOUNT_NAME?: string;
  BLOB_STORAGE_CONTAINER_NAME?: string;
  BLOB_STORAGE_TENANT_ID?: string;
  BLOB_STORAGE_CLIENT_ID?: string;
  BLOB_STORAGE_LOG_LEVEL?: string;
}
