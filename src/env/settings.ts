import type { CliStorageSettings, RawEnvConfig } from '../config/types.js';
import type { EnvRecord } from './loader.js';

/** Settings field and the environment variable that supplies it. */
const ENV_KEYS: ReadonlyArray<readonly [keyof CliStorageSettings, keyof RawEnvConfig]> = [
  ['accountName', 'BLOB_STORAGE_ACCOUNT_NAME'],
  ['containerName', 'BLOB_STORAGE_CONTAINER_NAME'],
  ['tenantId', 'BLOB_STORAGE_TENANT_ID'],
  ['clientId', 'BLOB_STORAGE_CLIENT_ID'],
  ['logLevel', 'BLOB_STORAGE_LOG_LEVEL'],
];

function firstDefined(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== '');
}

/**
 * Merge CLI settings from their three sources.
 *
 * Precedence (highest to lowest):
 *   1. Command-line flags
 *   2. OS environment variables
 *   3. Local .env file
 *
 * Contract:
 *   - Empty or whitespace-only values are treated as not set at every tier
 *   - Performs no validation; missing required fields surface when the service is built
 *   - Never mutates its inputs or process.env
 */
export function resolveCliSettings(
  flags: Readonly<CliStorageSettings>,
  osEnv: Readonly<Record<string, string | undefined>>,
  localEnv: Readonly<EnvRecord>,
): CliStorageSettings {
  const settings: CliStorageSettings = {};

  for (const [field, envKey] of ENV_KEYS) {
    const value = firstDefined(flags[field], osEnv[envKey], localEnv[envKey]);
    if (value !== undefined) {
      settings[field] = value;
    }
  }

  return settings;
}
