import * as path from 'node:path';

import type { CliStorageSettings } from '../config/types.js';
import type { Logger } from '../logging/logger.js';
import type { StorageServiceDependencies } from '../storage/service.js';
import { ManagedBlobStorageService } from '../storage/service.js';
import { parseLogLevel } from '../config/validator.js';
import { createLogger } from '../logging/logger.js';
import { parseEnvFile } from '../env/loader.js';
import { resolveCliSettings } from '../env/settings.js';

/** Global flags shared by every CLI command. */
export interface GlobalFlags {
  account?: string;
  container?: string;
  tenantId?: string;
  clientId?: string;
  envFile: string;
  logLevel?: string;
}

export interface CliContext {
  readonly service: ManagedBlobStorageService;
  readonly logger: Logger;
}

/**
 * Build the storage service for a CLI invocation.
 *
 * Settings precedence: flags > OS environment > .env file (resolved against cwd).
 *
 * @throws ConfigurationError if the log level is invalid or the account/container is missing.
 */
export async function createCliContext(
  flags: GlobalFlags,
  env: Readonly<Record<string, string | undefined>>,
  cwd: string,
  dependencies: Omit<StorageServiceDependencies, 'logger'> = {},
): Promise<CliContext> {
  const bootstrapLogger = createLogger(parseLogLevel(flags.logLevel, 'info', 'log-level'));
  const localEnv = await parseEnvFile(path.resolve(cwd, flags.envFile), bootstrapLogger);

  const cliSettings: CliStorageSettings = {
    accountName: flags.account,
    containerName: flags.container,
    tenantId: flags.tenantId,
    clientId: flags.clientId,
    logLevel: flags.logLevel,
  };
  const settings = resolveCliSettings(cliSettings, env, localEnv);

  const logger = createLogger(parseLogLevel(settings.logLevel, 'info', 'BLOB_STORAGE_LOG_LEVEL'));
  const service = new ManagedBlobStorageService(
    {
      accountName: settings.accountName ?? '',
      containerName: settings.containerName ?? '',
      tenantId: settings.tenantId,
      clientId: settings.clientId,
    },
    { ...dependencies, logger },
  );

  return { service, logger };
}
