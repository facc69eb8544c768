import { z } from 'zod';
import type { LogLevel, ResolvedStorageConfig, StorageOptions } from './types.js';
import { ConfigurationError } from '../errors/index.js';

function requiredName(field: string) {
  return z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .trim()
    .min(1, `${field} must not be blank`);
}

function optionalIdentifier(field: string) {
  return z
    .string({ invalid_type_error: `${field} must be a string` })
    .trim()
    .nullish()
    .transform((value) => (value ? value : undefined));
}

/**
 * Zod schema for StorageOptions. Field order determines which problem is reported first.
 */
const storageOptionsSchema = z.object({
  accountName: requiredName('accountName'),
  containerName: requiredName('containerName'),
  tenantId: optionalIdentifier('tenantId'),
  clientId: optionalIdentifier('clientId'),
});

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Validate caller-supplied storage options.
 *
 * @returns A frozen ResolvedStorageConfig.
 *
 * @throws ConfigurationError with parameter set to the first offending field if:
 *   - options is not an object
 *   - accountName or containerName is missing, null or blank
 *   - tenantId or clientId is present but not a string
 *
 * Contract:
 *   - Performs no I/O
 *   - All strings are trimmed
 *   - Blank or null tenantId/clientId become undefined
 */
export function validateStorageOptions(options: StorageOptions): ResolvedStorageConfig {
  const parseResult = storageOptionsSchema.safeParse(options);

  if (!parseResult.success) {
    const firstIssue = parseResult.error.issues[0];
    const paramName = firstIssue && firstIssue.path.length > 0
      ? String(firstIssue.path[0])
      : 'options';
    throw new ConfigurationError(
      `Invalid storage configuration: ${firstIssue?.message ?? 'options must be an object'}`,
      paramName,
    );
  }

  const { accountName, containerName, tenantId, clientId } = parseResult.data;
  return Object.freeze({ accountName, containerName, tenantId, clientId });
}

/**
 * Validate a log level string coming from a flag or environment variable.
 *
 * @param value - Raw value; undefined or empty selects the fallback.
 * @param fallback - Level used when no value is given.
 * @param parameter - Name reported in the ConfigurationError.
 */
export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel,
  parameter: string = 'logLevel',
): LogLevel {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parseResult = logLevelSchema.safeParse(value.trim().toLowerCase());
  if (!parseResult.success) {
    throw new ConfigurationError(
      `Invalid log level "${value}": expected one of debug, info, warn, error`,
      parameter,
    );
  }
  return parseResult.data;
}
