import { readFile } from 'node:fs/promises';
import { parse } from 'dotenv';
import type { Logger } from '../logging/logger.js';

/**
 * Parsed key-value pairs from a .env file.
 */
export type EnvRecord = Record<string, string>;

/**
 * Load and parse a local .env file.
 *
 * @param envFilePath - Absolute path to the .env file.
 * @param logger - Logger instance.
 * @returns Parsed key-value pairs. Empty record if file does not exist.
 *
 * Contract:
 *   - Uses dotenv.parse() on the file contents (does NOT call dotenv.config())
 *   - If file does not exist: returns {} without error
 *   - Does NOT modify process.env
 *   - Malformed lines are ignored (dotenv behavior)
 */
export async function parseEnvFile(envFilePath: string, logger: Logger): Promise<EnvRecord> {
  let content: Buffer;
  try {
    content = await readFile(envFilePath);
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      logger.debug(`No .env file at ${envFilePath}, using the process environment only`);
      return {};
    }
    throw err;
  }

  const parsed = parse(content);
  logger.debug(`Parsed ${Object.keys(parsed).length} variable(s) from ${envFilePath}`);
  return parsed;
}
