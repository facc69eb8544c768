#!/usr/bin/env node
import { Command } from 'commander';
import { createCliContext } from './context.js';
import type { CliContext, GlobalFlags } from './context.js';
import { formatDescriptor, formatListLine } from './format.js';

const program = new Command();

program
  .name('blob-storage')
  .version('0.1.0')
  .description('Work with one Azure Blob Storage container using a managed identity')
  .option('--account <name>', 'Storage account name (env: BLOB_STORAGE_ACCOUNT_NAME)')
  .option('--container <name>', 'Container name (env: BLOB_STORAGE_CONTAINER_NAME)')
  .option('--tenant-id <id>', 'Microsoft Entra tenant id (env: BLOB_STORAGE_TENANT_ID)')
  .option('--client-id <id>', 'User-assigned managed identity client id (env: BLOB_STORAGE_CLIENT_ID)')
  .option('--env-file <path>', 'Path to a .env file', '.env')
  .option('--log-level <level>', 'Log level (debug, info, warn, error)');

/**
 * Build the service from global flags and run a command body, exiting non-zero on failure.
 */
async function runCommand(body: (context: CliContext) => Promise<void>): Promise<void> {
  try {
    const context = await createCliContext(program.opts<GlobalFlags>(), process.env, process.cwd());
    await body(context);
    process.exit(0);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

program
  .command('upload')
  .description('Upload a local file, replacing any existing blob')
  .argument('<blob>', 'Blob name')
  .argument('<file>', 'Local file path')
  .option('--content-type <type>', 'Content-Type to store with the blob')
  .action(async (blobName: string, filePath: string, opts: { contentType?: string }) => {
    await runCommand(async ({ service, logger }) => {
      await service.uploadFromPath(blobName, filePath, { contentType: opts.contentType });
      logger.info(`Uploaded "${filePath}" to "${blobName}"`);
    });
  });

program
  .command('download')
  .description('Download a blob to a local file')
  .argument('<blob>', 'Blob name')
  .argument('<file>', 'Local file path')
  .action(async (blobName: string, filePath: string) => {
    await runCommand(async ({ service, logger }) => {
      await service.downloadToPath(blobName, filePath);
      logger.info(`Downloaded "${blobName}" to "${filePath}"`);
    });
  });

program
  .command('cat')
  .description('Write blob content to stdout')
  .argument('<blob>', 'Blob name')
  .action(async (blobName: string) => {
    await runCommand(async ({ service }) => {
      await service.download(blobName, process.stdout);
    });
  });

program
  .command('info')
  .description('Show blob properties')
  .argument('<blob>', 'Blob name')
  .action(async (blobName: string) => {
    await runCommand(async ({ service }) => {
      const info = await service.getInfo(blobName);
      if (info === null) {
        throw new Error(`Blob "${blobName}" does not exist`);
      }
      for (const line of formatDescriptor(info)) {
        console.log(line);
      }
    });
  });

program
  .command('exists')
  .description('Print true if the blob exists, false otherwise')
  .argument('<blob>', 'Blob name')
  .action(async (blobName: string) => {
    await runCommand(async ({ service }) => {
      console.log(String(await service.exists(blobName)));
    });
  });

program
  .command('delete')
  .description('Delete a blob if it exists')
  .argument('<blob>', 'Blob name')
  .action(async (blobName: string) => {
    await runCommand(async ({ service }) => {
      const deleted = await service.delete(blobName);
      console.log(deleted ? `Deleted "${blobName}"` : `"${blobName}" did not exist`);
    });
  });

program
  .command('list')
  .description('List blobs, optionally filtered by name prefix')
  .option('--prefix <prefix>', 'Only list blobs whose name starts with this prefix')
  .action(async (opts: { prefix?: string }) => {
    await runCommand(async ({ service }) => {
      const blobs = await service.list(opts.prefix);
      for (const blob of blobs) {
        console.log(formatListLine(blob));
      }
      console.log(`${blobs.length} blob(s)`);
    });
  });

await program.parseAsync();
