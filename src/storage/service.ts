import * as path from 'node:path';
import { mkdir, open, rm } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { finished } from 'node:stream/promises';
import type { Readable, Writable } from 'node:stream';

import type { StorageOptions, ResolvedStorageConfig } from '../config/types.js';
import type { BlobDescriptor, ContainerHandle, ContainerHandleFactory } from '../azure/types.js';
import type { CredentialRequest, IdentityProvider } from '../auth/credential.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import { resolveContainer } from './resolver.js';
import { requireNonBlank, requirePresent, throwIfCancelled } from './guards.js';
import {
  LocalFileNotFoundError,
  OperationCancelledError,
  isAbortError,
  isRemoteNotFound,
} from '../errors/index.js';

/**
 * Options accepted by every operation.
 */
export interface OperationOptions {
  /** Aborts the in-flight request; the operation then rejects with OperationCancelledError. */
  readonly signal?: AbortSignal;
}

export interface UploadOptions extends OperationOptions {
  /** Content-Type stored with the blob. Blank values are ignored. */
  readonly contentType?: string;
}

/**
 * Blob operations on a single container.
 */
export interface BlobStorageService {
  upload(blobName: string, content: Readable, options?: UploadOptions): Promise<void>;
  uploadFromPath(blobName: string, filePath: string, options?: UploadOptions): Promise<void>;
  download(blobName: string, destination: Writable, options?: OperationOptions): Promise<void>;
  downloadToPath(blobName: string, filePath: string, options?: OperationOptions): Promise<void>;
  downloadBytes(blobName: string, options?: OperationOptions): Promise<Buffer>;
  getInfo(blobName: string, options?: OperationOptions): Promise<BlobDescriptor | null>;
  exists(blobName: string, options?: OperationOptions): Promise<boolean>;
  delete(blobName: string, options?: OperationOptions): Promise<boolean>;
  list(prefix?: string, options?: OperationOptions): Promise<BlobDescriptor[]>;
}

/**
 * Collaborators of the service. All are optional; the defaults talk to Azure.
 */
export interface StorageServiceDependencies {
  /** Credential source. Default: DefaultAzureCredential from @azure/identity. */
  readonly identityProvider?: IdentityProvider;

  /** Container handle factory. Default: a BlobServiceClient-backed handle. */
  readonly createContainerHandle?: ContainerHandleFactory;

  /** Default: a logger at level 'warn'. The service itself only logs at debug level. */
  readonly logger?: Logger;
}

/** open() codes meaning there is no readable file at the path. */
const MISSING_FILE_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR']);

function describeCredential(request: CredentialRequest): string {
  const tenant = request.tenantId !== undefined ? ` in tenant ${request.tenantId}` : '';
  return request.kind === 'user-assigned'
    ? `user-assigned identity ${request.clientId}${tenant}`
    : `default credential chain${tenant}`;
}

/**
 * Blob storage service authenticated with a Microsoft Entra identity.
 *
 * The container binding is resolved once, in the constructor, which throws
 * ConfigurationError when accountName or containerName is missing. No request
 * is sent until the first operation.
 *
 * Every operation validates its arguments before any request (InvalidArgumentError),
 * issues a single request through the container handle, and lets errors from the
 * storage service propagate unchanged. Instances hold no mutable state and can be
 * used concurrently.
 */
export class ManagedBlobStorageService implements BlobStorageService {
  public readonly config: ResolvedStorageConfig;
  public readonly credentialRequest: CredentialRequest;
  private readonly handle: ContainerHandle;
  private readonly logger: Logger;

  constructor(options: StorageOptions, dependencies: StorageServiceDependencies = {}) {
    const resolved = resolveContainer(
      options,
      dependencies.identityProvider,
      dependencies.createContainerHandle,
    );

    this.config = resolved.config;
    this.credentialRequest = resolved.credentialRequest;
    this.handle = resolved.handle;
    this.logger = dependencies.logger ?? createLogger('warn');

    this.logger.debug(
      `Blob storage bound to container "${this.handle.containerName}" at ${this.handle.url} using ${describeCredential(resolved.credentialRequest)}`,
    );
  }

  /** URL of the bound container. */
  get containerUrl(): string {
    return this.handle.url;
  }

  async upload(blobName: string, content: Readable, options: UploadOptions = {}): Promise<void> {
    requireNonBlank(blobName, 'blobName', 'Blob name');
    requirePresent(content, 'content');

    const contentType = options.contentType?.trim() ? options.contentType : undefined;

    await this.run('upload', options.signal, async () => {
      this.logger.debug(`Uploading blob "${blobName}"`);
      await this.handle.upload(blobName, content, {
        contentType,
        abortSignal: options.signal,
      });
    });
  }

  /**
   * Upload a local file. The file is opened for the duration of the transfer and
   * closed on every exit path.
   *
   * @throws LocalFileNotFoundError if filePath does not exist or is not a regular file.
   */
  async uploadFromPath(blobName: string, filePath: string, options: UploadOptions = {}): Promise<void> {
    requireNonBlank(blobName, 'blobName', 'Blob name');
    requireNonBlank(filePath, 'filePath', 'File path');
    throwIfCancelled(options.signal, 'uploadFromPath');

    const file = await this.openLocalFile(filePath);
    try {
      if (!(await file.stat()).isFile()) {
        throw new LocalFileNotFoundError(`Not a regular file: "${filePath}"`, filePath);
      }

      const input = file.createReadStream({ autoClose: false });
      try {
        await this.upload(blobName, input, options);
      } finally {
        input.destroy();
      }
    } finally {
      await file.close();
    }
  }

  /**
   * Stream the whole blob into destination. The destination is left open.
   * A missing blob rejects with the storage service's 404 error.
   */
  async download(blobName: string, destination: Writable, options: OperationOptions = {}): Promise<void> {
    requireNonBlank(blobName, 'blobName', 'Blob name');
    requirePresent(destination, 'destination');

    await this.run('download', options.signal, async () => {
      this.logger.debug(`Downloading blob "${blobName}" to stream`);
      await this.handle.downloadTo(blobName, destination, { abortSignal: options.signal });
    });
  }

  /**
   * Download a blob to a local file, creating missing parent directories and
   * truncating an existing file. If the download fails or is cancelled, the
   * partially written file is removed.
   */
  async downloadToPath(blobName: string, filePath: string, options: OperationOptions = {}): Promise<void> {
    requireNonBlank(blobName, 'blobName', 'Blob name');
    requireNonBlank(filePath, 'filePath', 'File path');

    await this.run('downloadToPath', options.signal, async () => {
      await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });

      const file = await open(filePath, 'w');
      try {
        // The stream keeps a reference to the handle until it is destroyed
        const output = file.createWriteStream({ autoClose: false });
        try {
          this.logger.debug(`Downloading blob "${blobName}" to "${filePath}"`);
          await this.handle.downloadTo(blobName, output, { abortSignal: options.signal });
          output.end();
          await finished(output);
        } finally {
          output.destroy();
          await file.close();
        }
      } catch (error: unknown) {
        await rm(filePath, { force: true });
        this.logger.debug(`Removed partial file "${filePath}" after failed download`);
        throw error;
      }
    });
  }

  /**
   * Download the whole blob into memory. No size limit is applied.
   */
  async downloadBytes(blobName: string, options: OperationOptions = {}): Promise<Buffer> {
    requireNonBlank(blobName, 'blobName', 'Blob name');

    return this.run('downloadBytes', options.signal, async () => {
      const content = await this.handle.downloadContent(blobName, { abortSignal: options.signal });
      this.logger.debug(`Downloaded blob "${blobName}" to buffer (${content.length} bytes)`);
      return content;
    });
  }

  /**
   * @returns The blob's descriptor, or null if the blob does not exist.
   */
  async getInfo(blobName: string, options: OperationOptions = {}): Promise<BlobDescriptor | null> {
    requireNonBlank(blobName, 'blobName', 'Blob name');

    return this.run('getInfo', options.signal, async () => {
      try {
        return await this.handle.getProperties(blobName, { abortSignal: options.signal });
      } catch (error: unknown) {
        if (isRemoteNotFound(error)) {
          this.logger.debug(`Blob "${blobName}" not found`);
          return null;
        }
        throw error;
      }
    });
  }

  async exists(blobName: string, options: OperationOptions = {}): Promise<boolean> {
    requireNonBlank(blobName, 'blobName', 'Blob name');

    return this.run('exists', options.signal, () =>
      this.handle.exists(blobName, { abortSignal: options.signal }),
    );
  }

  /**
   * @returns true if the blob was deleted, false if it did not exist.
   */
  async delete(blobName: string, options: OperationOptions = {}): Promise<boolean> {
    requireNonBlank(blobName, 'blobName', 'Blob name');

    return this.run('delete', options.signal, async () => {
      const deleted = await this.handle.deleteIfExists(blobName, { abortSignal: options.signal });
      this.logger.debug(deleted ? `Deleted blob "${blobName}"` : `Blob "${blobName}" was already absent`);
      return deleted;
    });
  }

  /**
   * List every blob whose name starts with prefix (all blobs when prefix is
   * omitted or blank). All pages are read before returning; order is the
   * storage service's.
   */
  async list(prefix?: string, options: OperationOptions = {}): Promise<BlobDescriptor[]> {
    const effectivePrefix = prefix?.trim() ? prefix : undefined;

    return this.run('list', options.signal, async () => {
      const blobs: BlobDescriptor[] = [];
      for await (const blob of this.handle.listByPrefix(effectivePrefix, { abortSignal: options.signal })) {
        blobs.push(blob);
      }
      this.logger.debug(`Listed ${blobs.length} blob(s) with prefix "${effectivePrefix ?? ''}"`);
      return blobs;
    });
  }

  private async openLocalFile(filePath: string): Promise<FileHandle> {
    try {
      return await open(filePath, 'r');
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && MISSING_FILE_CODES.has(String(error.code))) {
        throw new LocalFileNotFoundError(`File not found: "${filePath}"`, filePath, { cause: error });
      }
      throw error;
    }
  }

  /**
   * Run one operation, turning an abort into OperationCancelledError.
   * Every other error is rethrown as is.
   */
  private async run<T>(
    operation: string,
    signal: AbortSignal | undefined,
    action: () => Promise<T>,
  ): Promise<T> {
    throwIfCancelled(signal, operation);

    try {
      return await action();
    } catch (error: unknown) {
      if (error instanceof OperationCancelledError) {
        throw error;
      }
      if (signal?.aborted || isAbortError(error)) {
        throw new OperationCancelledError(`Operation "${operation}" was cancelled`, operation, {
          cause: error,
        });
      }
      throw error;
    }
  }
}
