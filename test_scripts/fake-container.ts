import { RestError } from '@azure/storage-blob';
import type { TokenCredential } from '@azure/identity';
import { Readable } from 'node:stream';
import type { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import type {
  BlobDescriptor,
  ContainerHandle,
  HandleCallOptions,
  HandleUploadOptions,
} from '../src/azure/types.js';
import type { CredentialRequest, IdentityProvider } from '../src/auth/credential.js';
import type { Logger } from '../src/logging/logger.js';

export type HandleMethod =
  | 'upload'
  | 'downloadTo'
  | 'downloadContent'
  | 'getProperties'
  | 'exists'
  | 'deleteIfExists'
  | 'listByPrefix';

export interface RecordedCall {
  readonly method: HandleMethod;
  readonly target: string | undefined;
  readonly options: HandleUploadOptions;
}

interface StoredBlob {
  readonly content: Buffer;
  readonly contentType: string | undefined;
  readonly lastModified: Date;
  readonly etag: string;
}

/** Create a mock logger with no-op methods. */
export function createMockLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}

export function abortError(): Error {
  const error = new Error('The operation was aborted.');
  error.name = 'AbortError';
  return error;
}

function notFound(blobName: string): RestError {
  return new RestError(`The specified blob "${blobName}" does not exist.`, {
    statusCode: 404,
    code: 'BlobNotFound',
  });
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === 'string') return Buffer.from(chunk);
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw new TypeError(`Unsupported chunk type: ${typeof chunk}`);
}

/**
 * In-memory ContainerHandle. Records every call, serves listings in pages of
 * `pageSize`, and answers missing blobs with a 404 RestError like the service does.
 */
export class FakeContainerHandle implements ContainerHandle {
  readonly url: string;
  readonly containerName: string;
  readonly calls: RecordedCall[] = [];
  pageSize = 2;

  /** Methods that wait until their abort signal fires. */
  readonly hangUntilAborted = new Set<HandleMethod>();

  private readonly blobs = new Map<string, StoredBlob>();
  private readonly failures = new Map<HandleMethod, Error>();
  private version = 0;

  constructor(
    url: string = 'https://testaccount.blob.core.windows.net/docs',
    containerName: string = 'docs',
  ) {
    this.url = url;
    this.containerName = containerName;
  }

  /** Store a blob without recording a call. */
  seed(blobName: string, content: Buffer | string, contentType?: string): void {
    this.store(blobName, typeof content === 'string' ? Buffer.from(content) : content, contentType);
  }

  /** Make every later call of a method reject with the given error. */
  failWith(method: HandleMethod, error: Error): void {
    this.failures.set(method, error);
  }

  callCount(method?: HandleMethod): number {
    return method === undefined
      ? this.calls.length
      : this.calls.filter((call) => call.method === method).length;
  }

  storedContent(blobName: string): Buffer | undefined {
    return this.blobs.get(blobName)?.content;
  }

  storedContentType(blobName: string): string | undefined {
    return this.blobs.get(blobName)?.contentType;
  }

  async upload(blobName: string, content: Readable, options: HandleUploadOptions): Promise<void> {
    await this.enter('upload', blobName, options);

    const chunks: Buffer[] = [];
    for await (const chunk of content) {
      chunks.push(toBuffer(chunk));
      if (options.abortSignal?.aborted) throw abortError();
    }
    this.store(blobName, Buffer.concat(chunks), options.contentType);
  }

  async downloadTo(blobName: string, destination: Writable, options: HandleCallOptions): Promise<void> {
    await this.enter('downloadTo', blobName, options);
    const blob = this.require(blobName);
    await pipeline(Readable.from([blob.content]), destination, {
      end: false,
      signal: options.abortSignal,
    });
  }

  async downloadContent(blobName: string, options: HandleCallOptions): Promise<Buffer> {
    await this.enter('downloadContent', blobName, options);
    return Buffer.from(this.require(blobName).content);
  }

  async getProperties(blobName: string, options: HandleCallOptions): Promise<BlobDescriptor> {
    await this.enter('getProperties', blobName, options);
    return this.describe(blobName, this.require(blobName));
  }

  async exists(blobName: string, options: HandleCallOptions): Promise<boolean> {
    await this.enter('exists', blobName, options);
    return this.blobs.has(blobName);
  }

  async deleteIfExists(blobName: string, options: HandleCallOptions): Promise<boolean> {
    await this.enter('deleteIfExists', blobName, options);
    return this.blobs.delete(blobName);
  }

  async *listByPrefix(prefix: string | undefined, options: HandleCallOptions): AsyncIterable<BlobDescriptor> {
    await this.enter('listByPrefix', prefix, options);

    const names = [...this.blobs.keys()]
      .filter((name) => name.startsWith(prefix ?? ''))
      .sort();

    for (let start = 0; start < names.length; start += this.pageSize) {
      // Page boundary: the next page is fetched asynchronously
      await Promise.resolve();
      if (options.abortSignal?.aborted) throw abortError();

      for (const name of names.slice(start, start + this.pageSize)) {
        const blob = this.blobs.get(name);
        if (blob) {
          yield this.describe(name, blob);
        }
      }
    }
  }

  private async enter(method: HandleMethod, target: string | undefined, options: HandleUploadOptions): Promise<void> {
    this.calls.push({ method, target, options });

    const signal = options.abortSignal;
    if (signal?.aborted) throw abortError();

    const failure = this.failures.get(method);
    if (failure) throw failure;

    if (this.hangUntilAborted.has(method) && signal) {
      await new Promise<never>((_, reject) => {
        signal.addEventListener('abort', () => reject(abortError()), { once: true });
      });
    }
  }

  private require(blobName: string): StoredBlob {
    const blob = this.blobs.get(blobName);
    if (!blob) {
      throw notFound(blobName);
    }
    return blob;
  }

  private store(blobName: string, content: Buffer, contentType: string | undefined): void {
    this.version++;
    this.blobs.set(blobName, {
      content,
      contentType,
      lastModified: new Date(Date.UTC(2024, 0, 1, 0, 0, this.version)),
      etag: `"0x8D00000000000${this.version}"`,
    });
  }

  private describe(name: string, blob: StoredBlob): BlobDescriptor {
    return {
      name,
      sizeBytes: blob.content.length,
      lastModified: blob.lastModified,
      contentType: blob.contentType,
      etag: blob.etag,
    };
  }
}

/** Credential that never returns a token; nothing in the tests asks for one. */
export const fakeCredential: TokenCredential = {
  getToken: async () => null,
};

/**
 * Identity provider that records the requests it receives.
 */
export class RecordingIdentityProvider implements IdentityProvider {
  readonly requests: CredentialRequest[] = [];

  createCredential(request: CredentialRequest): TokenCredential {
    this.requests.push(request);
    return fakeCredential;
  }
}
