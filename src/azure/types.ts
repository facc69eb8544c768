import type { Readable, Writable } from 'node:stream';
import type { TokenCredential } from '@azure/identity';

/**
 * Metadata for a single blob, produced by getInfo and list.
 */
export interface BlobDescriptor {
  /** Full blob name including any virtual directory path. Example: "reports/2024/q1.csv" */
  readonly name: string;

  /** Content length in bytes. */
  readonly sizeBytes: number;

  readonly lastModified: Date | undefined;

  /** MIME type stored with the blob, if one was set. */
  readonly contentType: string | undefined;

  /** HTTP ETag for the blob. Changes whenever the content changes. Example: "0x8D..." */
  readonly etag: string | undefined;
}

/**
 * Per-call request options forwarded to the storage client.
 */
export interface HandleCallOptions {
  readonly abortSignal?: AbortSignal;
}

export interface HandleUploadOptions extends HandleCallOptions {
  readonly contentType?: string;
}

/**
 * Authenticated binding to one container. Each method maps to exactly one
 * storage client call on the blob of the given name.
 *
 * Not-found and service failures are thrown as the client's own errors.
 */
export interface ContainerHandle {
  /** Container URL. Example: "https://myaccount.blob.core.windows.net/reports" */
  readonly url: string;
  readonly containerName: string;

  /** Upload a stream, replacing any existing blob of that name. */
  upload(blobName: string, content: Readable, options: HandleUploadOptions): Promise<void>;

  /** Stream the whole blob into destination without ending it. */
  downloadTo(blobName: string, destination: Writable, options: HandleCallOptions): Promise<void>;

  downloadContent(blobName: string, options: HandleCallOptions): Promise<Buffer>;

  getProperties(blobName: string, options: HandleCallOptions): Promise<BlobDescriptor>;

  exists(blobName: string, options: HandleCallOptions): Promise<boolean>;

  /** @returns true if a blob was deleted, false if none existed. */
  deleteIfExists(blobName: string, options: HandleCallOptions): Promise<boolean>;

  /** Iterate every blob whose name starts with prefix, page by page. */
  listByPrefix(prefix: string | undefined, options: HandleCallOptions): AsyncIterable<BlobDescriptor>;
}

/**
 * Builds a ContainerHandle from the service URL, the container name and a credential.
 */
export type ContainerHandleFactory = (
  serviceUrl: string,
  containerName: string,
  credential: TokenCredential,
) => ContainerHandle;
