import { BlobServiceClient } from '@azure/storage-blob';
import type { BlobGetPropertiesResponse, BlobItem, ContainerClient } from '@azure/storage-blob';
import type { TokenCredential } from '@azure/identity';
import type { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import type {
  BlobDescriptor,
  ContainerHandle,
  HandleCallOptions,
  HandleUploadOptions,
} from './types.js';
import { BlobStorageError } from '../errors/index.js';

/** DNS suffix of the public-cloud blob endpoint. */
export const BLOB_SERVICE_DOMAIN = 'blob.core.windows.net';

/**
 * Build the blob service endpoint for an account.
 *
 * @param accountName - Storage account name. Example: "myaccount"
 * @returns "https://myaccount.blob.core.windows.net"
 */
export function buildServiceUrl(accountName: string): string {
  return `https://${accountName}.${BLOB_SERVICE_DOMAIN}`;
}

/** Subset of a listed blob item used to build a descriptor. */
export type ListedBlob = Pick<BlobItem, 'name'> & {
  readonly properties: Pick<BlobItem['properties'], 'contentLength' | 'lastModified' | 'contentType' | 'etag'>;
};

/** Subset of a get-properties response used to build a descriptor. */
export type BlobPropertiesSnapshot = Pick<
  BlobGetPropertiesResponse,
  'contentLength' | 'lastModified' | 'contentType' | 'etag'
>;

export function descriptorFromListedBlob(item: ListedBlob): BlobDescriptor {
  return {
    name: item.name,
    sizeBytes: item.properties.contentLength ?? 0,
    lastModified: item.properties.lastModified,
    contentType: item.properties.contentType,
    etag: item.properties.etag,
  };
}

export function descriptorFromProperties(
  blobName: string,
  properties: BlobPropertiesSnapshot,
): BlobDescriptor {
  return {
    name: blobName,
    sizeBytes: properties.contentLength ?? 0,
    lastModified: properties.lastModified,
    contentType: properties.contentType,
    etag: properties.etag,
  };
}

/**
 * ContainerHandle backed by @azure/storage-blob.
 *
 * Each method issues exactly one SDK call. Errors from the SDK (RestError, AbortError)
 * propagate untouched; retries are the SDK pipeline's concern.
 */
export class AzureContainerHandle implements ContainerHandle {
  private readonly containerClient: ContainerClient;

  constructor(containerClient: ContainerClient) {
    this.containerClient = containerClient;
  }

  get url(): string {
    return this.containerClient.url;
  }

  get containerName(): string {
    return this.containerClient.containerName;
  }

  async upload(blobName: string, content: Readable, options: HandleUploadOptions): Promise<void> {
    const blockBlobClient = this.containerClient.getBlockBlobClient(blobName);

    await blockBlobClient.uploadStream(content, undefined, undefined, {
      abortSignal: options.abortSignal,
      blobHTTPHeaders: options.contentType !== undefined
        ? { blobContentType: options.contentType }
        : undefined,
    });
  }

  async downloadTo(blobName: string, destination: Writable, options: HandleCallOptions): Promise<void> {
    const blobClient = this.containerClient.getBlobClient(blobName);
    const response = await blobClient.download(0, undefined, {
      abortSignal: options.abortSignal,
    });

    if (!response.readableStreamBody) {
      throw new BlobStorageError(
        `No readable stream body returned for blob "${blobName}"`,
        'EMPTY_RESPONSE_BODY',
      );
    }

    await pipeline(response.readableStreamBody, destination, {
      end: false,
      signal: options.abortSignal,
    });
  }

  async downloadContent(blobName: string, options: HandleCallOptions): Promise<Buffer> {
    const blobClient = this.containerClient.getBlobClient(blobName);
    return blobClient.downloadToBuffer(0, undefined, {
      abortSignal: options.abortSignal,
    });
  }

  async getProperties(blobName: string, options: HandleCallOptions): Promise<BlobDescriptor> {
    const blobClient = this.containerClient.getBlobClient(blobName);
    const properties = await blobClient.getProperties({
      abortSignal: options.abortSignal,
    });
    return descriptorFromProperties(blobName, properties);
  }

  async exists(blobName: string, options: HandleCallOptions): Promise<boolean> {
    const blobClient = this.containerClient.getBlobClient(blobName);
    return blobClient.exists({ abortSignal: options.abortSignal });
  }

  async deleteIfExists(blobName: string, options: HandleCallOptions): Promise<boolean> {
    const blobClient = this.containerClient.getBlobClient(blobName);
    const response = await blobClient.deleteIfExists({
      abortSignal: options.abortSignal,
    });
    return response.succeeded;
  }

  async *listByPrefix(
    prefix: string | undefined,
    options: HandleCallOptions,
  ): AsyncIterable<BlobDescriptor> {
    const items = this.containerClient.listBlobsFlat({
      prefix,
      abortSignal: options.abortSignal,
    });

    for await (const item of items) {
      yield descriptorFromListedBlob(item);
    }
  }
}

/**
 * Create the container handle for an account endpoint and container name.
 * No request is sent; the container is not checked for existence.
 */
export function createAzureContainerHandle(
  serviceUrl: string,
  containerName: string,
  credential: TokenCredential,
): AzureContainerHandle {
  const serviceClient = new BlobServiceClient(serviceUrl, credential);
  return new AzureContainerHandle(serviceClient.getContainerClient(containerName));
}
