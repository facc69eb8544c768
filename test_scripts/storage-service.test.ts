import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { Readable, Writable } from 'node:stream';
import { RestError } from '@azure/storage-blob';

import { ManagedBlobStorageService } from '../src/storage/service.js';
import type { StorageOptions } from '../src/config/types.js';
import {
  ConfigurationError,
  InvalidArgumentError,
  LocalFileNotFoundError,
  OperationCancelledError,
  isRemoteNotFound,
} from '../src/errors/index.js';
import {
  FakeContainerHandle,
  RecordingIdentityProvider,
  createMockLogger,
  fakeCredential,
} from './fake-container.js';

const OPTIONS: StorageOptions = { accountName: 'testaccount', containerName: 'docs' };

function createService(options: StorageOptions = OPTIONS) {
  const handle = new FakeContainerHandle();
  const identityProvider = new RecordingIdentityProvider();
  const createContainerHandle = vi.fn(() => handle);
  const service = new ManagedBlobStorageService(options, {
    identityProvider,
    createContainerHandle,
    logger: createMockLogger(),
  });
  return { service, handle, identityProvider, createContainerHandle };
}

function bytes(text: string): Readable {
  return Readable.from(Buffer.from(text));
}

/** Writable that keeps every chunk written to it. */
class CollectingWritable extends Writable {
  readonly chunks: Buffer[] = [];

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk);
    callback();
  }

  content(): string {
    return Buffer.concat(this.chunks).toString('utf-8');
  }
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

describe('ManagedBlobStorageService - construction', () => {
  it('builds the handle from the account endpoint, container name and credential', () => {
    const { createContainerHandle } = createService();

    expect(createContainerHandle).toHaveBeenCalledTimes(1);
    expect(createContainerHandle).toHaveBeenCalledWith(
      'https://testaccount.blob.core.windows.net',
      'docs',
      fakeCredential,
    );
  });

  it('exposes the container URL and validated config', () => {
    const { service } = createService({ accountName: ' testaccount ', containerName: 'docs' });

    expect(service.containerUrl).toBe('https://testaccount.blob.core.windows.net/docs');
    expect(service.config.accountName).toBe('testaccount');
  });

  it('requests the default credential chain when no identity fields are set', () => {
    const { identityProvider, service } = createService();

    expect(identityProvider.requests).toEqual([{ kind: 'default-chain' }]);
    expect(service.credentialRequest).toEqual({ kind: 'default-chain' });
  });

  it('requests a user-assigned identity scoped to the tenant when both fields are set', () => {
    const { identityProvider } = createService({
      ...OPTIONS,
      tenantId: 'tenant-1',
      clientId: 'client-1',
    });

    expect(identityProvider.requests).toEqual([
      { kind: 'user-assigned', clientId: 'client-1', tenantId: 'tenant-1' },
    ]);
  });

  it.each([
    [{ accountName: '', containerName: 'docs' }, 'accountName'],
    [{ accountName: 'testaccount', containerName: '  ' }, 'containerName'],
  ])('fails fast with ConfigurationError for %j', (options, parameter) => {
    const identityProvider = new RecordingIdentityProvider();
    const createContainerHandle = vi.fn(() => new FakeContainerHandle());

    let thrown: unknown;
    try {
      new ManagedBlobStorageService(options, { identityProvider, createContainerHandle });
    } catch (error: unknown) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigurationError);
    expect(thrown).toMatchObject({ parameter });

    expect(identityProvider.requests).toHaveLength(0);
    expect(createContainerHandle).not.toHaveBeenCalled();
  });

  it('logs the bound container and identity at debug level', () => {
    const logger = { ...createMockLogger(), debug: vi.fn() };

    new ManagedBlobStorageService(
      { ...OPTIONS, clientId: 'client-1' },
      {
        identityProvider: new RecordingIdentityProvider(),
        createContainerHandle: () => new FakeContainerHandle(),
        logger,
      },
    );

    expect(logger.debug).toHaveBeenCalledWith(
      'Blob storage bound to container "docs" at https://testaccount.blob.core.windows.net/docs using user-assigned identity client-1',
    );
  });

  it('validates before touching the default identity provider', () => {
    expect(() => new ManagedBlobStorageService({ accountName: 'a', containerName: '' })).toThrow(
      ConfigurationError,
    );
  });
});

describe('ManagedBlobStorageService - argument validation', () => {
  let service: ManagedBlobStorageService;
  let handle: FakeContainerHandle;

  beforeEach(() => {
    ({ service, handle } = createService());
  });

  const operations: Array<[string, (s: ManagedBlobStorageService, name: string) => Promise<unknown>]> = [
    ['upload', (s, name) => s.upload(name, bytes('x'))],
    ['uploadFromPath', (s, name) => s.uploadFromPath(name, '/tmp/whatever.txt')],
    ['download', (s, name) => s.download(name, new CollectingWritable())],
    ['downloadToPath', (s, name) => s.downloadToPath(name, '/tmp/whatever.txt')],
    ['downloadBytes', (s, name) => s.downloadBytes(name)],
    ['getInfo', (s, name) => s.getInfo(name)],
    ['exists', (s, name) => s.exists(name)],
    ['delete', (s, name) => s.delete(name)],
  ];

  for (const [operation, call] of operations) {
    it.each(['', '   '])(`${operation} rejects blob name %j without any request`, async (blobName) => {
      await expect(call(service, blobName)).rejects.toBeInstanceOf(InvalidArgumentError);
      await expect(call(service, blobName)).rejects.toMatchObject({ parameter: 'blobName' });
      expect(handle.callCount()).toBe(0);
    });
  }

  it.each(['', ' '])('uploadFromPath rejects file path %j', async (filePath) => {
    await expect(service.uploadFromPath('a.txt', filePath)).rejects.toMatchObject({
      name: 'InvalidArgumentError',
      parameter: 'filePath',
    });
    expect(handle.callCount()).toBe(0);
  });

  it.each(['', ' '])('downloadToPath rejects file path %j', async (filePath) => {
    await expect(service.downloadToPath('a.txt', filePath)).rejects.toMatchObject({
      name: 'InvalidArgumentError',
      parameter: 'filePath',
    });
    expect(handle.callCount()).toBe(0);
  });

  it('upload rejects a missing content stream', async () => {
    const content: unknown = null;
    await expect(service.upload('a.txt', content as Readable)).rejects.toMatchObject({
      name: 'InvalidArgumentError',
      parameter: 'content',
    });
    expect(handle.callCount()).toBe(0);
  });

  it('download rejects a missing destination', async () => {
    const destination: unknown = undefined;
    await expect(service.download('a.txt', destination as Writable)).rejects.toMatchObject({
      name: 'InvalidArgumentError',
      parameter: 'destination',
    });
    expect(handle.callCount()).toBe(0);
  });

  it('delegates a valid single-object call exactly once', async () => {
    await service.exists('reports/q1.csv');

    expect(handle.calls).toHaveLength(1);
    expect(handle.calls[0]).toMatchObject({ method: 'exists', target: 'reports/q1.csv' });
  });
});

describe('ManagedBlobStorageService - upload and download', () => {
  let service: ManagedBlobStorageService;
  let handle: FakeContainerHandle;

  beforeEach(() => {
    ({ service, handle } = createService());
  });

  it('round-trips content byte for byte', async () => {
    const payload = Buffer.from([0, 1, 2, 250, 255, 10, 13]);

    await service.upload('bin/data.bin', Readable.from(payload));
    const downloaded = await service.downloadBytes('bin/data.bin');

    expect(downloaded.equals(payload)).toBe(true);
  });

  it('round-trips an empty blob', async () => {
    await service.upload('empty.txt', Readable.from(Buffer.alloc(0)));

    const downloaded = await service.downloadBytes('empty.txt');

    expect(downloaded.length).toBe(0);
  });

  it('overwrites an existing blob unconditionally', async () => {
    await service.upload('notes.txt', bytes('first version'));
    await service.upload('notes.txt', bytes('second'));

    expect((await service.downloadBytes('notes.txt')).toString('utf-8')).toBe('second');
  });

  it('passes the content type to the handle', async () => {
    await service.upload('page.html', bytes('<p>hi</p>'), { contentType: 'text/html' });

    expect(handle.storedContentType('page.html')).toBe('text/html');
  });

  it('ignores a blank content type', async () => {
    await service.upload('page.html', bytes('<p>hi</p>'), { contentType: '  ' });

    expect(handle.calls[0]?.options.contentType).toBeUndefined();
  });

  it('streams a blob into a destination without ending it', async () => {
    handle.seed('greeting.txt', 'hello world');
    const destination = new CollectingWritable();

    await service.download('greeting.txt', destination);

    expect(destination.content()).toBe('hello world');
    expect(destination.writableEnded).toBe(false);
  });

  it('surfaces the remote not-found error unchanged from download', async () => {
    const rejection = service.download('missing.txt', new CollectingWritable());

    await expect(rejection).rejects.toBeInstanceOf(RestError);
    await expect(rejection).rejects.toMatchObject({ statusCode: 404, code: 'BlobNotFound' });
  });

  it('surfaces the remote not-found error unchanged from downloadBytes', async () => {
    const error = await service.downloadBytes('missing.txt').catch((e: unknown) => e);

    expect(isRemoteNotFound(error)).toBe(true);
  });

  it('passes remote service errors through unchanged', async () => {
    const throttled = new RestError('Server busy', { statusCode: 503, code: 'ServerBusy' });
    handle.failWith('downloadContent', throttled);

    await expect(service.downloadBytes('a.txt')).rejects.toBe(throttled);
  });
});

describe('ManagedBlobStorageService - metadata, existence and delete', () => {
  let service: ManagedBlobStorageService;
  let handle: FakeContainerHandle;

  beforeEach(() => {
    ({ service, handle } = createService());
  });

  it('getInfo returns null for a missing blob', async () => {
    await expect(service.getInfo('missing.txt')).resolves.toBeNull();
    expect(handle.callCount('getProperties')).toBe(1);
  });

  it('getInfo returns a descriptor matching the uploaded payload', async () => {
    await service.upload('reports/q1.csv', bytes('a,b,c\n1,2,3\n'), { contentType: 'text/csv' });

    const info = await service.getInfo('reports/q1.csv');

    expect(info).not.toBeNull();
    expect(info?.name).toBe('reports/q1.csv');
    expect(info?.sizeBytes).toBe(12);
    expect(info?.contentType).toBe('text/csv');
    expect(info?.etag).toBe('"0x8D000000000001"');
    expect(info?.lastModified).toEqual(new Date('2024-01-01T00:00:01.000Z'));
  });

  it('getInfo rethrows errors other than not-found', async () => {
    const forbidden = new RestError('This request is not authorized', { statusCode: 403 });
    handle.failWith('getProperties', forbidden);

    await expect(service.getInfo('a.txt')).rejects.toBe(forbidden);
  });

  it('exists reports presence and absence', async () => {
    handle.seed('present.txt', 'x');

    await expect(service.exists('present.txt')).resolves.toBe(true);
    await expect(service.exists('absent.txt')).resolves.toBe(false);
  });

  it('delete returns true for an existing blob and removes it', async () => {
    handle.seed('old.log', 'stale');

    await expect(service.delete('old.log')).resolves.toBe(true);
    await expect(service.exists('old.log')).resolves.toBe(false);
  });

  it('delete returns false for a missing blob', async () => {
    await expect(service.delete('never-there.log')).resolves.toBe(false);
  });
});

describe('ManagedBlobStorageService - list', () => {
  let service: ManagedBlobStorageService;
  let handle: FakeContainerHandle;

  beforeEach(() => {
    ({ service, handle } = createService());
    handle.seed('logs/2024/b.log', 'bb');
    handle.seed('data/c.json', '{}');
    handle.seed('logs/2024/a.log', 'a');
    handle.seed('logs/2025/c.log', 'ccc');
    handle.seed('logsheet.xlsx', 'x');
  });

  it('returns exactly the blobs that start with the prefix, across pages', async () => {
    const blobs = await service.list('logs/');

    expect(blobs.map((b) => b.name)).toEqual([
      'logs/2024/a.log',
      'logs/2024/b.log',
      'logs/2025/c.log',
    ]);
    expect(blobs.map((b) => b.sizeBytes)).toEqual([1, 2, 3]);
    expect(handle.callCount('listByPrefix')).toBe(1);
  });

  it('lists every blob when the prefix is omitted', async () => {
    const blobs = await service.list();

    expect(blobs).toHaveLength(5);
    expect(handle.calls[0]?.target).toBeUndefined();
  });

  it('treats a blank prefix as no prefix', async () => {
    const blobs = await service.list('  ');

    expect(blobs).toHaveLength(5);
    expect(handle.calls[0]?.target).toBeUndefined();
  });

  it('returns an empty list when nothing matches', async () => {
    await expect(service.list('archive/')).resolves.toEqual([]);
  });
});

describe('ManagedBlobStorageService - local files', () => {
  let tmpDir: string;
  let service: ManagedBlobStorageService;
  let handle: FakeContainerHandle;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'blob-storage-test-'));
    ({ service, handle } = createService());
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('uploadFromPath uploads the file content', async () => {
    const filePath = path.join(tmpDir, 'report.txt');
    await fs.writeFile(filePath, 'quarterly numbers', 'utf-8');

    await service.uploadFromPath('reports/report.txt', filePath, { contentType: 'text/plain' });

    expect(handle.storedContent('reports/report.txt')?.toString('utf-8')).toBe('quarterly numbers');
    expect(handle.storedContentType('reports/report.txt')).toBe('text/plain');
  });

  it('uploadFromPath fails with LocalFileNotFoundError without uploading', async () => {
    const filePath = path.join(tmpDir, 'missing.txt');

    await expect(service.uploadFromPath('a.txt', filePath)).rejects.toBeInstanceOf(LocalFileNotFoundError);
    await expect(service.uploadFromPath('a.txt', filePath)).rejects.toMatchObject({ filePath });
    expect(handle.callCount('upload')).toBe(0);
  });

  it('uploadFromPath rejects a directory', async () => {
    await expect(service.uploadFromPath('a.txt', tmpDir)).rejects.toBeInstanceOf(LocalFileNotFoundError);
    expect(handle.callCount()).toBe(0);
  });

  it('uploadFromPath maps a path through a regular file to LocalFileNotFoundError', async () => {
    const parent = path.join(tmpDir, 'plain.txt');
    await fs.writeFile(parent, 'not a directory', 'utf-8');
    const filePath = path.join(parent, 'child.txt');

    const error = await service.uploadFromPath('a.txt', filePath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LocalFileNotFoundError);
    expect(error).toMatchObject({ filePath, code: 'LOCAL_FILE_NOT_FOUND' });
    expect(handle.callCount()).toBe(0);
  });

  it('uploadFromPath passes remote failures through', async () => {
    const filePath = path.join(tmpDir, 'report.txt');
    await fs.writeFile(filePath, 'content', 'utf-8');
    const denied = new RestError('denied', { statusCode: 403 });
    handle.failWith('upload', denied);

    await expect(service.uploadFromPath('a.txt', filePath)).rejects.toBe(denied);
  });

  it('downloadToPath creates missing parent directories', async () => {
    handle.seed('nested/file.txt', 'nested content');
    const filePath = path.join(tmpDir, 'a', 'b', 'file.txt');

    await service.downloadToPath('nested/file.txt', filePath);

    expect(await fs.readFile(filePath, 'utf-8')).toBe('nested content');
  });

  it('downloadToPath truncates an existing file', async () => {
    handle.seed('short.txt', 'new');
    const filePath = path.join(tmpDir, 'short.txt');
    await fs.writeFile(filePath, 'much longer old content', 'utf-8');

    await service.downloadToPath('short.txt', filePath);

    expect(await fs.readFile(filePath, 'utf-8')).toBe('new');
  });

  it('downloadToPath writes an empty file for an empty blob', async () => {
    handle.seed('empty.bin', Buffer.alloc(0));
    const filePath = path.join(tmpDir, 'empty.bin');

    await service.downloadToPath('empty.bin', filePath);

    expect((await fs.stat(filePath)).size).toBe(0);
  });

  it('downloadToPath removes the partial file when the blob is missing', async () => {
    const filePath = path.join(tmpDir, 'out', 'missing.txt');

    const error = await service.downloadToPath('missing.txt', filePath).catch((e: unknown) => e);

    expect(isRemoteNotFound(error)).toBe(true);
    expect(await pathExists(filePath)).toBe(false);
  });

  it('downloadToPath settles and releases the file for a repeated download', async () => {
    handle.seed('first.txt', 'first');
    handle.seed('second.txt', 'second');
    const filePath = path.join(tmpDir, 'repeat.txt');

    await service.downloadToPath('first.txt', filePath);
    await service.downloadToPath('second.txt', filePath);

    expect(await fs.readFile(filePath, 'utf-8')).toBe('second');
  });

  it('downloadToPath round-trips with uploadFromPath', async () => {
    const source = path.join(tmpDir, 'source.bin');
    const target = path.join(tmpDir, 'target.bin');
    const payload = Buffer.from(Array.from({ length: 300 }, (_, i) => i % 256));
    await fs.writeFile(source, payload);

    await service.uploadFromPath('copy.bin', source);
    await service.downloadToPath('copy.bin', target);

    expect((await fs.readFile(target)).equals(payload)).toBe(true);
  });
});

describe('ManagedBlobStorageService - cancellation', () => {
  let service: ManagedBlobStorageService;
  let handle: FakeContainerHandle;

  beforeEach(() => {
    ({ service, handle } = createService());
  });

  it('rejects an already-aborted signal without sending a request', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(service.exists('a.txt', { signal: controller.signal })).rejects.toMatchObject({
      name: 'OperationCancelledError',
      operation: 'exists',
    });
    expect(handle.callCount()).toBe(0);
  });

  it('aborts an in-flight request and surfaces OperationCancelledError', async () => {
    handle.seed('big.bin', 'payload');
    handle.hangUntilAborted.add('downloadContent');
    const controller = new AbortController();

    const pending = service.downloadBytes('big.bin', { signal: controller.signal });
    controller.abort();

    const error = await pending.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(error).toMatchObject({ operation: 'downloadBytes' });
    expect(handle.calls[0]?.options.abortSignal).toBe(controller.signal);
  });

  it('forwards the signal to every request', async () => {
    const controller = new AbortController();

    await service.list('x/', { signal: controller.signal });

    expect(handle.calls[0]?.options.abortSignal).toBe(controller.signal);
  });

  it('removes the local file when downloadToPath is cancelled', async () => {
    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'blob-storage-cancel-'));
    try {
      handle.seed('slow.bin', 'data');
      handle.hangUntilAborted.add('downloadTo');
      const controller = new AbortController();
      const filePath = path.join(tmpDir, 'slow.bin');

      const pending = service.downloadToPath('slow.bin', filePath, { signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
      expect(await pathExists(filePath)).toBe(false);
    } finally {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  });
});

describe('ManagedBlobStorageService - concurrent use', () => {
  it('handles a concurrent delete and upload of the same name', async () => {
    const { service, handle } = createService();
    handle.seed('shared.txt', 'original');

    const [deleted] = await Promise.all([
      service.delete('shared.txt'),
      service.upload('shared.txt', bytes('replacement')),
    ]);

    expect(typeof deleted).toBe('boolean');
    expect(typeof (await service.exists('shared.txt'))).toBe('boolean');
  });

  it('serves many concurrent uploads on one instance', async () => {
    const { service } = createService();
    const names = Array.from({ length: 20 }, (_, i) => `batch/item-${String(i).padStart(2, '0')}.txt`);

    await Promise.all(names.map((name) => service.upload(name, bytes(name))));

    const listed = await service.list('batch/');
    expect(listed.map((b) => b.name)).toEqual(names);
  });
});
