/**
 * Local Disk Blob Storage
 *
 * Stores uploaded audio under a single directory. Files are written to a
 * `.part` file first and renamed once complete, so a stored location always
 * refers to a whole file.
 */

import { randomUUID } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { Transform, type Readable, type TransformCallback } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import { ok, err, type Result } from 'neverthrow';

import {
  createBlobStorageError,
  createFileTooLargeError,
  type BlobStorageError,
  type FileTooLargeError,
} from '../../core/errors.js';

import type {
  BlobReadHandle,
  BlobStorage,
  StoreBlobOptions,
  StoredBlob,
} from '../../core/ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface LocalBlobStorageOptions {
  rootDir: string;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const hasCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

interface ByteCounter {
  stream: Transform;
  bytes: () => number;
  exceeded: () => boolean;
}

/**
 * Pass-through stream that counts bytes. Past `maxBytes` it keeps reading
 * the source to its end but stops forwarding, so the request body is still
 * fully consumed.
 */
const createByteCounter = (maxBytes: number): ByteCounter => {
  let total = 0;
  const stream = new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      total += chunk.length;
      if (total > maxBytes) {
        callback();
        return;
      }
      callback(null, chunk);
    },
  });
  return { stream, bytes: () => total, exceeded: () => total > maxBytes };
};

/**
 * Locations are bare file names; anything that could escape the root is rejected.
 */
const isSafeLocation = (location: string): boolean =>
  location !== '' &&
  !location.includes('/') &&
  !location.includes('\\') &&
  !location.includes('..') &&
  !location.includes('\0');

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class LocalBlobStorage implements BlobStorage {
  private readonly rootDir: string;
  private readonly log: Logger;

  constructor(options: LocalBlobStorageOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.log = options.logger.child({ component: 'LocalBlobStorage' });
  }

  async store(
    content: Readable,
    options: StoreBlobOptions
  ): Promise<Result<StoredBlob, BlobStorageError | FileTooLargeError>> {
    const location = `${randomUUID()}${options.extension}`;
    const finalPath = path.join(this.rootDir, location);
    const partPath = `${finalPath}.part`;
    const counter = createByteCounter(options.maxBytes);

    try {
      await pipeline(content, counter.stream, createWriteStream(partPath, { flags: 'wx' }));
    } catch (error) {
      await this.discard(partPath);
      this.log.error({ err: error, location }, 'Failed to store blob');
      return err(createBlobStorageError('Failed to store file', error));
    }

    if (counter.exceeded()) {
      await this.discard(partPath);
      this.log.info({ maxBytes: options.maxBytes }, 'Upload rejected: too large');
      return err(createFileTooLargeError(options.maxBytes));
    }

    try {
      await fs.rename(partPath, finalPath);
    } catch (error) {
      await this.discard(partPath);
      this.log.error({ err: error, location }, 'Failed to finalize blob');
      return err(createBlobStorageError('Failed to store file', error));
    }

    this.log.debug({ location, sizeBytes: counter.bytes() }, 'Blob stored');
    return ok({ location, sizeBytes: counter.bytes() });
  }

  async exists(location: string): Promise<Result<boolean, BlobStorageError>> {
    if (!isSafeLocation(location)) {
      return ok(false);
    }

    try {
      const stats = await fs.stat(path.join(this.rootDir, location));
      return ok(stats.isFile());
    } catch (error) {
      if (hasCode(error, 'ENOENT')) {
        return ok(false);
      }
      this.log.error({ err: error, location }, 'Failed to stat blob');
      return err(createBlobStorageError('Failed to check file', error));
    }
  }

  async openForRead(location: string): Promise<Result<BlobReadHandle | null, BlobStorageError>> {
    if (!isSafeLocation(location)) {
      return ok(null);
    }

    try {
      const handle = await fs.open(path.join(this.rootDir, location), 'r');
      try {
        const stats = await handle.stat();
        // The stream owns the handle from here and closes it when done
        return ok({ stream: handle.createReadStream(), sizeBytes: stats.size });
      } catch (error) {
        await handle.close();
        throw error;
      }
    } catch (error) {
      if (hasCode(error, 'ENOENT')) {
        return ok(null);
      }
      this.log.error({ err: error, location }, 'Failed to open blob');
      return err(createBlobStorageError('Failed to open file', error));
    }
  }

  async remove(location: string): Promise<Result<void, BlobStorageError>> {
    if (!isSafeLocation(location)) {
      return ok(undefined);
    }

    try {
      await fs.rm(path.join(this.rootDir, location), { force: true });
      return ok(undefined);
    } catch (error) {
      this.log.error({ err: error, location }, 'Failed to remove blob');
      return err(createBlobStorageError('Failed to remove file', error));
    }
  }

  async ensureRoot(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
  }

  private async discard(partPath: string): Promise<void> {
    await fs.rm(partPath, { force: true }).catch((error: unknown) => {
      this.log.warn({ err: error, partPath }, 'Failed to remove partial upload');
    });
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates the local blob storage, creating the root directory if needed.
 */
export const makeLocalBlobStorage = async (
  options: LocalBlobStorageOptions
): Promise<BlobStorage> => {
  const storage = new LocalBlobStorage(options);
  await storage.ensureRoot();
  return storage;
};
