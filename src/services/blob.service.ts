/**
 * Blob Store
 *
 * Raw bytes on the local filesystem under a root directory. Paths are a fixed
 * function of the digest with a two-level fan-out:
 *
 *   sha256/ab/cd/abcd1234...
 *
 * Writes go to a temp file in the target directory and are renamed into place,
 * so a reader never sees a partial blob and a failed write leaves nothing
 * behind.
 */

import { createReadStream } from 'fs';
import { mkdir, rename, rm, stat, writeFile } from 'fs/promises';
import path from 'path';
import type { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { StorageIOError } from '../utils/errors.utils';
import { logSystemError } from '../utils/logger.utils';

export interface BlobStore {
  writeAtomic(relativePath: string, bytes: Buffer): Promise<void>;
  /** Resolves to null when no blob exists at the path */
  readStream(relativePath: string): Promise<Readable | null>;
  exists(relativePath: string): Promise<boolean>;
}

export function blobPathForDigest(algorithm: string, digest: string): string {
  return path.posix.join(algorithm, digest.slice(0, 2), digest.slice(2, 4), digest);
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

export function createFsBlobStore(root: string): BlobStore {
  const base = path.resolve(root);

  function resolve(relativePath: string): string {
    const full = path.resolve(base, relativePath);
    if (!full.startsWith(base + path.sep)) {
      throw new StorageIOError('INVALID_BLOB_PATH');
    }
    return full;
  }

  return {
    async writeAtomic(relativePath, bytes) {
      const target = resolve(relativePath);
      const temp = `${target}.${uuidv4()}.tmp`;

      try {
        await mkdir(path.dirname(target), { recursive: true });
        await writeFile(temp, bytes, { flag: 'wx' });
        await rename(temp, target);
      } catch (error) {
        await rm(temp, { force: true }).catch((cleanupError: unknown) => {
          logSystemError('storage.temp_cleanup_failed', 'Could not remove temporary blob file', cleanupError);
        });
        throw new StorageIOError('BLOB_WRITE_FAILED', error);
      }
    },

    async readStream(relativePath) {
      const full = resolve(relativePath);
      try {
        const info = await stat(full);
        if (!info.isFile()) {
          return null;
        }
      } catch (error) {
        if (isMissing(error)) {
          return null;
        }
        throw new StorageIOError('BLOB_READ_FAILED', error);
      }
      return createReadStream(full);
    },

    async exists(relativePath) {
      const full = resolve(relativePath);
      try {
        const info = await stat(full);
        return info.isFile();
      } catch (error) {
        if (isMissing(error)) {
          return false;
        }
        throw new StorageIOError('BLOB_READ_FAILED', error);
      }
    },
  };
}
