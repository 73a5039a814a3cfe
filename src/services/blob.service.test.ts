import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { text } from 'stream/consumers';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StorageIOError } from '../utils/errors.utils';
import { blobPathForDigest, createFsBlobStore } from './blob.service';

describe('blob store', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'medimg-blob-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('fans paths out by the first two byte pairs of the digest', () => {
    expect(blobPathForDigest('sha256', 'abcdef0123')).toBe('sha256/ab/cd/abcdef0123');
  });

  it('writes atomically and leaves no temp file behind', async () => {
    const store = createFsBlobStore(root);
    await store.writeAtomic('sha256/ab/cd/abcdef', Buffer.from('pixels'));

    expect(await readFile(path.join(root, 'sha256/ab/cd/abcdef'), 'utf8')).toBe('pixels');
    expect(await readdir(path.join(root, 'sha256/ab/cd'))).toEqual(['abcdef']);
    expect(await store.exists('sha256/ab/cd/abcdef')).toBe(true);
  });

  it('reads back what it wrote', async () => {
    const store = createFsBlobStore(root);
    await store.writeAtomic('sha256/00/11/0011', Buffer.from('slice-1'));

    const stream = await store.readStream('sha256/00/11/0011');
    expect(stream).not.toBeNull();
    if (stream) {
      expect(await text(stream)).toBe('slice-1');
    }
  });

  it('treats a missing blob as absent', async () => {
    const store = createFsBlobStore(root);
    expect(await store.exists('sha256/ff/ff/ffff')).toBe(false);
    expect(await store.readStream('sha256/ff/ff/ffff')).toBeNull();
  });

  it('fails a write without leaving partial files when the root is unusable', async () => {
    const fileRoot = path.join(root, 'not-a-directory');
    await writeFile(fileRoot, 'occupied');
    const store = createFsBlobStore(fileRoot);

    await expect(store.writeAtomic('sha256/ab/cd/abcdef', Buffer.from('pixels'))).rejects.toMatchObject({
      code: 'STORAGE_IO_ERROR',
      reason: 'BLOB_WRITE_FAILED',
    });
    expect(await readdir(root)).toEqual(['not-a-directory']);
    expect(await readFile(fileRoot, 'utf8')).toBe('occupied');
  });

  it('refuses paths that escape the root', async () => {
    const store = createFsBlobStore(root);
    await expect(store.writeAtomic('../escape', Buffer.from('x'))).rejects.toBeInstanceOf(StorageIOError);
    await expect(store.exists('../../etc/passwd')).rejects.toMatchObject({ reason: 'INVALID_BLOB_PATH' });
  });
});
