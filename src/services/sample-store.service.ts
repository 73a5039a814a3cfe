/**
 * Content-Addressed Sample Store
 *
 * A sample's identity is the digest of its bytes. Identical uploads share one
 * blob: the second `put` skips the physical write but still creates its own
 * sample record. Within this process the exists-then-write step runs under a
 * per-digest lock; across processes the atomic rename keeps one file per
 * digest.
 */

import type { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { RequestContext, Sample, SamplePublic, UploadSampleInput } from '../types';
import type { SampleRepository } from '../models';
import { NotFoundError, StorageIOError, UnsupportedMediaTypeError } from '../utils/errors.utils';
import { digestBytes } from '../utils/hash.utils';
import { KeyedMutex } from '../utils/lock.utils';
import { logWarning } from '../utils/logger.utils';
import { withRetry, withTimeout } from '../utils/timeout.utils';
import type { AuditService } from './audit.service';
import { BlobStore, blobPathForDigest } from './blob.service';
import type { DatasetService } from './dataset.service';
import { ROLES, requirePrincipal, requireRole } from './identity.service';

export function toSamplePublic(sample: Sample): SamplePublic {
  return {
    id: sample.id,
    dataset_id: sample.dataset_id,
    digest: sample.digest,
    mime_type: sample.mime_type,
    original_filename: sample.original_filename,
    size_bytes: sample.size_bytes,
    uploaded_by: sample.uploaded_by,
    created_at: sample.created_at,
  };
}

export interface SampleContent {
  sample: Sample;
  stream: Readable;
}

export interface SampleStore {
  put(ctx: RequestContext, input: UploadSampleInput): Promise<Sample>;
  /**
   * Open a sample's bytes. NotFound carries SAMPLE_NOT_FOUND when the record is
   * missing and BLOB_MISSING when the record exists but its blob does not.
   */
  get(sampleId: string): Promise<SampleContent>;
  exists(digest: string): Promise<boolean>;
  /** The sample record, provided its blob is still present */
  requireSample(sampleId: string): Promise<Sample>;
  getSample(ctx: RequestContext, sampleId: string): Promise<SamplePublic>;
  listByDataset(ctx: RequestContext, datasetId: string): Promise<SamplePublic[]>;
}

export interface SampleStoreDeps {
  samples: SampleRepository;
  blobs: BlobStore;
  datasets: DatasetService;
  audit: AuditService;
  allowedMimeTypes: readonly string[];
  digestAlgorithm: string;
  storageTimeoutMs: number;
  storageWriteRetries: number;
  now: () => Date;
}

export function createSampleStore(deps: SampleStoreDeps): SampleStore {
  const { samples, blobs, datasets, audit, allowedMimeTypes, digestAlgorithm, now } = deps;
  const digestLocks = new KeyedMutex();

  function bounded<T>(operation: Promise<T>): Promise<T> {
    return withTimeout(operation, deps.storageTimeoutMs, () => new StorageIOError('STORAGE_TIMEOUT'));
  }

  async function findRecord(sampleId: string): Promise<Sample> {
    const sample = await samples.findById(sampleId);
    if (!sample) {
      throw new NotFoundError('Sample', 'SAMPLE_NOT_FOUND');
    }
    return sample;
  }

  /**
   * Write the blob unless it is already stored
   * @returns true when the write was skipped
   */
  async function storeBlob(digest: string, storagePath: string, bytes: Buffer): Promise<boolean> {
    return digestLocks.runExclusive(digest, async () => {
      if (await bounded(blobs.exists(storagePath))) {
        return true;
      }
      await withRetry(() => bounded(blobs.writeAtomic(storagePath, bytes)), {
        retries: deps.storageWriteRetries,
        onRetry: (_error, attempt) =>
          logWarning('storage.write_retry', 'Retrying blob write', undefined, { attempt }),
      });
      return false;
    });
  }

  async function requireSample(sampleId: string): Promise<Sample> {
    const sample = await findRecord(sampleId);
    if (!(await bounded(blobs.exists(sample.storage_path)))) {
      throw new NotFoundError('Sample content', 'BLOB_MISSING');
    }
    return sample;
  }

  return {
    requireSample,

    async put(ctx, input) {
      let deduplicated = false;
      return audit.audited(
        ctx,
        {
          action: 'sample.upload',
          targetType: 'sample',
          metadata: { dataset_id: input.datasetId },
          onSuccess: (sample) => ({
            targetId: sample.id,
            metadata: { size_bytes: sample.size_bytes, deduplicated },
          }),
        },
        async () => {
          const principal = requireRole(ctx, ROLES.upload);
          await datasets.requireVisible(principal, input.datasetId);

          const mimeType = input.mimeType.toLowerCase();
          if (!allowedMimeTypes.includes(mimeType)) {
            throw new UnsupportedMediaTypeError(mimeType);
          }

          const digest = digestBytes(input.bytes, digestAlgorithm);
          const storagePath = blobPathForDigest(digestAlgorithm, digest);
          deduplicated = await storeBlob(digest, storagePath, input.bytes);

          return samples.create({
            id: uuidv4(),
            dataset_id: input.datasetId,
            digest,
            digest_algorithm: digestAlgorithm,
            storage_path: storagePath,
            mime_type: mimeType,
            original_filename: input.filename,
            size_bytes: input.bytes.length,
            uploaded_by: principal.userId,
            created_at: now(),
          });
        }
      );
    },

    async get(sampleId) {
      const sample = await findRecord(sampleId);
      const stream = await bounded(blobs.readStream(sample.storage_path));
      if (!stream) {
        throw new NotFoundError('Sample content', 'BLOB_MISSING');
      }
      return { sample, stream };
    },

    async exists(digest) {
      return bounded(blobs.exists(blobPathForDigest(digestAlgorithm, digest)));
    },

    async getSample(ctx, sampleId) {
      return audit.recordDenials(ctx, { type: 'sample', id: sampleId }, async () => {
        const principal = requirePrincipal(ctx);
        const sample = await findRecord(sampleId);
        await datasets.requireVisible(principal, sample.dataset_id);
        return toSamplePublic(sample);
      });
    },

    async listByDataset(ctx, datasetId) {
      return audit.recordDenials(ctx, { type: 'dataset', id: datasetId }, async () => {
        await datasets.requireVisible(requirePrincipal(ctx), datasetId);
        const records = await samples.listByDataset(datasetId);
        return records.map(toSamplePublic);
      });
    },
  };
}
