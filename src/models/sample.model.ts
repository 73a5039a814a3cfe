/**
 * Sample Model
 *
 * Sample rows are never updated. Several rows may share one digest
 * (and therefore one blob) when identical bytes were uploaded twice.
 */

import { query } from './db';
import { Sample } from '../types';

export interface SampleRepository {
  create(sample: Sample): Promise<Sample>;
  findById(id: string): Promise<Sample | null>;
  listByDataset(datasetId: string): Promise<Sample[]>;
}

export const pgSampleRepository: SampleRepository = {
  async create(sample) {
    const result = await query<Sample>(
      `INSERT INTO samples (
         id, dataset_id, digest, digest_algorithm, storage_path, mime_type,
         original_filename, size_bytes, uploaded_by, created_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       RETURNING *`,
      [
        sample.id,
        sample.dataset_id,
        sample.digest,
        sample.digest_algorithm,
        sample.storage_path,
        sample.mime_type,
        sample.original_filename,
        sample.size_bytes,
        sample.uploaded_by,
        sample.created_at,
      ]
    );
    return result.rows[0];
  },

  async findById(id) {
    const result = await query<Sample>('SELECT * FROM samples WHERE id = $1', [id]);
    return result.rows[0] || null;
  },

  async listByDataset(datasetId) {
    const result = await query<Sample>(
      'SELECT * FROM samples WHERE dataset_id = $1 ORDER BY created_at DESC',
      [datasetId]
    );
    return result.rows;
  },
};
