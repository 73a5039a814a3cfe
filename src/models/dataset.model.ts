/**
 * Dataset Model
 *
 * Datasets are insert-only.
 */

import { query } from './db';
import { Dataset } from '../types';

export interface DatasetRepository {
  create(dataset: Dataset): Promise<Dataset>;
  findById(id: string): Promise<Dataset | null>;
  nameExists(name: string): Promise<boolean>;
  listAll(): Promise<Dataset[]>;
}

export const pgDatasetRepository: DatasetRepository = {
  async create(dataset) {
    const result = await query<Dataset>(
      `INSERT INTO datasets (id, name, description, version, owner_group_id, visibility, created_by, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING *`,
      [
        dataset.id,
        dataset.name,
        dataset.description,
        dataset.version,
        dataset.owner_group_id,
        dataset.visibility,
        dataset.created_by,
        dataset.created_at,
      ]
    );
    return result.rows[0];
  },

  async findById(id) {
    const result = await query<Dataset>('SELECT * FROM datasets WHERE id = $1', [id]);
    return result.rows[0] || null;
  },

  async nameExists(name) {
    const result = await query('SELECT 1 FROM datasets WHERE name = $1', [name]);
    return result.rowCount > 0;
  },

  async listAll() {
    const result = await query<Dataset>('SELECT * FROM datasets ORDER BY created_at DESC');
    return result.rows;
  },
};
