/**
 * Annotation Model
 *
 * Status changes go through `transition`, a compare-and-set on the current
 * status: of two concurrent transitions from the same state only one row
 * update matches, the other gets null back.
 */

import { query, withTransaction, lockKey } from './db';
import { Annotation, AnnotationStatus, AnnotationType } from '../types';

export interface NewAnnotation {
  id: string;
  sample_id: string;
  author_id: string;
  anno_type: AnnotationType;
  payload: Record<string, unknown>;
  supersedes_id: string | null;
  submitted_at: Date;
}

export interface AnnotationTransitionPatch {
  status: AnnotationStatus;
  reviewer_id?: string;
  review_started_at?: Date;
  decided_at?: Date;
}

export interface AnnotationRepository {
  /** Inserts in `submitted` with the next per-sample version number */
  create(annotation: NewAnnotation): Promise<Annotation>;
  findById(id: string): Promise<Annotation | null>;
  listBySample(sampleId: string): Promise<Annotation[]>;
  /** Applies `patch` only if the row is still in `from`; null otherwise */
  transition(id: string, from: AnnotationStatus, patch: AnnotationTransitionPatch): Promise<Annotation | null>;
}

export const pgAnnotationRepository: AnnotationRepository = {
  async create(annotation) {
    return withTransaction(async (client) => {
      // Version numbers are allocated per sample
      await lockKey(client, `annotation-version:${annotation.sample_id}`);

      const last = await query<{ version: number | null }>(
        'SELECT MAX(version) AS version FROM annotations WHERE sample_id = $1',
        [annotation.sample_id],
        client
      );
      const nextVersion = (last.rows[0]?.version ?? 0) + 1;

      const result = await query<Annotation>(
        `INSERT INTO annotations (
           id, sample_id, author_id, anno_type, payload, status, version, supersedes_id, submitted_at
         )
         VALUES ($1, $2, $3, $4, $5, 'submitted', $6, $7, $8)
         RETURNING *`,
        [
          annotation.id,
          annotation.sample_id,
          annotation.author_id,
          annotation.anno_type,
          JSON.stringify(annotation.payload),
          nextVersion,
          annotation.supersedes_id,
          annotation.submitted_at,
        ],
        client
      );
      return result.rows[0];
    });
  },

  async findById(id) {
    const result = await query<Annotation>('SELECT * FROM annotations WHERE id = $1', [id]);
    return result.rows[0] || null;
  },

  async listBySample(sampleId) {
    const result = await query<Annotation>(
      'SELECT * FROM annotations WHERE sample_id = $1 ORDER BY version ASC',
      [sampleId]
    );
    return result.rows;
  },

  async transition(id, from, patch) {
    const result = await query<Annotation>(
      `UPDATE annotations
       SET status = $3,
           reviewer_id = COALESCE($4, reviewer_id),
           review_started_at = COALESCE($5, review_started_at),
           decided_at = COALESCE($6, decided_at)
       WHERE id = $1 AND status = $2
       RETURNING *`,
      [
        id,
        from,
        patch.status,
        patch.reviewer_id ?? null,
        patch.review_started_at ?? null,
        patch.decided_at ?? null,
      ]
    );
    return result.rows[0] || null;
  },
};
