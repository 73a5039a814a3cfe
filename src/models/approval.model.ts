/**
 * Approval Request Model
 *
 * Two guarantees live here rather than in the service:
 * - at most one active request per (requester, sample): the check and the
 *   insert run in one transaction holding an advisory lock on the pair
 * - a status change applies only if the row is still in the expected status
 *   (compare-and-set), so two concurrent decisions cannot both succeed
 */

import { query, withTransaction, lockKey } from './db';
import { ApprovalRequest, ApprovalStatus } from '../types';

export interface ApprovalTransitionPatch {
  status: ApprovalStatus;
  reviewer_id?: string;
  decided_at?: Date;
  expires_at?: Date;
  updated_at: Date;
}

/** A patch plus the status it applies from */
export interface ApprovalStatusChange extends ApprovalTransitionPatch {
  from: ApprovalStatus;
}

export interface ApprovalListFilter {
  requesterId?: string;
  sampleId?: string;
  status?: ApprovalStatus;
}

export interface ApprovalRepository {
  /**
   * Insert unless the pair already has a pending request or an approved one
   * whose grant is still running at `now`. Returns null in that case.
   */
  createIfNoActive(request: ApprovalRequest, now: Date): Promise<ApprovalRequest | null>;
  findById(id: string): Promise<ApprovalRequest | null>;
  list(filter: ApprovalListFilter): Promise<ApprovalRequest[]>;
  transition(id: string, from: ApprovalStatus, patch: ApprovalTransitionPatch): Promise<ApprovalRequest | null>;
  /** Apply `change` to every request in `change.from` whose grant ended before `change.updated_at` */
  expireStale(change: ApprovalStatusChange): Promise<ApprovalRequest[]>;
}

export const pgApprovalRepository: ApprovalRepository = {
  async createIfNoActive(request, now) {
    return withTransaction(async (client) => {
      await lockKey(client, `approval:${request.requester_id}:${request.sample_id}`);

      const active = await query(
        `SELECT 1 FROM approval_requests
         WHERE requester_id = $1 AND sample_id = $2
           AND (status = 'pending' OR (status = 'approved' AND expires_at >= $3))
         LIMIT 1`,
        [request.requester_id, request.sample_id, now],
        client
      );
      if (active.rowCount > 0) {
        return null;
      }

      const result = await query<ApprovalRequest>(
        `INSERT INTO approval_requests (
           id, requester_id, sample_id, justification, status,
           reviewer_id, decided_at, expires_at, created_at, updated_at
         )
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         RETURNING *`,
        [
          request.id,
          request.requester_id,
          request.sample_id,
          request.justification,
          request.status,
          request.reviewer_id,
          request.decided_at,
          request.expires_at,
          request.created_at,
          request.updated_at,
        ],
        client
      );
      return result.rows[0];
    });
  },

  async findById(id) {
    const result = await query<ApprovalRequest>('SELECT * FROM approval_requests WHERE id = $1', [id]);
    return result.rows[0] || null;
  },

  async list(filter) {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.requesterId) {
      params.push(filter.requesterId);
      conditions.push(`requester_id = $${params.length}`);
    }
    if (filter.sampleId) {
      params.push(filter.sampleId);
      conditions.push(`sample_id = $${params.length}`);
    }
    if (filter.status) {
      params.push(filter.status);
      conditions.push(`status = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await query<ApprovalRequest>(
      `SELECT * FROM approval_requests ${where} ORDER BY created_at DESC LIMIT 500`,
      params
    );
    return result.rows;
  },

  async transition(id, from, patch) {
    const result = await query<ApprovalRequest>(
      `UPDATE approval_requests
       SET status = $3,
           reviewer_id = COALESCE($4, reviewer_id),
           decided_at = COALESCE($5, decided_at),
           expires_at = COALESCE($6, expires_at),
           updated_at = $7
       WHERE id = $1 AND status = $2
       RETURNING *`,
      [
        id,
        from,
        patch.status,
        patch.reviewer_id ?? null,
        patch.decided_at ?? null,
        patch.expires_at ?? null,
        patch.updated_at,
      ]
    );
    return result.rows[0] || null;
  },

  async expireStale(change) {
    const result = await query<ApprovalRequest>(
      `UPDATE approval_requests
       SET status = $2, updated_at = $3
       WHERE status = $1 AND expires_at < $3
       RETURNING *`,
      [change.from, change.status, change.updated_at]
    );
    return result.rows;
  },
};
