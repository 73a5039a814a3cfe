/**
 * Audit Log Model
 *
 * INSERT and SELECT only.
 *
 * Appends are serialized under one advisory lock so each entry sees the
 * true tail of the chain when its hash is computed.
 */

import { query, withTransaction, lockKey } from './db';
import { AuditLogEntry, AuditQuery } from '../types';

export interface AuditChainTail {
  seq: number;
  entry_hash: string;
}

export interface AuditRepository {
  /** `build` receives the current tail (null for the first entry) and returns the entry to insert */
  append(build: (tail: AuditChainTail | null) => AuditLogEntry): Promise<AuditLogEntry>;
  /** Newest first */
  query(filter: AuditQuery): Promise<AuditLogEntry[]>;
  /** Oldest first, entries with seq > afterSeq */
  listAfter(afterSeq: number, limit: number): Promise<AuditLogEntry[]>;
  /** Throws unless the current role can append to the sink */
  ping(): Promise<void>;
}

const DEFAULT_LIMIT = 100;

export const pgAuditRepository: AuditRepository = {
  async append(build) {
    return withTransaction(async (client) => {
      await lockKey(client, 'audit-chain');

      const tail = await query<AuditChainTail>(
        'SELECT seq, entry_hash FROM audit_logs ORDER BY seq DESC LIMIT 1',
        [],
        client
      );
      const entry = build(tail.rows[0] || null);

      await query(
        `INSERT INTO audit_logs (
           id, seq, timestamp, actor_id, action, target_type, target_id,
           ip_address_hash, user_agent_hash, outcome, reason_code, metadata,
           prev_hash, entry_hash
         )
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)`,
        [
          entry.id,
          entry.seq,
          entry.timestamp,
          entry.actor_id,
          entry.action,
          entry.target_type,
          entry.target_id,
          entry.ip_address_hash,
          entry.user_agent_hash,
          entry.outcome,
          entry.reason_code,
          JSON.stringify(entry.metadata),
          entry.prev_hash,
          entry.entry_hash,
        ],
        client
      );
      return entry;
    });
  },

  async query(filter) {
    const conditions: string[] = [];
    const params: unknown[] = [];
    const add = (column: string, op: string, value: unknown) => {
      params.push(value);
      conditions.push(`${column} ${op} $${params.length}`);
    };

    if (filter.actorId) add('actor_id', '=', filter.actorId);
    if (filter.targetType) add('target_type', '=', filter.targetType);
    if (filter.targetId) add('target_id', '=', filter.targetId);
    if (filter.action) add('action', '=', filter.action);
    if (filter.from) add('timestamp', '>=', filter.from);
    if (filter.to) add('timestamp', '<=', filter.to);

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filter.limit ?? DEFAULT_LIMIT);
    const limitParam = params.length;
    params.push(filter.offset ?? 0);
    const offsetParam = params.length;

    const result = await query<AuditLogEntry>(
      `SELECT * FROM audit_logs ${where}
       ORDER BY seq DESC
       LIMIT $${limitParam} OFFSET $${offsetParam}`,
      params
    );
    return result.rows;
  },

  async listAfter(afterSeq, limit) {
    const result = await query<AuditLogEntry>(
      'SELECT * FROM audit_logs WHERE seq > $1 ORDER BY seq ASC LIMIT $2',
      [afterSeq, limit]
    );
    return result.rows;
  },

  async ping() {
    const result = await query<{ can_insert: boolean }>(
      "SELECT has_table_privilege(current_user, 'audit_logs', 'INSERT') AS can_insert"
    );
    if (!result.rows[0]?.can_insert) {
      throw new Error('The database role lacks INSERT on audit_logs');
    }
  },
};
