/**
 * Session Model
 *
 * A row per issued bearer token so logout and revocation work even though
 * JWTs are stateless. Only the SHA-256 of the token is stored.
 */

import { query } from './db';

export interface NewSession {
  id: string;
  user_id: string;
  token_hash: string;
  expires_at: Date;
  ip_address: string | null;
  user_agent: string | null;
  created_at: Date;
}

export interface SessionRepository {
  create(session: NewSession): Promise<void>;
  isValid(tokenHash: string, now: Date): Promise<boolean>;
  revoke(tokenHash: string, now: Date): Promise<boolean>;
  revokeAllForUser(userId: string, now: Date): Promise<number>;
}

export const pgSessionRepository: SessionRepository = {
  async create(session) {
    await query(
      `INSERT INTO sessions (id, user_id, token_hash, expires_at, ip_address, user_agent, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        session.id,
        session.user_id,
        session.token_hash,
        session.expires_at,
        session.ip_address,
        session.user_agent,
        session.created_at,
      ]
    );
  },

  async isValid(tokenHash, now) {
    const result = await query(
      `SELECT 1 FROM sessions
       WHERE token_hash = $1 AND revoked_at IS NULL AND expires_at > $2`,
      [tokenHash, now]
    );
    return result.rowCount > 0;
  },

  async revoke(tokenHash, now) {
    const result = await query(
      'UPDATE sessions SET revoked_at = $2 WHERE token_hash = $1 AND revoked_at IS NULL',
      [tokenHash, now]
    );
    return result.rowCount > 0;
  },

  async revokeAllForUser(userId, now) {
    const result = await query(
      'UPDATE sessions SET revoked_at = $2 WHERE user_id = $1 AND revoked_at IS NULL',
      [userId, now]
    );
    return result.rowCount;
  },
};
