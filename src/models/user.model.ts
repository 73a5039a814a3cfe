/**
 * User Model
 *
 * This file handles all database operations for users.
 * Models are the ONLY place we write SQL queries.
 *
 * WHY PARAMETERIZED QUERIES ($1, $2, etc.)?
 * - Prevents SQL injection attacks
 * - Never concatenate user input into SQL strings!
 */

import { query } from './db';
import { User, UserPublic, UserRole } from '../types';

export interface NewUser {
  id: string;
  username: string;
  password_hash: string;
  role: UserRole;
  group_id: string | null;
  created_at: Date;
}

export interface UserRepository {
  create(user: NewUser): Promise<User>;
  /** Active users only (login) */
  findByUsername(username: string): Promise<User | null>;
  /** Includes deactivated users; callers check `is_active` */
  findById(id: string): Promise<User | null>;
  usernameExists(username: string): Promise<boolean>;
  count(): Promise<number>;
  updateRole(id: string, role: UserRole, now: Date): Promise<User | null>;
  deactivate(id: string, now: Date): Promise<User | null>;
}

/**
 * Convert database row to UserPublic (removes password_hash)
 */
export function toUserPublic(user: User): UserPublic {
  return {
    id: user.id,
    username: user.username,
    role: user.role,
    group_id: user.group_id,
    is_active: user.is_active,
    created_at: user.created_at,
  };
}

/**
 * Create a new user
 */
export async function createUser(user: NewUser): Promise<User> {
  const sql = `
    INSERT INTO users (id, username, password_hash, role, group_id, is_active, created_at, updated_at)
    VALUES ($1, $2, $3, $4, $5, true, $6, $6)
    RETURNING *
  `;

  const result = await query<User>(sql, [
    user.id,
    user.username.toLowerCase(), // Normalize username to lowercase
    user.password_hash,
    user.role,
    user.group_id,
    user.created_at,
  ]);
  return result.rows[0];
}

/**
 * Find user by username (includes password_hash for login verification)
 */
export async function findUserByUsername(username: string): Promise<User | null> {
  const sql = 'SELECT * FROM users WHERE username = $1 AND is_active = true';
  const result = await query<User>(sql, [username.toLowerCase()]);
  return result.rows[0] || null;
}

export async function findUserById(id: string): Promise<User | null> {
  const result = await query<User>('SELECT * FROM users WHERE id = $1', [id]);
  return result.rows[0] || null;
}

/**
 * Check if username exists (active or not; usernames are never reused)
 */
export async function usernameExists(username: string): Promise<boolean> {
  const result = await query('SELECT 1 FROM users WHERE username = $1', [username.toLowerCase()]);
  return result.rowCount > 0;
}

export async function countUsers(): Promise<number> {
  const result = await query<{ count: string }>('SELECT COUNT(*) AS count FROM users');
  return parseInt(result.rows[0].count, 10);
}

/**
 * Change a user's role (admin action)
 */
export async function updateUserRole(id: string, role: UserRole, now: Date): Promise<User | null> {
  const result = await query<User>(
    'UPDATE users SET role = $2, updated_at = $3 WHERE id = $1 RETURNING *',
    [id, role, now]
  );
  return result.rows[0] || null;
}

/**
 * Deactivate a user (soft delete)
 */
export async function deactivateUser(id: string, now: Date): Promise<User | null> {
  const result = await query<User>(
    'UPDATE users SET is_active = false, updated_at = $2 WHERE id = $1 RETURNING *',
    [id, now]
  );
  return result.rows[0] || null;
}

export const pgUserRepository: UserRepository = {
  create: createUser,
  findByUsername: findUserByUsername,
  findById: findUserById,
  usernameExists,
  count: countUsers,
  updateRole: updateUserRole,
  deactivate: deactivateUser,
};
