/**
 * User roles for RBAC (Role-Based Access Control)
 *
 * Roles form a closed set. Each operation declares the roles it accepts
 * and the service checks the caller's role against that set on every call:
 * - admin: manages users, datasets and everything below
 * - reviewer: reviews annotations and decides download requests
 * - uploader: creates datasets, uploads samples, submits annotations
 * - viewer: browses metadata and files download requests
 */
export type UserRole = 'admin' | 'reviewer' | 'uploader' | 'viewer';

export const USER_ROLES: readonly UserRole[] = ['admin', 'reviewer', 'uploader', 'viewer'];

/**
 * User stored in database
 * Note: password_hash, not password! We NEVER store plain passwords.
 * Users are never deleted, only deactivated, so audit entries keep a valid actor.
 */
export interface User {
  id: string;
  username: string;
  password_hash: string;
  role: UserRole;
  group_id: string | null;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

/**
 * What we send to clients (NO password hash!)
 */
export interface UserPublic {
  id: string;
  username: string;
  role: UserRole;
  group_id: string | null;
  is_active: boolean;
  created_at: Date;
}

/**
 * Registration request
 * `role` is only honoured when an admin performs the registration.
 */
export interface RegisterRequest {
  username: string;
  password: string;
  role?: UserRole;
  group_id?: string;
}

export interface LoginRequest {
  username: string;
  password: string;
}

/**
 * What we return after successful auth
 */
export interface AuthResponse {
  user: UserPublic;
  token: string;
  expiresAt: Date;
}

/**
 * The authenticated caller of an operation, resolved per request.
 */
export interface Principal {
  userId: string;
  role: UserRole;
  groupId: string | null;
}
