/**
 * Identity Service
 *
 * JWT (JSON Web Token) EXPLAINED:
 *
 * A JWT has 3 parts separated by dots: HEADER.PAYLOAD.SIGNATURE
 * The signature is an HMAC over header and payload with our secret, so a
 * tampered payload fails verification.
 *
 * FLOW:
 * 1. User sends username + password
 * 2. We verify the password against the bcrypt hash
 * 3. We sign a JWT carrying userId + role and store a session row (token hash)
 * 4. Client sends the JWT with every request (Authorization: Bearer ...)
 * 5. We verify the signature, check the session is not revoked, and re-read
 *    the user: the role used for authorization always comes from the database
 *
 * ROLES:
 * Operations declare the set of roles they accept (see ROLES) and call
 * requireRole on every invocation. There is no role hierarchy.
 */

import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import {
  AuthResponse,
  LoginRequest,
  Principal,
  RegisterRequest,
  RequestContext,
  UserPublic,
  UserRole,
  USER_ROLES,
} from '../types';
import type { SessionRepository, UserRepository } from '../models';
import { toUserPublic } from '../models/user.model';
import {
  ForbiddenError,
  NotFoundError,
  UnauthenticatedError,
  ValidationError,
  usernameTakenError,
} from '../utils/errors.utils';
import { hashPassword, sha256Hash, verifyPassword } from '../utils/hash.utils';
import { assertValid, isUserRole, validateRegistration } from '../utils/validation.utils';
import type { AuditService } from './audit.service';

/**
 * Capability sets: which roles may perform which kind of operation
 */
export const ROLES = {
  administer: ['admin'],
  upload: ['uploader', 'admin'],
  annotate: ['uploader', 'reviewer', 'admin'],
  review: ['reviewer', 'admin'],
  readAudit: ['reviewer', 'admin'],
} as const satisfies Record<string, readonly UserRole[]>;

/**
 * The authenticated caller, or Unauthenticated
 */
export function requirePrincipal(ctx: RequestContext): Principal {
  if (!ctx.principal) {
    throw new UnauthenticatedError();
  }
  return ctx.principal;
}

/**
 * The authenticated caller, provided their role is in `allowed`
 * @throws UnauthenticatedError | ForbiddenError
 */
export function requireRole(ctx: RequestContext, allowed: readonly UserRole[]): Principal {
  const principal = requirePrincipal(ctx);
  if (!allowed.includes(principal.role)) {
    throw new ForbiddenError('ROLE_NOT_PERMITTED');
  }
  return principal;
}

/**
 * What we store in the JWT payload
 */
interface AccessTokenClaims {
  userId: string;
  username: string;
  role: UserRole;
  groupId: string | null;
}

export interface IdentityService {
  register(ctx: RequestContext, data: Partial<RegisterRequest>): Promise<UserPublic>;
  login(ctx: RequestContext, credentials: Partial<LoginRequest>): Promise<AuthResponse>;
  logout(ctx: RequestContext, token: string): Promise<void>;
  /**
   * Resolve a bearer token to the current principal
   * @throws UnauthenticatedError for a missing, invalid, expired or revoked token, or an inactive account
   */
  resolvePrincipal(token: string | null): Promise<Principal>;
  me(ctx: RequestContext): Promise<UserPublic>;
  changeRole(ctx: RequestContext, userId: string, role: unknown): Promise<UserPublic>;
  deactivate(ctx: RequestContext, userId: string): Promise<UserPublic>;
}

export interface IdentityServiceDeps {
  users: UserRepository;
  sessions: SessionRepository;
  audit: AuditService;
  jwtSecret: string;
  accessTokenExpireMinutes: number;
  bcryptRounds: number;
  now: () => Date;
}

const ACCESS_TOKEN_AUDIENCE = 'api';

export function createIdentityService(deps: IdentityServiceDeps): IdentityService {
  const { users, sessions, audit, jwtSecret, accessTokenExpireMinutes, bcryptRounds, now } = deps;

  function epochSeconds(date: Date): number {
    return Math.floor(date.getTime() / 1000);
  }

  async function issueToken(ctx: RequestContext, userId: string, claims: AccessTokenClaims): Promise<{ token: string; expiresAt: Date }> {
    const issuedAt = epochSeconds(now());
    const exp = issuedAt + accessTokenExpireMinutes * 60;

    const token = jwt.sign({ ...claims, iat: issuedAt, exp }, jwtSecret, {
      algorithm: 'HS256',
      audience: ACCESS_TOKEN_AUDIENCE,
      jwtid: uuidv4(),
    });
    const expiresAt = new Date(exp * 1000);

    // Store session in database (for logout/revocation)
    await sessions.create({
      id: uuidv4(),
      user_id: userId,
      token_hash: sha256Hash(token), // Store hash, not actual token
      expires_at: expiresAt,
      ip_address: ctx.ipAddress ?? null,
      user_agent: ctx.userAgent ?? null,
      created_at: now(),
    });

    return { token, expiresAt };
  }

  function verifyAccessToken(token: string): string {
    try {
      const payload = jwt.verify(token, jwtSecret, {
        algorithms: ['HS256'],
        audience: ACCESS_TOKEN_AUDIENCE,
        clockTimestamp: epochSeconds(now()),
      });
      if (typeof payload === 'string' || typeof payload.userId !== 'string') {
        throw new UnauthenticatedError('INVALID_TOKEN');
      }
      return payload.userId;
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new UnauthenticatedError('TOKEN_EXPIRED');
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new UnauthenticatedError('INVALID_TOKEN');
      }
      throw error;
    }
  }

  return {
    async register(ctx, data) {
      return audit.audited(
        ctx,
        {
          action: 'auth.register',
          targetType: 'user',
          onSuccess: (user) => ({ targetId: user.id, metadata: { role: user.role } }),
        },
        async () => {
          assertValid(validateRegistration(data));
          const username = data.username ?? '';
          const password = data.password ?? '';

          // The very first account bootstraps the system as admin
          const isFirstUser = (await users.count()) === 0;
          const byAdmin = ctx.principal?.role === 'admin';

          if (!isFirstUser && !byAdmin && ((data.role && data.role !== 'viewer') || data.group_id)) {
            throw new ForbiddenError('ADMIN_REQUIRED', 'Only an admin can assign roles or groups.');
          }

          if (await users.usernameExists(username)) {
            throw usernameTakenError();
          }

          let role: UserRole = 'viewer';
          if (isFirstUser) {
            role = 'admin';
          } else if (byAdmin && data.role) {
            role = data.role;
          }

          const user = await users.create({
            id: uuidv4(),
            username,
            password_hash: await hashPassword(password, bcryptRounds),
            role,
            group_id: data.group_id ?? null,
            created_at: now(),
          });
          return toUserPublic(user);
        }
      );
    },

    async login(ctx, credentials) {
      return audit.audited(
        ctx,
        {
          action: 'auth.login',
          failureAction: 'auth.login_failed',
          targetType: 'user',
          onSuccess: (auth) => ({ targetId: auth.user.id }),
        },
        async () => {
          const { username, password } = credentials;
          if (typeof username !== 'string' || typeof password !== 'string' || !username || !password) {
            throw new UnauthenticatedError('INVALID_CREDENTIALS');
          }

          const user = await users.findByUsername(username);
          if (!user || !(await verifyPassword(password, user.password_hash))) {
            throw new UnauthenticatedError('INVALID_CREDENTIALS');
          }

          const { token, expiresAt } = await issueToken(ctx, user.id, {
            userId: user.id,
            username: user.username,
            role: user.role,
            groupId: user.group_id,
          });

          return { user: toUserPublic(user), token, expiresAt };
        }
      );
    },

    async logout(ctx, token) {
      const principal = requirePrincipal(ctx);
      await audit.audited(ctx, { action: 'auth.logout', targetType: 'user', targetId: principal.userId }, async () => {
        await sessions.revoke(sha256Hash(token), now());
      });
    },

    async resolvePrincipal(token) {
      if (!token) {
        throw new UnauthenticatedError('NO_TOKEN');
      }

      const userId = verifyAccessToken(token);

      if (!(await sessions.isValid(sha256Hash(token), now()))) {
        throw new UnauthenticatedError('SESSION_REVOKED');
      }

      const user = await users.findById(userId);
      if (!user || !user.is_active) {
        throw new UnauthenticatedError('ACCOUNT_INACTIVE');
      }

      return { userId: user.id, role: user.role, groupId: user.group_id };
    },

    async me(ctx) {
      const principal = requirePrincipal(ctx);
      const user = await users.findById(principal.userId);
      if (!user) {
        throw new NotFoundError('User', 'USER_NOT_FOUND');
      }
      return toUserPublic(user);
    },

    async changeRole(ctx, userId, role) {
      let previousRole: UserRole | null = null;
      return audit.audited(
        ctx,
        {
          action: 'user.role_change',
          targetType: 'user',
          targetId: userId,
          onSuccess: (user) => ({ metadata: { from: previousRole, to: user.role } }),
        },
        async () => {
          const principal = requireRole(ctx, ROLES.administer);
          if (!isUserRole(role)) {
            throw new ValidationError([{ field: 'role', message: `Role must be one of: ${USER_ROLES.join(', ')}` }]);
          }
          if (principal.userId === userId) {
            throw new ForbiddenError('SELF_ROLE_CHANGE', 'Admins cannot change their own role.');
          }

          const existing = await users.findById(userId);
          if (!existing) {
            throw new NotFoundError('User', 'USER_NOT_FOUND');
          }
          previousRole = existing.role;

          const updated = await users.updateRole(userId, role, now());
          if (!updated) {
            throw new NotFoundError('User', 'USER_NOT_FOUND');
          }
          return toUserPublic(updated);
        }
      );
    },

    async deactivate(ctx, userId) {
      let revokedSessions = 0;
      return audit.audited(
        ctx,
        {
          action: 'user.deactivate',
          targetType: 'user',
          targetId: userId,
          onSuccess: () => ({ metadata: { revoked_sessions: revokedSessions } }),
        },
        async () => {
          const principal = requireRole(ctx, ROLES.administer);
          if (principal.userId === userId) {
            throw new ForbiddenError('SELF_DEACTIVATION', 'Admins cannot deactivate themselves.');
          }

          const updated = await users.deactivate(userId, now());
          if (!updated) {
            throw new NotFoundError('User', 'USER_NOT_FOUND');
          }
          revokedSessions = await sessions.revokeAllForUser(userId, now());
          return toUserPublic(updated);
        }
      );
    },
  };
}
