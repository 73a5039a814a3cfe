/**
 * Authentication Middleware
 *
 * Extracts the JWT from the Authorization header, resolves it to the current
 * principal and attaches it to the request. Role checks happen in the
 * services, per operation.
 *
 * AUTHORIZATION HEADER FORMAT:
 * Authorization: Bearer <token>
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { AuthenticatedRequest } from '../types';
import type { AuditService } from '../services/audit.service';
import type { IdentityService } from '../services/identity.service';
import { UnauthenticatedError } from '../utils/errors.utils';
import { getClientIp, routeTarget } from '../utils/request.utils';

/**
 * Extract token from Authorization header
 */
export function extractToken(req: Request): string | null {
  const authHeader = req.headers.authorization;

  if (!authHeader) {
    return null;
  }

  // Format: "Bearer <token>"
  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0] !== 'Bearer') {
    return null;
  }

  return parts[1];
}

export interface AuthMiddleware {
  requireAuth(req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void>;
  optionalAuth(req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void>;
}

export function createAuthMiddleware(identity: IdentityService, audit: AuditService): AuthMiddleware {
  return {
    /**
     * Rejects the request with 401 unless it carries a valid token.
     * Every rejection is recorded as `access.denied` on the route.
     */
    async requireAuth(req, res, next) {
      // Add request ID for tracing
      req.requestId = req.requestId ?? uuidv4();

      try {
        req.principal = await identity.resolvePrincipal(extractToken(req));
        next();
      } catch (error) {
        if (error instanceof UnauthenticatedError) {
          await audit.record({
            actor_id: null,
            action: 'access.denied',
            target_type: 'route',
            target_id: routeTarget(req),
            ip_address: getClientIp(req),
            user_agent: req.headers['user-agent'],
            outcome: 'denied',
            reason_code: error.reason,
          });
        }
        next(error);
      }
    },

    /**
     * Attaches the principal when a valid token is present; anonymous otherwise
     */
    async optionalAuth(req, res, next) {
      req.requestId = req.requestId ?? uuidv4();

      const token = extractToken(req);
      if (!token) {
        next();
        return;
      }

      try {
        req.principal = await identity.resolvePrincipal(token);
        next();
      } catch (error) {
        if (error instanceof UnauthenticatedError) {
          next();
          return;
        }
        next(error);
      }
    },
  };
}
