/**
 * Authentication Routes
 *
 * POST /api/auth/register - Create new account (admins may create accounts for others)
 * POST /api/auth/login - Get JWT token
 * POST /api/auth/logout - Revoke token
 * GET  /api/auth/me - Get current user info
 */

import { Router, Response, NextFunction } from 'express';
import { AuthenticatedRequest, LoginRequest, RegisterRequest } from '../types';
import type { AuthMiddleware } from '../middleware/auth.middleware';
import { extractToken } from '../middleware/auth.middleware';
import type { IdentityService } from '../services/identity.service';
import { requestContext } from '../utils/request.utils';
import { sendSuccess } from '../utils/response.utils';

export function createAuthRoutes(identity: IdentityService, auth: AuthMiddleware): Router {
  const router = Router();

  /**
   * POST /api/auth/register
   * Self-registration logs the new user in; an admin creating an account gets the user back
   */
  router.post('/register', auth.optionalAuth, async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const data: Partial<RegisterRequest> = req.body ?? {};
      const ctx = requestContext(req);
      const user = await identity.register(ctx, data);

      if (ctx.principal) {
        sendSuccess(res, 201, { user }, req.requestId);
        return;
      }

      // Auto-login after registration
      const authResult = await identity.login(ctx, { username: data.username, password: data.password });
      sendSuccess(res, 201, authResult, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/auth/login
   */
  router.post('/login', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const credentials: Partial<LoginRequest> = req.body ?? {};
      const authResult = await identity.login(requestContext(req), credentials);
      sendSuccess(res, 200, authResult, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/auth/logout
   * Revoke current session
   */
  router.post('/logout', auth.requireAuth, async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const token = extractToken(req);
      if (token) {
        await identity.logout(requestContext(req), token);
      }
      sendSuccess(res, 200, { message: 'Logged out successfully' }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/auth/me
   */
  router.get('/me', auth.requireAuth, async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const user = await identity.me(requestContext(req));
      sendSuccess(res, 200, { user }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
