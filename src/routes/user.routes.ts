/**
 * User Administration Routes (admin only)
 *
 * PATCH /api/users/:id/role - Change a user's role
 * POST  /api/users/:id/deactivate - Deactivate a user and revoke their sessions
 */

import { Router, Response, NextFunction } from 'express';
import { AuthenticatedRequest } from '../types';
import type { AuthMiddleware } from '../middleware/auth.middleware';
import type { IdentityService } from '../services/identity.service';
import { requestContext, validateIdParam } from '../utils/request.utils';
import { sendSuccess } from '../utils/response.utils';

export function createUserRoutes(identity: IdentityService, auth: AuthMiddleware): Router {
  const router = Router();
  router.param('id', validateIdParam);
  router.use(auth.requireAuth);

  router.patch('/:id/role', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const user = await identity.changeRole(requestContext(req), req.params.id, req.body?.role);
      sendSuccess(res, 200, { user }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/deactivate', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const user = await identity.deactivate(requestContext(req), req.params.id);
      sendSuccess(res, 200, { user }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
