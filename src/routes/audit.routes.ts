/**
 * Audit Log Routes (read-only)
 *
 * GET /api/audit-logs - Filter by actor_id, target_type, target_id, action, from, to; paged by limit/offset
 * GET /api/audit-logs/verify - Recompute the hash chain (admin)
 */

import { Router, Response, NextFunction } from 'express';
import { AuthenticatedRequest } from '../types';
import type { AuthMiddleware } from '../middleware/auth.middleware';
import type { AuditService } from '../services/audit.service';
import { requestContext } from '../utils/request.utils';
import { sendSuccess } from '../utils/response.utils';
import { assertValid, parseAuditQuery } from '../utils/validation.utils';

export function createAuditRoutes(audit: AuditService, auth: AuthMiddleware): Router {
  const router = Router();
  router.use(auth.requireAuth);

  router.get('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const { query, validation } = parseAuditQuery(req.query);
      assertValid(validation);
      const entries = await audit.query(requestContext(req), query);
      sendSuccess(res, 200, { entries }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  router.get('/verify', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const result = await audit.verifyChain(requestContext(req));
      sendSuccess(res, 200, result, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
