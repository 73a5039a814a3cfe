/**
 * Approval Routes
 *
 * POST /api/approvals - File a download request
 * GET  /api/approvals - Own requests (reviewers/admins: all), ?status= &sample_id=
 * GET  /api/approvals/:id - Request details
 * POST /api/approvals/:id/decision - Approve or deny (reviewer/admin)
 * POST /api/approvals/:id/authorize - Exchange an approved request for a download token
 * GET  /api/downloads/:token - Redeem a download token for the sample bytes
 */

import { pipeline } from 'stream/promises';
import { Router, Response, NextFunction } from 'express';
import { AuthenticatedRequest, DecideApprovalRequest, FileApprovalRequest } from '../types';
import type { AuthMiddleware } from '../middleware/auth.middleware';
import type { ApprovalListQuery, ApprovalService } from '../services/approval.service';
import { ValidationError } from '../utils/errors.utils';
import { requestContext, validateIdParam } from '../utils/request.utils';
import { sendSuccess } from '../utils/response.utils';
import { isApprovalStatus, validateId } from '../utils/validation.utils';

function parseListQuery(raw: Record<string, unknown>): ApprovalListQuery {
  const query: ApprovalListQuery = {};
  const { status, sample_id: sampleId } = raw;

  if (status !== undefined) {
    if (!isApprovalStatus(status)) {
      throw new ValidationError([{ field: 'status', message: 'status must be pending, approved, denied or expired' }]);
    }
    query.status = status;
  }
  if (sampleId !== undefined) {
    const idError = validateId(sampleId, 'sample_id');
    if (idError) {
      throw new ValidationError([idError]);
    }
    query.sampleId = String(sampleId);
  }
  return query;
}

/**
 * Strip anything that could break out of the Content-Disposition header
 */
function safeFilename(name: string): string {
  const cleaned = name.replace(/[^\w.-]/g, '_');
  return cleaned.length > 0 ? cleaned : 'sample';
}

export function createApprovalRoutes(approvals: ApprovalService, auth: AuthMiddleware): Router {
  const router = Router();
  router.param('id', validateIdParam);
  router.use(auth.requireAuth);

  router.post('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const data: Partial<FileApprovalRequest> = req.body ?? {};
      const request = await approvals.fileRequest(requestContext(req), data);
      sendSuccess(res, 201, { request }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  router.get('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const requests = await approvals.list(requestContext(req), parseListQuery(req.query));
      sendSuccess(res, 200, { requests }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const request = await approvals.get(requestContext(req), req.params.id);
      sendSuccess(res, 200, { request }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/decision', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const data: Partial<DecideApprovalRequest> = req.body ?? {};
      const request = await approvals.decide(requestContext(req), req.params.id, data);
      sendSuccess(res, 200, { request }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/authorize', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const grant = await approvals.authorizeDownload(requestContext(req), req.params.id);
      sendSuccess(res, 200, { grant }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export function createDownloadRoutes(approvals: ApprovalService, auth: AuthMiddleware): Router {
  const router = Router();
  router.use(auth.requireAuth);

  router.get('/:token', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const { sample, stream } = await approvals.redeem(requestContext(req), req.params.token);

      res.status(200);
      res.setHeader('Content-Type', sample.mime_type);
      res.setHeader('Content-Length', String(sample.size_bytes));
      res.setHeader('Content-Disposition', `attachment; filename="${safeFilename(sample.original_filename)}"`);
      res.setHeader('Cache-Control', 'no-store');

      await pipeline(stream, res);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
