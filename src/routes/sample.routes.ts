/**
 * Sample & Annotation Routes
 *
 * GET  /api/samples/:id - Sample metadata
 * POST /api/samples/:id/annotations - Submit an annotation
 * GET  /api/samples/:id/annotations - Annotations of a sample, by version
 * POST /api/annotations/:id/review - Begin review (reviewer/admin)
 * POST /api/annotations/:id/decision - Accept or reject (reviewer/admin)
 */

import { Router, Response, NextFunction } from 'express';
import { AuthenticatedRequest, SubmitAnnotationRequest } from '../types';
import type { AuthMiddleware } from '../middleware/auth.middleware';
import type { AnnotationService } from '../services/annotation.service';
import type { SampleStore } from '../services/sample-store.service';
import { requestContext, validateIdParam } from '../utils/request.utils';
import { sendSuccess } from '../utils/response.utils';

export function createSampleRoutes(sampleStore: SampleStore, annotations: AnnotationService, auth: AuthMiddleware): Router {
  const router = Router();
  router.param('id', validateIdParam);
  router.use(auth.requireAuth);

  router.get('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const sample = await sampleStore.getSample(requestContext(req), req.params.id);
      sendSuccess(res, 200, { sample }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/annotations', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const data: Partial<SubmitAnnotationRequest> = req.body ?? {};
      const annotation = await annotations.submit(requestContext(req), req.params.id, data);
      sendSuccess(res, 201, { annotation }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id/annotations', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const list = await annotations.listBySample(requestContext(req), req.params.id);
      sendSuccess(res, 200, { annotations: list }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export function createAnnotationRoutes(annotations: AnnotationService, auth: AuthMiddleware): Router {
  const router = Router();
  router.param('id', validateIdParam);
  router.use(auth.requireAuth);

  router.post('/:id/review', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const annotation = await annotations.beginReview(requestContext(req), req.params.id);
      sendSuccess(res, 200, { annotation }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/decision', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const annotation = await annotations.decide(requestContext(req), req.params.id, req.body?.outcome);
      sendSuccess(res, 200, { annotation }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
