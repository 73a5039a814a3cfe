import { Router } from 'express';
import type { Services } from '../container';
import { createAuthMiddleware } from '../middleware/auth.middleware';
import { sendSuccess } from '../utils/response.utils';
import { createApprovalRoutes, createDownloadRoutes } from './approval.routes';
import { createAuditRoutes } from './audit.routes';
import { createAuthRoutes } from './auth.routes';
import { createDatasetRoutes } from './dataset.routes';
import { createAnnotationRoutes, createSampleRoutes } from './sample.routes';
import { createUserRoutes } from './user.routes';

export function createApiRoutes(services: Services, maxUploadBytes: number): Router {
  const router = Router();
  const auth = createAuthMiddleware(services.identity, services.audit);

  // Mount route modules
  router.use('/auth', createAuthRoutes(services.identity, auth));
  router.use('/users', createUserRoutes(services.identity, auth));
  router.use(
    '/datasets',
    createDatasetRoutes({ datasets: services.datasets, sampleStore: services.sampleStore, auth, maxUploadBytes })
  );
  router.use('/samples', createSampleRoutes(services.sampleStore, services.annotations, auth));
  router.use('/annotations', createAnnotationRoutes(services.annotations, auth));
  router.use('/approvals', createApprovalRoutes(services.approvals, auth));
  router.use('/downloads', createDownloadRoutes(services.approvals, auth));
  router.use('/audit-logs', createAuditRoutes(services.audit, auth));

  // Health check endpoint; reports the database without failing on it
  router.get('/health', async (req, res, next) => {
    try {
      const db = await services.checkDatabase();
      sendSuccess(res, 200, {
        status: 'ok',
        db,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
