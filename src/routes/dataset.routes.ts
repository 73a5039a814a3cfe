/**
 * Dataset Routes
 *
 * POST /api/datasets - Create a dataset (uploader/admin)
 * GET  /api/datasets - Datasets visible to the caller
 * GET  /api/datasets/:id - Dataset details
 * POST /api/datasets/:id/samples - Upload a sample (multipart, field "file")
 * GET  /api/datasets/:id/samples - Samples in a dataset, newest first
 */

import { Router, Response, NextFunction } from 'express';
import multer from 'multer';
import { AuthenticatedRequest, CreateDatasetRequest } from '../types';
import type { AuthMiddleware } from '../middleware/auth.middleware';
import type { DatasetService } from '../services/dataset.service';
import { SampleStore, toSamplePublic } from '../services/sample-store.service';
import { ValidationError } from '../utils/errors.utils';
import { requestContext, validateIdParam } from '../utils/request.utils';
import { sendSuccess } from '../utils/response.utils';

export interface DatasetRouteDeps {
  datasets: DatasetService;
  sampleStore: SampleStore;
  auth: AuthMiddleware;
  maxUploadBytes: number;
}

export function createDatasetRoutes({ datasets, sampleStore, auth, maxUploadBytes }: DatasetRouteDeps): Router {
  const router = Router();
  // Uploads stay in memory: the digest needs the full content before anything is written
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
  });

  router.param('id', validateIdParam);
  router.use(auth.requireAuth);

  router.post('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const data: Partial<CreateDatasetRequest> = req.body ?? {};
      const dataset = await datasets.create(requestContext(req), data);
      sendSuccess(res, 201, { dataset }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  router.get('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const list = await datasets.list(requestContext(req));
      sendSuccess(res, 200, { datasets: list }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const dataset = await datasets.get(requestContext(req), req.params.id);
      sendSuccess(res, 200, { dataset }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/samples', upload.single('file'), async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        throw new ValidationError([{ field: 'file', message: 'file is required' }]);
      }
      const sample = await sampleStore.put(requestContext(req), {
        datasetId: req.params.id,
        bytes: req.file.buffer,
        mimeType: req.file.mimetype,
        filename: req.file.originalname,
      });
      sendSuccess(res, 201, { sample: toSamplePublic(sample) }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id/samples', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const samples = await sampleStore.listByDataset(requestContext(req), req.params.id);
      sendSuccess(res, 200, { samples }, req.requestId);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
