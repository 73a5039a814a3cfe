/**
 * Express application
 *
 * Middleware order: CORS, Helmet, body parsing, request log (development),
 * API routes, 404, error handler.
 */

import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { AppConfig } from './config';
import type { Services } from './container';
import { errorHandler, notFoundHandler, requestLogger } from './middleware/error.middleware';
import { createApiRoutes } from './routes';

export function createApp(services: Services, config: AppConfig): Express {
  const app = express();

  // ======================
  // SECURITY MIDDLEWARE
  // ======================

  // CORS - MUST be before Helmet
  app.use(cors({
    origin: config.nodeEnv === 'production'
      ? config.frontendUrl
      : ['http://localhost:5173', 'http://localhost:3000'],
    credentials: true,
    methods: ['GET', 'POST', 'PATCH', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use(helmet());

  // ======================
  // BODY PARSING
  // ======================

  // Sample uploads are multipart and handled by multer on their route
  app.use(express.json({ limit: '100kb' }));

  if (config.nodeEnv === 'development') {
    app.use(requestLogger);
  }

  // Correct client IP behind a reverse proxy
  app.set('trust proxy', 1);

  app.use('/api', createApiRoutes(services, config.maxUploadBytes));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
