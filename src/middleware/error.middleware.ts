/**
 * Error Middleware
 *
 * Turns anything thrown by a route into the standard error envelope.
 * AppErrors carry their own status, code and reason; anything else is a 500
 * with a generic message. Paths, stacks and digests never reach the client.
 */

import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ApiResponse, AuthenticatedRequest } from '../types';
import { AppError, ValidationError } from '../utils/errors.utils';
import { logError, createRequestContext } from '../utils/logger.utils';
import { getClientIp, maskDownloadToken } from '../utils/request.utils';

function sendError(
  res: Response,
  statusCode: number,
  error: NonNullable<ApiResponse['error']>,
  requestId?: string
): void {
  const body: ApiResponse = {
    success: false,
    error,
    meta: { timestamp: new Date(), requestId },
  };
  res.status(statusCode).json(body);
}

/**
 * body-parser errors carry `type` ("entity.parse.failed", "entity.too.large") and a status
 */
function bodyParserStatus(err: unknown): number | null {
  if (
    typeof err === 'object' &&
    err !== null &&
    'type' in err &&
    typeof err.type === 'string' &&
    err.type.startsWith('entity.') &&
    'status' in err &&
    typeof err.status === 'number'
  ) {
    return err.status;
  }
  return null;
}

/**
 * 404 for unmatched routes
 */
export function notFoundHandler(req: AuthenticatedRequest, res: Response): void {
  sendError(
    res,
    404,
    { code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found`, reason: 'ROUTE_NOT_FOUND' },
    req.requestId
  );
}

export function errorHandler(err: unknown, req: AuthenticatedRequest, res: Response, next: NextFunction): void {
  // Mid-stream failures: let Express close the connection
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logError(
        'http.request_failed',
        err.message,
        err.cause ?? err,
        createRequestContext(req.requestId, req.principal?.userId, undefined, undefined, getClientIp(req)),
        { code: err.code, reason: err.reason }
      );
    }
    sendError(
      res,
      err.statusCode,
      {
        code: err.code,
        message: err.message,
        reason: err.reason,
        details: err instanceof ValidationError ? err.errors : undefined,
      },
      req.requestId
    );
    return;
  }

  if (err instanceof multer.MulterError) {
    const tooLarge = err.code === 'LIMIT_FILE_SIZE';
    sendError(
      res,
      tooLarge ? 413 : 400,
      {
        code: tooLarge ? 'PAYLOAD_TOO_LARGE' : 'VALIDATION_ERROR',
        message: tooLarge ? 'The uploaded file is too large.' : 'Malformed upload. Send the file in the "file" field.',
        reason: err.code,
      },
      req.requestId
    );
    return;
  }

  const parserStatus = bodyParserStatus(err);
  if (parserStatus !== null && parserStatus < 500) {
    sendError(
      res,
      parserStatus,
      {
        code: parserStatus === 413 ? 'PAYLOAD_TOO_LARGE' : 'VALIDATION_ERROR',
        message: parserStatus === 413 ? 'Request body is too large.' : 'Request body is not valid JSON.',
      },
      req.requestId
    );
    return;
  }

  logError(
    'http.unhandled_error',
    'Unhandled error',
    err,
    createRequestContext(req.requestId, req.principal?.userId, undefined, undefined, getClientIp(req))
  );
  sendError(res, 500, { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' }, req.requestId);
}

/**
 * Development request log: one line per finished request.
 * Download tokens in the URL are masked.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on('finish', () => {
    const duration = Date.now() - start;
    const url = maskDownloadToken(req.originalUrl);
    console.log(`${req.method} ${url} ${res.statusCode} - ${duration}ms`);
  });
  next();
}
