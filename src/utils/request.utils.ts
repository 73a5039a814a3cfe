import type { NextFunction, Request, Response } from 'express';
import type { AuthenticatedRequest, RequestContext } from '../types';
import { ValidationError } from './errors.utils';
import { validateId } from './validation.utils';

/**
 * Get client IP address (handles proxies)
 */
export function getClientIp(req: Request): string {
  // Check for forwarded header (behind proxy/load balancer)
  const forwarded = req.headers['x-forwarded-for'];
  if (forwarded) {
    // Can be comma-separated list, take first
    const ips = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    return ips.split(',')[0].trim();
  }
  return req.ip || req.socket.remoteAddress || 'unknown';
}

/** Width of audit_logs.target_id */
export const AUDIT_TARGET_ID_MAX = 64;

const ID_SEGMENT = /\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}(?=\/|\?|$)/gi;

/**
 * Replace a download capability token in a URL with `:token`
 */
export function maskDownloadToken(url: string): string {
  return url.replace(/\/downloads\/[^/?]+/, '/downloads/:token');
}

/**
 * Audit target for a request that never reached a handler, e.g.
 * `POST /api/approvals/:id/authorize`. Ids and tokens are masked.
 */
export function routeTarget(req: Request): string {
  const path = maskDownloadToken(`${req.baseUrl}${req.path}`).replace(ID_SEGMENT, '/:id');
  return `${req.method} ${path}`.slice(0, AUDIT_TARGET_ID_MAX);
}

/**
 * Build the service-layer context (principal + origin) for a request
 */
export function requestContext(req: AuthenticatedRequest): RequestContext {
  return {
    principal: req.principal,
    ipAddress: getClientIp(req),
    userAgent: req.headers['user-agent'],
    requestId: req.requestId,
  };
}

/**
 * `router.param` handler: ids in the URL must be UUIDs
 */
export function validateIdParam(req: Request, res: Response, next: NextFunction, value: string, name: string): void {
  const error = validateId(value, name);
  next(error ? new ValidationError([error]) : undefined);
}
