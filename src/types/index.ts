// Re-export all types from a single entry point
export * from './user.types';
export * from './audit.types';
export * from './dataset.types';
export * from './sample.types';
export * from './annotation.types';
export * from './approval.types';

/**
 * Standard API response wrapper
 * All our endpoints return this shape for consistency
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    reason?: string;
    details?: unknown;
  };
  meta?: {
    timestamp: Date;
    requestId?: string;
  };
}

/**
 * Express Request with authenticated principal
 * After auth middleware runs, request will have this shape
 */
import type { Request } from 'express';
import type { Principal } from './user.types';

export interface AuthenticatedRequest extends Request {
  principal?: Principal;
  requestId?: string;
}

/**
 * Who is calling and from where. Passed to every service operation so the
 * audit entry it produces can name the actor and origin.
 */
export interface RequestContext {
  principal?: Principal;
  ipAddress?: string;
  userAgent?: string;
  requestId?: string;
}
