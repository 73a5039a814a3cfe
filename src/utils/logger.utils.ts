/**
 * Structured Logging Utility
 *
 * One JSON object per line on stdout. Logs carry event names, hashed
 * identifiers and metadata only:
 * - never sample bytes or annotation payloads
 * - never filesystem paths or digests in error messages
 * - stacks only in development
 */

import { sha256Hash } from './hash.utils';

/**
 * Log levels matching standard severity
 */
export enum LogLevel {
  ERROR = 'ERROR',
  WARN = 'WARN',
  INFO = 'INFO',
  DEBUG = 'DEBUG',
}

/**
 * Structured log entry format
 */
export interface StructuredLog {
  timestamp: string;
  level: LogLevel;
  event: string;
  message: string;
  context?: {
    requestId?: string;
    userIdHash?: string;
    resourceType?: string;
    resourceIdHash?: string;
    ipAddressHash?: string;
  };
  metadata?: Record<string, unknown>;
  error?: {
    code?: string;
    type?: string;
    stack?: string;
  };
}

/**
 * Keep only the error's type and code
 */
function sanitizeError(error: unknown): { code?: string; type?: string; stack?: string } {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      type: error.name,
      code,
      stack: process.env.NODE_ENV === 'development' ? error.stack : undefined,
    };
  }
  return { type: 'UnknownError' };
}

function logStructured(entry: StructuredLog): void {
  if (process.env.LOG_SILENT === 'true') {
    return;
  }
  console.log(JSON.stringify(entry));
}

/**
 * Log an error event
 */
export function logError(
  event: string,
  message: string,
  error?: unknown,
  context?: StructuredLog['context'],
  metadata?: Record<string, unknown>
): void {
  logStructured({
    timestamp: new Date().toISOString(),
    level: LogLevel.ERROR,
    event,
    message,
    context,
    metadata,
    error: error ? sanitizeError(error) : undefined,
  });
}

/**
 * Log a warning event
 */
export function logWarning(
  event: string,
  message: string,
  context?: StructuredLog['context'],
  metadata?: Record<string, unknown>
): void {
  logStructured({
    timestamp: new Date().toISOString(),
    level: LogLevel.WARN,
    event,
    message,
    context,
    metadata,
  });
}

/**
 * Log an info event
 */
export function logInfo(
  event: string,
  message: string,
  context?: StructuredLog['context'],
  metadata?: Record<string, unknown>
): void {
  logStructured({
    timestamp: new Date().toISOString(),
    level: LogLevel.INFO,
    event,
    message,
    context,
    metadata,
  });
}

/**
 * Log a debug event (only in development)
 */
export function logDebug(
  event: string,
  message: string,
  context?: StructuredLog['context'],
  metadata?: Record<string, unknown>
): void {
  if (process.env.NODE_ENV === 'development') {
    logStructured({
      timestamp: new Date().toISOString(),
      level: LogLevel.DEBUG,
      event,
      message,
      context,
      metadata,
    });
  }
}

/**
 * Helper to create context from request
 */
export function createRequestContext(
  requestId?: string,
  userId?: string,
  resourceType?: string,
  resourceId?: string,
  ipAddress?: string
): StructuredLog['context'] {
  return {
    requestId,
    userIdHash: userId ? sha256Hash(userId) : undefined,
    resourceType,
    resourceIdHash: resourceId ? sha256Hash(resourceId) : undefined,
    ipAddressHash: ipAddress ? sha256Hash(ipAddress) : undefined,
  };
}

/**
 * Log system error (no user context)
 */
export function logSystemError(
  event: string,
  message: string,
  error?: unknown,
  metadata?: Record<string, unknown>
): void {
  logError(event, message, error, undefined, metadata);
}
