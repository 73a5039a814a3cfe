import type { Response } from 'express';
import type { ApiResponse } from '../types';

/**
 * Send a success envelope: { success: true, data, meta }
 */
export function sendSuccess<T>(res: Response, statusCode: number, data: T, requestId?: string): void {
  const body: ApiResponse<T> = {
    success: true,
    data,
    meta: {
      timestamp: new Date(),
      requestId,
    },
  };
  res.status(statusCode).json(body);
}
