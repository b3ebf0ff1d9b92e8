import type { Response } from 'express';
import type { PaginationMeta } from '../../domain/user/pagination.js';

/**
 * Envelope shared by every response.
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: unknown;
  meta?: PaginationMeta;
}

export function sendSuccess<T>(res: Response, message: string, data?: T, status = 200): void {
  const body: ApiResponse<T> = { success: true, message, data };
  res.status(status).json(body);
}

export function sendCreated<T>(res: Response, message: string, data: T): void {
  sendSuccess(res, message, data, 201);
}

export function sendSuccessWithMeta<T>(res: Response, message: string, data: T, meta: PaginationMeta): void {
  const body: ApiResponse<T> = { success: true, message, data, meta };
  res.status(200).json(body);
}

export function sendError(res: Response, status: number, message: string, error?: unknown): void {
  const body: ApiResponse = { success: false, message, error };
  res.status(status).json(body);
}
