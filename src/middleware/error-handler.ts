/**
 * Error Handling Middleware
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { env } from '../config/env';

/**
 * Error carrying the HTTP status to respond with
 */
export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Forward rejections from async route handlers to the error middleware
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

/**
 * Status for an error; body-parser errors carry their own
 */
const statusOf = (err: unknown): number => {
  if (err instanceof ApiError) return err.statusCode;
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') return err.status;
  return 500;
};

/**
 * Final error handler; renders { success: false, error }
 */
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const statusCode = statusOf(err);
  const message = err instanceof Error ? err.message : String(err);

  if (statusCode >= 500) {
    console.error(`Error on ${req.method} ${req.path}:`, err);
  }

  res.status(statusCode).json({
    success: false,
    error: statusCode >= 500 && env.NODE_ENV === 'production' ? 'Internal server error' : message,
  });
};
