import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import { ZodError } from 'zod';
import { logger } from '../utils/logger.js';
import { AppError, formatApiError } from '../utils/errors.js';

/**
 * Rate limiter for collection endpoints
 * Each run fans out into many Guru requests: 10 runs per minute per IP
 */
export function createCollectionRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 10,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many collection runs, please try again later' },
  });
}

/**
 * Rate limiter for planilha endpoints
 * 120 requests per minute per IP
 */
export function createPlanilhaRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 120,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later' },
  });
}

/**
 * Global error handler middleware
 */
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      details: err.issues,
    });
    return;
  }

  if (err instanceof AppError && err.isOperational && err.statusCode < 500) {
    logger.warn({ code: err.code, error: err.message, path: req.path, method: req.method }, 'Request rejected');
  } else {
    logger.error(
      {
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
        path: req.path,
        method: req.method,
      },
      'Request error'
    );
  }

  const { status, body } = formatApiError(err);
  res.status(status).json(body);
};

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
}

/**
 * Request ID middleware for tracing
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header !== '' ? header : randomUUID();
  res.setHeader('X-Request-ID', requestId);
  next();
}
