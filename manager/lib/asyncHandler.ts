/**
 * Async Route Handler
 * Wraps async route handlers to catch errors and pass to Express error handler
 *
 * Also enriches error context with request information.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { VncError } from './errors';
import { log } from './logger';
import type { AuthenticatedRequest } from '../types';

interface RequestContext {
  method: string;
  url: string;
  ip: string | undefined;
  userAgent: string | undefined;
  user: string;
}

interface EnrichedError extends Error {
  requestContext?: RequestContext;
  status?: number;
  statusCode?: number;
  type?: string;
}

/**
 * Extract request context for error logging
 */
function getRequestContext(req: Request): RequestContext {
  const authReq: AuthenticatedRequest = req;
  return {
    method: req.method,
    url: req.originalUrl || req.url,
    ip: req.ip || req.socket?.remoteAddress,
    userAgent: req.headers?.['user-agent'],
    user: authReq.user?.username || 'anonymous',
  };
}

function toEnrichedError(err: unknown): EnrichedError {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Wrap async route handler to catch errors
 */
const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown> | unknown): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      Promise.resolve(fn(req, res, next)).catch((err: unknown) => {
        const enriched = toEnrichedError(err);
        enriched.requestContext = getRequestContext(req);
        next(enriched);
      });
    } catch (err) {
      // Catch sync throws
      const enriched = toEnrichedError(err);
      enriched.requestContext = getRequestContext(req);
      next(enriched);
    }
  };
};

/**
 * Express error middleware with structured logging
 * Mount this after all routes: app.use(errorMiddleware)
 */
function errorMiddleware(err: EnrichedError, req: Request, res: Response, _next: NextFunction): void {
  const context = err.requestContext || getRequestContext(req);

  if (err instanceof VncError) {
    const level = err.code >= 500 ? 'error' : 'warn';
    log[level](`${err.name}: ${err.message}`, { ...err.details, ...context });
    res.status(err.code).json(err.toJSON());
    return;
  }

  // body-parser marks malformed JSON with type 'entity.parse.failed'
  if (err.type === 'entity.parse.failed') {
    res.status(400).json({ success: false, message: 'Invalid JSON body', error: 'Invalid JSON body' });
    return;
  }

  const status = err.status || err.statusCode || 500;
  log.error('Unexpected error', { error: err.message, stack: err.stack, status, ...context });

  const message = process.env.NODE_ENV === 'production' && status === 500
    ? 'Internal server error'
    : err.message;

  res.status(status).json({
    success: false,
    message,
    error: message,
    code: status,
    type: 'UnexpectedError',
    timestamp: new Date().toISOString(),
  });
}

export default asyncHandler;
export { asyncHandler, errorMiddleware, getRequestContext };
