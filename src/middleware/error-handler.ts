import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { fromZodError, isAppError } from '../lib/errors';

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

// Express 4 does not forward rejected promises to the error handler
export function asyncHandler(handler: AsyncRequestHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

/**
 * Final error handler. AppErrors keep their status and code; anything else is
 * logged and answered with a generic 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const error = err instanceof ZodError ? fromZodError(err) : err;

  if (isAppError(error)) {
    res.status(error.statusCode).json({
      error: error.message,
      code: error.code,
      ...(error.details && { details: error.details })
    });
    return;
  }

  if (isBodyParseError(error)) {
    res.status(400).json({ error: 'Invalid JSON body', code: 'VALIDATION_FAILED' });
    return;
  }

  console.error(`[Server] Unhandled error on ${req.method} ${req.path}:`, error);
  res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
}

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({ error: `No route for ${req.method} ${req.path}`, code: 'NOT_FOUND' });
}
