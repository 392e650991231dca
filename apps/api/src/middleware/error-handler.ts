import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { HttpError } from '../errors/http-error.js';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof HttpError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  if (err instanceof Error) {
    // express and send attach an HTTP status to their own errors
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) console.error('[server] unhandled error', err);
    res.status(status).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
}
