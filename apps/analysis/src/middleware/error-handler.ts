import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

/** Error with an HTTP status, raised by route handlers. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }

  static notFound(what: string): HttpError {
    return new HttpError(404, `${what} not found`);
  }
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.issues });
    return;
  }
  if (err instanceof HttpError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  console.error(`[analysis] ${req.method} ${req.originalUrl} failed`, err);
  res.status(500).json({ error: 'internal_error' });
}
