import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { BookingError, StoreUnavailableError } from '@campus-shuttle/domain';

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
  if (err instanceof BookingError) {
    res.status(err.status).json({ error: err.code, message: err.message, details: err.details });
    return;
  }
  if (err instanceof StoreUnavailableError) {
    console.error('[api] store unavailable', err);
    res.status(err.status).json({ error: err.code, message: 'Storage is temporarily unavailable' });
    return;
  }
  if (isBodyParserError(err)) {
    res.status(err.status).json({ error: 'invalid_body', message: err.message });
    return;
  }
  console.error('[api] unhandled error', err);
  res.status(500).json({ error: 'internal_error', message: 'Internal server error' });
}

// express.json() rejects malformed payloads with a 4xx `status` on the error.
function isBodyParserError(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}
