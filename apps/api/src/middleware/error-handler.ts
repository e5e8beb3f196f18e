import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { DomainError } from '@scenario-runner/domain';

/** body-parser rejects malformed or oversized bodies with a 4xx `status`. */
function isClientHttpError(err: Error): err is Error & { status: number } {
  return 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500;
}

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
  if (err instanceof DomainError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  if (err instanceof Error && isClientHttpError(err)) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  if (err instanceof Error) {
    console.error('[api] unhandled error', err);
    res.status(500).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
}
