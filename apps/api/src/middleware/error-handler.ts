import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { DomainError } from '@carpool/domain';

function httpStatusOf(err: Error): number {
  // body-parser and friends attach the status they want
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 600) {
    return err.status;
  }
  return 500;
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
    res.status(err.status).json({ error: err.code, message: err.message, details: err.details });
    return;
  }
  if (err instanceof Error) {
    const status = httpStatusOf(err);
    if (status >= 500) console.error('[server] unhandled error', err);
    res.status(status).json({ error: status >= 500 ? 'Internal server error' : err.message });
    return;
  }
  console.error('[server] unhandled non-error value', err);
  res.status(500).json({ error: 'Internal server error' });
}
