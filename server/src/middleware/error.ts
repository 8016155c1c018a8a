import type { NextFunction, Request, Response } from 'express';

import { HTTP_STATUS_BY_KIND, isRetryable, type Result } from '../domain/errors';

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({ message: 'Not Found' });
}

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null) {
    if ('status' in err && typeof err.status === 'number') return err.status;
    if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  }
  return 500;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  if (status >= 500) {
    console.error('[error]', err);
  }
  if (res.headersSent) {
    return;
  }

  // Body parser errors carry a client status; anything else stays opaque.
  const message = status < 500 && err instanceof Error ? err.message : 'Unexpected error';
  res.status(status).json({ message });
}

/** Writes a service result: the value on success, `{ message, code }` otherwise. */
export function sendResult<T>(res: Response, result: Result<T>, successStatus = 200) {
  if (result.ok) {
    return res.status(successStatus).json(result.value);
  }
  const { kind, message, details } = result.error;
  return res.status(HTTP_STATUS_BY_KIND[kind]).json({
    message,
    code: kind,
    retryable: isRetryable(result.error),
    ...(details === undefined ? {} : { details })
  });
}
