export type DomainErrorKind =
  | 'AlreadyExists'
  | 'NotFound'
  | 'Denied'
  | 'InvalidTransition'
  | 'Conflict'
  | 'Unavailable'
  | 'Invalid';

export type DomainError = {
  kind: DomainErrorKind;
  message: string;
  details?: unknown;
};

export type Result<T> = { ok: true; value: T } | { ok: false; error: DomainError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: DomainErrorKind, message: string, details?: unknown): Result<T> {
  return details === undefined
    ? { ok: false, error: { kind, message } }
    : { ok: false, error: { kind, message, details } };
}

export const HTTP_STATUS_BY_KIND: Record<DomainErrorKind, number> = {
  Invalid: 400,
  Denied: 403,
  NotFound: 404,
  AlreadyExists: 409,
  Conflict: 409,
  InvalidTransition: 422,
  Unavailable: 503
};

/** Only lost races and storage hiccups are worth another attempt. */
export function isRetryable(error: DomainError): boolean {
  return error.kind === 'Conflict' || error.kind === 'Unavailable';
}
