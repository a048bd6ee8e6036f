/**
 * Error classes carrying an HTTP status and a stable error code.
 * Thrown by the engine, rendered by the HTTP adapter.
 */

export class TickstoreError extends Error {
  readonly code: string = 'INTERNAL_SERVER_ERROR';
  readonly status: number = 500;
}

export class BadRequestError extends TickstoreError {
  override readonly code = 'BAD_REQUEST';
  override readonly status = 400;
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export class QuerySyntaxError extends TickstoreError {
  override readonly code = 'QUERY_SYNTAX';
  override readonly status = 400;
  constructor(message: string, readonly position: number) {
    super(`${message} at position ${position}`);
    this.name = 'QuerySyntaxError';
  }
}

export class UnauthorizedError extends TickstoreError {
  override readonly code = 'UNAUTHORIZED';
  override readonly status = 401;
  constructor(message = 'Missing api key') {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends TickstoreError {
  override readonly code = 'FORBIDDEN';
  override readonly status = 403;
  constructor(message = 'Api key not accepted') {
    super(message);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends TickstoreError {
  override readonly code = 'NOT_FOUND';
  override readonly status = 404;
  constructor(message = 'Not found') {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends TickstoreError {
  override readonly code = 'CONFLICT';
  override readonly status = 409;
  constructor(message = 'Conflict') {
    super(message);
    this.name = 'ConflictError';
  }
}

export interface ErrorBody {
  error: {
    code: string;
    message: string;
  };
}

export function toErrorBody(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof TickstoreError) {
    return { status: err.status, body: { error: { code: err.code, message: err.message } } };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { status: 500, body: { error: { code: 'INTERNAL_SERVER_ERROR', message } } };
}
