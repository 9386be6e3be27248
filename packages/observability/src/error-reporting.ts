import { Request, Response, NextFunction } from 'express';

export interface ErrorBody {
  error: string;
  message: string;
}

/**
 * Map an error that reached the end of the middleware chain to a status and body.
 * body-parser marks malformed JSON with `type: 'entity.parse.failed'`.
 */
export function describeError(err: unknown): { status: number; body: ErrorBody } {
  if (typeof err === 'object' && err !== null && 'type' in err) {
    if (err.type === 'entity.parse.failed') {
      return { status: 400, body: { error: 'invalid_json', message: 'Request body is not valid JSON' } };
    }
    if (err.type === 'entity.too.large') {
      return { status: 413, body: { error: 'payload_too_large', message: 'Request body is too large' } };
    }
  }
  const message = err instanceof Error ? err.message : 'Unexpected error';
  return { status: 500, body: { error: 'internal_error', message } };
}

/**
 * Express error-handling middleware. Logs server errors and answers JSON.
 */
export function errorReportingMiddleware(service: string) {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const { status, body } = describeError(err);
    if (status >= 500) {
      console.error(`[${service}] ${req.method} ${req.path} failed:`, err);
    }
    res.status(status).json(body);
  };
}
