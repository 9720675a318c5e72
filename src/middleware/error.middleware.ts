import { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { safeLogger } from '../security/safeLogger';

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new HttpError(400, 'Invalid payload', parsed.error.flatten());
  }
  return parsed.data;
}

// Express 4 does not forward rejected promises to the error handler on its own.
export const asyncHandler =
  (handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

function statusOf(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (err && typeof err === 'object' && 'status' in err && typeof err.status === 'number') return err.status;
  return 500;
}

export function notFound(req: Request, res: Response) {
  res.status(404).json({ error: `Not found: ${req.path}` });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  const message = err instanceof Error ? err.message : 'Internal Server Error';

  if (status >= 500) {
    safeLogger.error('http.unhandled_error', { method: req.method, path: req.path, status, message });
  }

  const body: { error: string; details?: unknown } = {
    error: status >= 500 ? 'Internal Server Error' : message,
  };
  if (err instanceof HttpError && err.details !== undefined) {
    body.details = err.details;
  }
  res.status(status).json(body);
}
