import type { NextFunction, Request, Response } from 'express';
import { NotFoundError, StorageError, ValidationError } from '../domain/errors';
import { createLogger } from '../utils/log';

const log = createLogger('http');

export interface ApiError {
  error: string;
  details?: string[];
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

// Validation and lookup failures go back to the caller as-is; storage failures ask for a retry.
export function errorHandler(err: unknown, req: Request, res: Response<ApiError>, _next: NextFunction): void {
  if (err instanceof ValidationError) {
    res.status(400).json({ error: err.message, details: err.details });
    return;
  }
  if (err instanceof NotFoundError) {
    res.status(404).json({ error: err.message });
    return;
  }
  if (err instanceof StorageError) {
    log.error(`${req.method} ${req.originalUrl}: ${err.message}`, err.cause);
    res.status(503).json({ error: 'storage unavailable, nothing was saved; please retry' });
    return;
  }
  if (isBodyParseError(err)) {
    res.status(400).json({ error: 'request body is not valid JSON' });
    return;
  }
  log.error(`${req.method} ${req.originalUrl} failed`, err);
  res.status(500).json({ error: 'internal error' });
}

export function notFoundRoute(req: Request, res: Response<ApiError>): void {
  res.status(404).json({ error: `no route for ${req.method} ${req.path}` });
}

export function requestLog(req: Request, res: Response, next: NextFunction): void {
  const started = Date.now();
  res.on('finish', () => {
    log.debug(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`);
  });
  next();
}
