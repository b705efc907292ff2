/**
 * Express error middleware for the API.
 *
 * Returns a JSON error body. Client errors (a `status` below 500, set by
 * HttpError or by express.json() for malformed bodies) keep their status.
 */

import type { Request, Response, NextFunction } from 'express';
import { SignalpathError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('server');

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

function statusOf(err: Error): number {
  const status: unknown = 'status' in err ? err.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : 500;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  const status = statusOf(err);
  if (status >= 500) {
    log.error(err instanceof SignalpathError ? err.toDetailedString() : err.message);
  } else {
    log.debug(`Client error ${status}: ${err.message}`);
  }

  res.status(status).json({
    error: status >= 500 ? 'Internal server error' : err.message,
    ...(err instanceof SignalpathError ? { code: err.code } : {}),
  });
}
