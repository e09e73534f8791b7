/**
 * Express error middleware for the retrieval API.
 *
 * Turns errors from route handlers into `{ error, code }` JSON responses.
 */

import type { Request, Response, NextFunction } from 'express';
import { DocSearchError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('server');

const STATUS_BY_CODE: Record<string, number> = {
  INVALID_QUERY: 400,
  INVALID_K: 400,
  INVALID_BODY: 400,
  RETRIEVAL_FAILED: 502,
};

/**
 * HTTP status for an error: known docsearch codes first, then an explicit
 * `status` (body-parser sets one), then 500.
 */
export function statusFor(err: Error): number {
  if (err instanceof DocSearchError && STATUS_BY_CODE[err.code] !== undefined) {
    return STATUS_BY_CODE[err.code];
  }
  if ('status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  const status = statusFor(err);
  const code = err instanceof DocSearchError ? err.code : undefined;

  if (status >= 500) {
    log.error(err instanceof DocSearchError ? err.toDetailedString() : err.message);
  } else {
    log.debug(err.message, { status });
  }

  res.status(status).json({ error: err.message, ...(code ? { code } : {}) });
}
