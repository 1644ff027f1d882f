import type { ErrorRequestHandler } from 'express';
import { defaultLogger, isSearchError, type Logger } from '@fhirquery/core';

/** Maps `SearchError`s to their status; anything else is logged and reported as 500. */
export function searchErrorHandler(logger: Logger = defaultLogger()): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) return next(err);

    if (isSearchError(err)) {
      logger.warn('[http] search rejected', { path: req.path, code: err.code, message: err.message });
      return res.fail({ code: err.httpStatus, message: err.message, errors: { root: err.code } });
    }

    logger.error('[http] unhandled error', err);
    return res.fail({ code: 500, message: 'Internal server error', errors: { root: 'internal_error' } });
  };
}
