import type { ErrorRequestHandler } from 'express';

import { HttpError } from '../utils/errors';

/**
 * Renders errors as `{ error: { code, message, details, requestId } }`. Only the status
 * and JSON surface live here; `/metrics` never routes upstream failures through it.
 */
export const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof HttpError) {
    if (error.status >= 500) {
      req.log.warn({ code: error.code, details: error.details }, error.message);
    }

    res.status(error.status).json({
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
        requestId: req.id,
      },
    });
    return;
  }

  req.log.error({ error }, 'unhandled error');
  res.status(500).json({
    error: {
      code: 'INTERNAL_SERVER_ERROR',
      message: 'Something went wrong. Try again later.',
      requestId: req.id,
    },
  });
};
