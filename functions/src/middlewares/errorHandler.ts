import { Request, Response, NextFunction } from 'express';
import * as functions from 'firebase-functions';
import { captureException } from '../utils/sentry';

type HttpError = Error & { status?: number; statusCode?: number; type?: string };

function resolveStatus(err: HttpError): number {
  const status = err.status ?? err.statusCode;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : 500;
}

export function errorHandler(err: HttpError, req: Request, res: Response, next: NextFunction) {
  // If headers have already been sent, delegate to the default Express error handler
  if (res.headersSent) {
    return next(err);
  }

  const status = resolveStatus(err);

  // Body parser failures (malformed JSON, payload too large) are client errors
  if (status < 500) {
    functions.logger.warn(`[errors] Request rejected with ${status}: ${err.message}`);
    res.status(status).json({
      code: status === 413 ? 'payload_too_large' : 'invalid_request',
      message: err.message,
    });
    return;
  }

  // captureException also writes the error log
  captureException(err, { path: req.path, method: req.method });

  if (process.env.NODE_ENV === 'production') {
    // In production, don't leak stack traces
    res.status(500).json({
      code: 'server_error',
      message: 'An unexpected error occurred',
    });
  } else {
    // In development/staging, show details for debugging
    res.status(500).json({
      code: 'server_error',
      message: err.message,
      stack: err.stack,
    });
  }
}
