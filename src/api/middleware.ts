/**
 * API Middleware: request logging and error handling.
 *
 * Provider-protocol failures never reach the error handler; the gateway
 * renders them during dispatch. What arrives here is a transport failure (an
 * unreadable or oversized body) or a bug, and it is written in the default
 * service's envelope so clients parse it like any other error.
 */

import { ErrorRequestHandler, Request, Response, NextFunction } from 'express';
import { createServiceError, ErrorCategory, internalError, isServiceException, ServiceError } from '../domain/errors';
import type { Gateway } from '../gateway/gateway';
import { errorFields, logger } from '../logger';

const log = logger.child({ module: 'http' });

/** Log one line per request once the response is written. */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const started = Date.now();
  res.on('finish', () => {
    log.debug('Request served', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs: Date.now() - started,
    });
  });
  next();
}

/** Status attached by body-parser and http-errors, when present. */
function transportStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

function describe(err: unknown): ServiceError {
  if (isServiceException(err)) return err.serviceError;
  const message = err instanceof Error ? err.message : 'Internal server error';
  const status = transportStatus(err);
  if (status !== undefined && status >= 400 && status < 500) {
    return createServiceError({
      code: status === 413 ? 'RequestEntityTooLarge' : 'MalformedRequest',
      message,
      category: ErrorCategory.MalformedParameter,
      details: { status },
    });
  }
  return internalError(message);
}

/** Global error handling middleware, rendering through the gateway's default codec. */
export function createErrorHandler(gateway: Gateway): ErrorRequestHandler {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const error = describe(err);
    const response = gateway.renderError(error);
    const status = transportStatus(err) ?? response.status;

    if (error.category === ErrorCategory.Internal) {
      log.error('Unhandled request error', errorFields(err));
    } else {
      log.warn('Request error', { code: error.code, status });
    }

    res.status(status).set(response.headers).send(response.body);
  };
}
