import { NextFunction, Request, Response } from 'express';
import { ErrorResponse } from '../types';
import { generateRequestId } from '../utils/crypto';
import { ErrorType, PinFailedError, ProvenanceError, httpStatusFor } from '../utils/errors';
import { Logger } from '../utils/logger';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      abortSignal?: AbortSignal;
    }
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;

/**
 * Tags each request with an id and an abort signal that fires when the client
 * goes away before the response is written.
 */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const providedId = req.header('x-request-id')?.trim();
  req.requestId = providedId && REQUEST_ID_PATTERN.test(providedId) ? providedId : generateRequestId();

  const controller = new AbortController();
  req.abortSignal = controller.signal;
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });

  res.setHeader('x-request-id', req.requestId);
  Logger.info(`${req.method} ${req.path}`, {
    requestId: req.requestId,
    ip: req.ip,
    userAgent: req.headers['user-agent'],
  });
  next();
}

const SERVER_ERROR_MESSAGES: Partial<Record<ErrorType, string>> = {
  [ErrorType.SERIALIZATION]: 'Record could not be serialized',
  [ErrorType.STORAGE_UNAVAILABLE]: 'Storage backend is unavailable',
  [ErrorType.PIN_FAILED]: 'Record was stored but could not be pinned',
};

/** Server-side failures reach the caller as a fixed message per kind; the detail is logged only. */
export function buildErrorResponse(error: unknown, requestId?: string): { status: number; body: ErrorResponse } {
  const timestamp = new Date().toISOString();

  if (error instanceof ProvenanceError) {
    const status = httpStatusFor(error);
    let message = error.message;
    if (status >= 500) {
      message = SERVER_ERROR_MESSAGES[error.errorType] ?? 'An unexpected error occurred';
      Logger.error(`${error.name}: ${error.message}`, { requestId, errorType: error.errorType, ...error.context });
    } else {
      Logger.warn(error.message, { requestId, errorType: error.errorType, ...error.context });
    }

    return {
      status,
      body: {
        success: false,
        error: error.name,
        message,
        ...(error instanceof PinFailedError ? { contentAddress: error.contentAddress } : {}),
        timestamp,
      },
    };
  }

  Logger.error('Unhandled error', error);
  return {
    status: 500,
    body: {
      success: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
      timestamp,
    },
  };
}

export function sendError(res: Response, error: unknown, requestId?: string): void {
  const { status, body } = buildErrorResponse(error, requestId);
  if (res.headersSent) {
    return;
  }
  res.status(status).json(body);
}

export function errorHandler(err: unknown, req: Request, res: Response<ErrorResponse>, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (typeof err === 'object' && err !== null && Reflect.get(err, 'type') === 'entity.too.large') {
    res.status(413).json({
      success: false,
      error: 'PayloadTooLarge',
      message: 'Request body exceeds the configured limit',
      timestamp: new Date().toISOString(),
    });
    return;
  }

  if (err instanceof SyntaxError) {
    res.status(400).json({
      success: false,
      error: 'ValidationError',
      message: 'Request body is not valid JSON',
      timestamp: new Date().toISOString(),
    });
    return;
  }

  sendError(res, err, req.requestId);
}

export function notFoundHandler(_req: Request, res: Response<ErrorResponse>): void {
  res.status(404).json({
    success: false,
    error: 'NotFound',
    message: 'Route not found',
    timestamp: new Date().toISOString(),
  });
}
