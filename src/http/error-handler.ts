import type { NextFunction, Request, Response } from 'express';

import { AppError } from '../errors/app-error.js';
import { logError } from '../services/logger.js';

interface ErrorResponse {
  error: {
    message: string;
    code: string;
    statusCode: number;
    stack?: string;
  };
}

/** body-parser marks its own failures with an HTTP status. */
function getParserStatus(err: Error): number | undefined {
  const status: unknown = Reflect.get(err, 'status');
  return typeof status === 'number' && status >= 400 && status < 500
    ? status
    : undefined;
}

function getStatusCode(err: Error): number {
  if (err instanceof AppError) return err.statusCode;
  return getParserStatus(err) ?? 500;
}

function getErrorCode(err: Error): string {
  if (err instanceof AppError) return err.code;
  return getParserStatus(err) === undefined ? 'INTERNAL_ERROR' : 'BAD_REQUEST';
}

function getPublicMessage(err: Error): string {
  if (err instanceof AppError || getParserStatus(err) !== undefined) {
    return err.message;
  }
  return 'Internal Server Error';
}

function buildErrorResponse(err: Error): ErrorResponse {
  const response: ErrorResponse = {
    error: {
      message: getPublicMessage(err),
      code: getErrorCode(err),
      statusCode: getStatusCode(err),
    },
  };

  if (process.env.NODE_ENV === 'development') {
    response.error.stack = err.stack;
  }

  return response;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const statusCode = getStatusCode(err);
  logError(
    `HTTP ${statusCode}: ${err.message} - ${req.method} ${req.path}`,
    err
  );

  res.status(statusCode).json(buildErrorResponse(err));
}
