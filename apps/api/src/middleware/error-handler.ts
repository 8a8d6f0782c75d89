import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import {
  ConflictError,
  DomainError,
  ForbiddenError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from '@salesdesk/core';

import { logger } from '../config/logger';
import { HandledError } from '../utils/http-validation';

export interface ApiError {
  status: number;
  code: string;
  message: string;
  details?: unknown;
  stack?: string;
}

const toApiError = (error: Error): ApiError => {
  if (error instanceof HandledError) {
    return { status: error.status, code: error.code, message: error.message, details: error.details };
  }

  if (error instanceof ValidationError) {
    return { status: 400, code: 'VALIDATION_ERROR', message: error.message, details: error.details };
  }

  if (error instanceof NotFoundError) {
    return { status: 404, code: 'NOT_FOUND', message: error.message, details: error.details };
  }

  if (error instanceof ConflictError) {
    return { status: 409, code: 'CONFLICT', message: error.message, details: error.details };
  }

  if (error instanceof UnauthorizedError) {
    return { status: 401, code: 'UNAUTHORIZED', message: error.message };
  }

  if (error instanceof ForbiddenError) {
    return { status: 403, code: 'FORBIDDEN', message: error.message };
  }

  if (error instanceof DomainError) {
    return { status: 400, code: error.code, message: error.message, details: error.details };
  }

  if (error instanceof ZodError) {
    return {
      status: 400,
      code: 'VALIDATION_ERROR',
      message: 'Invalid request data',
      details: error.errors.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
        code: issue.code,
      })),
    };
  }

  if (error instanceof SyntaxError && 'body' in error) {
    return { status: 400, code: 'INVALID_JSON', message: 'Malformed JSON body' };
  }

  return {
    status: 500,
    code: 'INTERNAL_SERVER_ERROR',
    message: process.env.NODE_ENV === 'production' ? 'Internal server error' : error.message,
  };
};

export const errorHandler = (error: Error, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(error);
  }

  const apiError = toApiError(error);
  const requestId = req.rid ?? null;

  if (process.env.NODE_ENV !== 'production' && apiError.status >= 500) {
    apiError.stack = error.stack;
  }

  const logLevel = apiError.status >= 500 ? 'error' : 'warn';
  logger[logLevel]('API Error', {
    requestId,
    error: {
      status: apiError.status,
      code: apiError.code,
      message: apiError.message,
      details: apiError.details,
      stack: apiError.status >= 500 ? error.stack : undefined,
    },
    request: {
      method: req.method,
      path: req.originalUrl ?? req.path,
      tenantId: req.user?.tenantId ?? null,
      userId: req.user?.id ?? null,
    },
  });

  if (requestId) {
    res.setHeader('X-Request-Id', requestId);
  }

  res.status(apiError.status).json({
    success: false,
    error: {
      code: apiError.code,
      message: apiError.message,
      details: apiError.details,
      stack: apiError.stack,
      requestId,
    },
    timestamp: new Date().toISOString(),
    path: req.path,
    method: req.method,
  });
};

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

export const asyncHandler =
  (fn: AsyncRoute): RequestHandler =>
  (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
