import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { StorageFaultError } from '../../storage/AnalysisStore.js';
import { UnknownSubjectError } from '../../services/ClassificationService.js';
import { logger } from '../../utils/logger.js';

/**
 * Base class for errors that carry their own HTTP status
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * Forward rejections from async route handlers to the error middleware
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  if (error instanceof UnknownSubjectError) {
    return new NotFoundError(error.message);
  }
  if (error instanceof StorageFaultError) {
    return new ApiError('Analysis store unavailable', 503, 'STORAGE_UNAVAILABLE');
  }
  // body-parser marks malformed JSON with a 400 status
  if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
    return new ValidationError('Malformed JSON body');
  }
  return new ApiError('Internal server error', 500, 'INTERNAL_ERROR');
}

/**
 * Error handling middleware; must be registered after all routes
 */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const apiError = toApiError(error);

  if (apiError.statusCode >= 500) {
    logger.error(`${req.method} ${req.originalUrl} failed`, error);
  } else {
    logger.debug(`${req.method} ${req.originalUrl} rejected: ${apiError.message}`);
  }

  res.status(apiError.statusCode).json({
    error: {
      code: apiError.code,
      message: apiError.message,
      ...(apiError.details !== undefined ? { details: apiError.details } : {}),
    },
  });
}
