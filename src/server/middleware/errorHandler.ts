/**
 * Minutes Insights - Error Handler Middleware
 * Centralized error handling for the HTTP API
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';

import { isProduction } from '../../utils/helpers.js';
import logger from '../../utils/logger.js';
import { InsightsError, ValidationError } from '../../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export interface ErrorResponse {
  error: string;
  code: string;
  statusCode: number;
  requestId?: string;
  details?: string[];
}

// =============================================================================
// Error Handler Middleware
// =============================================================================

/**
 * Central error handling middleware
 * Catches all errors and returns the JSON error envelope
 */
export const errorHandler: ErrorRequestHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const errorResponse = buildErrorResponse(err, req.requestId);

  logError(err, req, errorResponse);

  res.status(errorResponse.statusCode).json(errorResponse);
};

function hasStatusCode(err: Error): err is Error & { statusCode: number } {
  return 'statusCode' in err && typeof err.statusCode === 'number';
}

function hasStatus(err: Error): err is Error & { status: number; type?: string } {
  return 'status' in err && typeof err.status === 'number';
}

/**
 * Build a standardized error response object
 */
export function buildErrorResponse(err: Error, requestId?: string): ErrorResponse {
  if (err instanceof InsightsError) {
    const response: ErrorResponse = {
      error: err.message,
      code: err.code,
      statusCode: err.statusCode,
    };

    if (requestId) {
      response.requestId = requestId;
    }

    if (err instanceof ValidationError && err.validationErrors.length > 0) {
      response.details = err.validationErrors;
    }

    return response;
  }

  // body-parser errors carry `status`, most other HTTP errors `statusCode`
  const httpStatus = hasStatusCode(err) ? err.statusCode : hasStatus(err) ? err.status : undefined;
  if (httpStatus !== undefined && httpStatus >= 400 && httpStatus < 600) {
    return {
      error: err.message || 'An error occurred',
      code: httpStatus === 400 ? 'BAD_REQUEST' : 'HTTP_ERROR',
      statusCode: httpStatus,
      requestId,
    };
  }

  return {
    error: isProduction() ? 'Internal server error' : err.message,
    code: 'INTERNAL_ERROR',
    statusCode: 500,
    requestId,
  };
}

/**
 * Log error with appropriate level and context
 */
function logError(err: Error, req: Request, errorResponse: ErrorResponse): void {
  const logContext = {
    requestId: errorResponse.requestId,
    method: req.method,
    path: req.path,
    statusCode: errorResponse.statusCode,
    errorCode: errorResponse.code,
    ip: req.ip,
    userAgent: req.headers['user-agent'],
  };

  if (errorResponse.statusCode >= 500) {
    logger.error(err.message, {
      ...logContext,
      stack: err.stack,
    });
  } else {
    logger.warn(err.message, logContext);
  }
}

// =============================================================================
// Not Found Handler
// =============================================================================

export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  const errorResponse: ErrorResponse = {
    error: `Route not found: ${req.method} ${req.path}`,
    code: 'NOT_FOUND',
    statusCode: 404,
    requestId: req.requestId,
  };

  logger.warn('Route not found', {
    requestId: req.requestId,
    method: req.method,
    path: req.path,
    ip: req.ip,
  });

  res.status(404).json(errorResponse);
};

// =============================================================================
// Async Handler Wrapper
// =============================================================================

/**
 * Wrap async route handlers to properly catch and forward errors
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export default errorHandler;
