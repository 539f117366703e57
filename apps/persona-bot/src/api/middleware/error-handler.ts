import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { PersonaBotError, ValidationError, handleError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger('ErrorHandler');

/**
 * API Response format
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data: T | null;
  error: {
    code: string;
    message: string;
    details?: unknown;
  } | null;
  timestamp: string;
}

/**
 * Body-parser reports malformed JSON as an error carrying an HTTP status
 */
function isClientHttpError(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

function normalize(err: unknown): PersonaBotError {
  if (err instanceof z.ZodError) {
    return new ValidationError('Invalid request data', err.errors);
  }
  if (isClientHttpError(err)) {
    return new PersonaBotError(err.message, 'BAD_REQUEST', err.status);
  }
  return handleError(err);
}

/**
 * Global error handler middleware
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response<ApiResponse<null>>,
  // Express recognises error middleware by its four parameters
  _next: NextFunction
): void {
  const error = normalize(err);

  if (error.statusCode >= 500) {
    logger.error(`${req.method} ${req.path} failed`, err);
  } else {
    logger.warn(`${req.method} ${req.path} rejected: ${error.message}`, { code: error.code });
  }

  res.status(error.statusCode).json({
    success: false,
    data: null,
    error: {
      code: error.code,
      message: error.statusCode >= 500 && process.env.NODE_ENV === 'production'
        ? 'An unexpected error occurred'
        : error.message,
      details: error.statusCode < 500 ? error.details : undefined,
    },
    timestamp: new Date().toISOString(),
  });
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response<ApiResponse<null>>): void {
  res.status(404).json({
    success: false,
    data: null,
    error: {
      code: 'NOT_FOUND',
      message: `Route not found: ${req.method} ${req.path}`,
    },
    timestamp: new Date().toISOString(),
  });
}
