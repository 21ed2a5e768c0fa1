import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AnalyticsError, createServiceLogger } from '@shopper-insights/shared';

const logger = createServiceLogger('insights-api');

export interface AppError extends Error {
  statusCode?: number;
  status?: string;
  code?: string;
}

export const createError = (message: string, statusCode: number = 500, code?: string): AppError => {
  const error: AppError = new Error(message);
  error.statusCode = statusCode;
  error.status = statusCode >= 400 && statusCode < 500 ? 'fail' : 'error';
  error.code = code;
  return error;
};

// Query-string validation failures become 400s; pipeline errors keep their own status
export const normalizeError = (err: unknown): AppError => {
  if (err instanceof ZodError) {
    const message = err.issues.map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`).join(', ');
    return createError(`Validation Error: ${message}`, 400, 'VALIDATION_ERROR');
  }
  if (err instanceof AnalyticsError) {
    return createError(err.message, err.statusCode, err.code);
  }
  if (err instanceof Error) {
    const error: AppError = err;
    error.statusCode = error.statusCode ?? 500;
    return error;
  }
  return createError(String(err));
};

// Global error handler middleware
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const error = normalizeError(err);
  const statusCode = error.statusCode ?? 500;
  const status = error.status ?? (statusCode >= 500 ? 'error' : 'fail');

  const errorLog = {
    message: error.message,
    stack: error.stack,
    statusCode,
    code: error.code,
    url: req.url,
    method: req.method,
    ip: req.ip,
    query: req.query,
    params: req.params,
    requestId: req.headers['x-request-id'] || 'unknown',
  };

  if (statusCode >= 500) {
    logger.error('Server Error', errorLog);
  } else {
    logger.warn('Client Error', errorLog);
  }

  res.status(statusCode).json(createErrorResponse(error, statusCode, status, req));
};

const createErrorResponse = (err: AppError, statusCode: number, status: string, req: Request) => {
  const isDevelopment = process.env.NODE_ENV === 'development';
  const isProduction = process.env.NODE_ENV === 'production';

  const baseResponse = {
    status,
    timestamp: new Date().toISOString(),
    path: req.url,
    method: req.method,
    requestId: req.headers['x-request-id'] || undefined,
  };

  // Production environment - minimal error info
  if (isProduction && statusCode >= 500) {
    return {
      ...baseResponse,
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
    };
  }

  return {
    ...baseResponse,
    error: err.message,
    code: err.code,
    ...(isDevelopment && { stack: err.stack }),
  };
};

// Async error wrapper for route handlers
export const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

// 404 handler for unmatched routes
export const notFoundHandler = (req: Request, res: Response, next: NextFunction) => {
  next(createError(`Route ${req.method} ${req.originalUrl} not found`, 404, 'ROUTE_NOT_FOUND'));
};
