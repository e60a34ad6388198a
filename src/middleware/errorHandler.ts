import { Request, Response, NextFunction } from 'express';
import { ApiResponse, ValidationError as FieldError } from '../types';
import { config } from '../config';
import logger, { logError } from '../utils/logger';

// ============================================
// Custom Error Classes
// ============================================

// Base application error
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;
  code?: string;

  constructor(message: string, statusCode: number, code?: string) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;
    this.name = this.constructor.name;

    Error.captureStackTrace(this, this.constructor);
  }
}

// Not found error (404)
export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

// Validation error (400 unless told otherwise)
export class ValidationError extends AppError {
  errors: FieldError[];

  constructor(errors: FieldError[], statusCode: number = 400) {
    super('Validation failed', statusCode, 'VALIDATION_ERROR');
    this.errors = errors;
  }
}

// ============================================
// Error Response Builder
// ============================================

export interface ErrorResponse extends ApiResponse {
  code?: string;
  requestId?: string;
  timestamp?: string;
  path?: string;
  stack?: string;
}

const buildErrorResponse = (
  err: Error,
  req: Request,
  message: string,
  errors?: FieldError[]
): ErrorResponse => {
  const response: ErrorResponse = {
    success: false,
    error: message,
    timestamp: new Date().toISOString(),
    path: req.originalUrl,
  };

  if (req.requestId) {
    response.requestId = req.requestId;
  }

  if (err instanceof AppError && err.code) {
    response.code = err.code;
  }

  if (errors) {
    response.errors = errors;
  }

  // Stack traces only in development, and only for unexpected errors
  if (config.isDevelopment && !(err instanceof AppError && err.isOperational)) {
    response.stack = err.stack;
  }

  return response;
};

// ============================================
// Sanitize Error Messages for Production
// ============================================

const sanitizeErrorMessage = (message: string, statusCode: number): string => {
  if (config.isProduction && statusCode === 500) {
    return 'An unexpected error occurred. Please try again later.';
  }

  return message;
};

// ============================================
// Global Error Handler Middleware
// ============================================

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  let statusCode = 500;
  let message = 'Internal server error';
  let errors: FieldError[] | undefined;

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    message = err.message;

    if (err instanceof ValidationError) {
      errors = err.errors;
    }
  }
  // ----------------------------------------
  // Handle syntax errors (malformed JSON)
  // ----------------------------------------
  else if (err instanceof SyntaxError && 'body' in err) {
    statusCode = 400;
    message = 'Invalid JSON in request body';
  } else {
    logError('Unexpected error', err, {
      requestId: req.requestId,
      path: req.path,
      method: req.method,
    });
    message = err.message || message;
  }

  message = sanitizeErrorMessage(message, statusCode);

  const response = buildErrorResponse(err, req, message, errors);

  if (statusCode >= 500 || config.isDevelopment) {
    logger.error(`${statusCode} ${req.method} ${req.path}: ${message}`, {
      requestId: req.requestId,
      statusCode,
      error: err.message,
      stack: err.stack,
    });
  }

  res.status(statusCode).json(response);
};

// ============================================
// Async Handler Wrapper
// ============================================

export const asyncHandler = <T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

// ============================================
// 404 Handler for Unknown Routes
// ============================================

export const notFoundHandler = (req: Request, res: Response): void => {
  const response: ErrorResponse = {
    success: false,
    error: `Route ${req.method} ${req.originalUrl} not found`,
    code: 'ROUTE_NOT_FOUND',
    timestamp: new Date().toISOString(),
    path: req.originalUrl,
  };

  if (req.requestId) {
    response.requestId = req.requestId;
  }

  res.status(404).json(response);
};

// ============================================
// Unhandled Rejection & Exception Handlers
// ============================================

export const setupGlobalErrorHandlers = (): void => {
  process.on('unhandledRejection', (reason: unknown) => {
    logError('Unhandled Promise Rejection', reason instanceof Error ? reason : new Error(String(reason)));

    if (config.isProduction) {
      logger.error('Unhandled rejection in production - initiating graceful shutdown');
      // Give time for logging before exit
      setTimeout(() => process.exit(1), 1000);
    }
  });

  // Uncaught exceptions are severe - always exit
  process.on('uncaughtException', (error: Error) => {
    logError('Uncaught Exception', error);
    logger.error('Uncaught exception - initiating immediate shutdown');
    setTimeout(() => process.exit(1), 1000);
  });
};

export default AppError;
