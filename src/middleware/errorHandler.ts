import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { Sentry } from '../sentry';
import logger from '../utils/logger';

// Custom error class for application errors
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

// Global error handler middleware
export function errorHandler(
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction,
) {
  if (err instanceof ZodError) {
    res.status(400).json({
      status: 'error',
      statusCode: 400,
      message: 'Validation error',
      details: err.errors,
    });
    return;
  }

  // Default to 500 server error
  let statusCode = 500;
  let message = 'Internal Server Error';

  // If it's an operational error, use its status code and message
  if (err instanceof AppError && err.isOperational) {
    statusCode = err.statusCode;
    message = err.message;
  }

  logger.error('Error occurred:', {
    name: err.name,
    message: err.message,
    stack: err.stack,
    statusCode,
    path: req.path,
    method: req.method,
  });

  // Send error to Sentry for non-operational errors
  if (!(err instanceof AppError && err.isOperational)) {
    Sentry.captureException(err, {
      contexts: {
        request: {
          method: req.method,
          url: req.url,
        },
      },
    });
  }

  res.status(statusCode).json({
    status: 'error',
    statusCode,
    message,
    ...(process.env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
  });
}

// Handle unhandled promise rejections
export function handleUnhandledRejection() {
  process.on('unhandledRejection', (reason: unknown) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    logger.error('Unhandled Rejection:', {
      message: error.message,
      stack: error.stack,
    });
    Sentry.captureException(error);
  });
}

// Handle uncaught exceptions
export function handleUncaughtException() {
  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception:', {
      message: error.message,
      stack: error.stack,
    });
    Sentry.captureException(error);
    // Exit process after logging
    process.exit(1);
  });
}
