import { ErrorCode } from '@/types/common';
import type { NextFunction, Request, Response } from 'express';
import { log } from '../utils/logger';

/**
 * Base class for application errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SERVER_ERROR,
    statusCode = 500,
    isOperational = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error - thrown when request data is invalid
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.VALIDATION, 400);
    this.name = 'ValidationError';
  }
}

/**
 * Authentication error - thrown when user is not authenticated
 */
export class AuthenticationError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.AUTHENTICATION, 401);
    this.name = 'AuthenticationError';
  }
}

/**
 * Not found error - thrown when a resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.NOT_FOUND, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Rate limit error - thrown when request rate exceeds limits
 */
export class RateLimitError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.RATE_LIMIT, 429);
    this.name = 'RateLimitError';
  }
}

/**
 * External service error - thrown when an external API fails
 */
export class ExternalServiceError extends AppError {
  constructor(message: string, serviceName?: string) {
    super(
      serviceName ? `${serviceName} service error: ${message}` : message,
      ErrorCode.EXTERNAL_SERVICE,
      503
    );
    this.name = 'ExternalServiceError';
  }
}

/**
 * Configuration error - the process must not start with this configuration
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.CONFIGURATION, 500, false);
    this.name = 'ConfigurationError';
  }
}

/**
 * Global error handler middleware.
 * In production, messages of non-operational errors are replaced with a generic one.
 */
export const createErrorHandler = (nodeEnv: string) => (
  err: unknown,
  _req: Request,
  res: Response,
  // Express recognises error middleware by its arity
  _next: NextFunction
): Response | void => {
  if (res.headersSent) {
    log.error("Error occurred after response was sent", { error: err });
    return;
  }
  const error = err instanceof Error ? err : new Error(String(err));
  const isProduction = nodeEnv === 'production';

  if (error instanceof AppError) {
    const { statusCode, code, message, isOperational } = error;
    const logMeta = { message, name: error.name, statusCode };
    if (statusCode >= 500) {
      log.error("Request failed", { ...logMeta, stack: isProduction ? undefined : error.stack });
    } else {
      log.warn("Request rejected", logMeta);
    }

    const errorMessage = (!isOperational && isProduction)
      ? 'An unexpected error occurred'
      : message;

    return res.status(statusCode).json({
      success: false,
      error: code,
      message: errorMessage
    });
  }

  // body-parser marks malformed JSON with type 'entity.parse.failed'
  if (error.name === 'SyntaxError' || ('type' in error && error.type === 'entity.parse.failed')) {
    log.warn("Rejected malformed JSON body", { message: error.message });
    return res.status(400).json({
      success: false,
      error: ErrorCode.VALIDATION,
      message: 'Invalid JSON in request body'
    });
  }

  log.error("Unhandled error", {
    message: error.message,
    name: error.name,
    stack: isProduction ? undefined : error.stack
  });

  return res.status(500).json({
    success: false,
    error: ErrorCode.SERVER_ERROR,
    message: isProduction ? 'An unexpected error occurred' : error.message
  });
};
