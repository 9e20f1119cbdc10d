// src/types/common.ts
import type { NextFunction, Request, Response } from 'express';

/**
 * Request object after `requireAuth` has validated the bearer token
 */
export interface AuthenticatedRequest extends Request {
  userId: string;
}

/**
 * Type for middleware functions
 */
export type Middleware = (
  req: Request,
  res: Response,
  next: NextFunction
) => void | Promise<void>;

/**
 * Application error codes (as const object)
 */
export const ErrorCode = {
  AUTHENTICATION: 'authentication_error',
  VALIDATION: 'validation_error',
  NOT_FOUND: 'not_found',
  RATE_LIMIT: 'rate_limit',
  SERVER_ERROR: 'server_error',
  EXTERNAL_SERVICE: 'external_service_error',
  CONFIGURATION: 'configuration_error'
} as const;
export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Result type for operations that can fail
 */
export type Result<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E; code?: string };

/**
 * Source of the current time. Injected so expiry logic can be tested at exact boundaries.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
