import type { SessionService } from '@/services/session-service';
import type { AuthenticatedRequest } from '@/types/common';
import { formatError } from '@/utils/error-formatter';
import { log } from '@/utils/logger';
import type { NextFunction, Request, Response } from 'express';
import { AuthenticationError } from './error';

export const BEARER_PREFIX = 'Bearer ';

/**
 * Builds the middleware that rejects requests without a valid session token
 * and attaches the bound user ID to the request.
 */
export const createRequireAuth = (sessions: SessionService) => async (
  req: Request,
  _res: Response,
  next: NextFunction
): Promise<void> => {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
    return next(new AuthenticationError('Unauthorized: Missing or invalid Bearer token'));
  }

  const token = authHeader.slice(BEARER_PREFIX.length).trim();
  if (!token) {
    return next(new AuthenticationError('Unauthorized: Token is missing'));
  }

  try {
    const result = await sessions.verifySessionToken(token);

    if (!result.success) {
      return next(result.error);
    }

    Object.assign(req, { userId: result.data.userId });
    log.debug("Session token validated for user", { userId: result.data.userId });
    next();
  } catch (error) {
    log.error('Unexpected error during token verification', { error: formatError(error) });
    next(new AuthenticationError('Token verification failed unexpectedly'));
  }
};

export const isAuthenticatedRequest = (req: Request): req is AuthenticatedRequest =>
  'userId' in req && typeof req.userId === 'string' && req.userId.length > 0;

/**
 * The user ID attached by requireAuth. Throws if the middleware did not run.
 */
export const getUserId = (req: Request): string => {
  if (!isAuthenticatedRequest(req)) {
    throw new AuthenticationError('Unauthorized: No user ID found after auth middleware');
  }
  return req.userId;
};
