/**
 * Higher-order function that wraps Express route handlers to automatically handle async errors
 */

import type { NextFunction, Request, Response } from 'express';
import { formatError } from './error-formatter';
import { log } from './logger';

type AsyncRouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Wraps an async route handler function to automatically catch and forward errors to Express error middleware
 * @param handler Async function that handles a route
 * @returns An Express-compatible route handler with error handling
 */
export const asyncHandler = (handler: AsyncRouteHandler) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await handler(req, res, next);
    } catch (error) {
      log.debug("Route handler raised an error", { path: req.path, error: formatError(error) });
      next(error);
    }
  };
};
