import type { NextFunction, Request, Response } from "express";
import { RateLimiterMemory, RateLimiterRes } from "rate-limiter-flexible";
import { formatError } from "@/utils/error-formatter";
import { log } from "@/utils/logger";
import { RateLimitError } from "./error";

const setRateLimitHeaders = (
	res: Response,
	maxRequests: number,
	state: RateLimiterRes,
): void => {
	res.setHeader("RateLimit-Limit", maxRequests);
	res.setHeader("RateLimit-Remaining", Math.max(0, state.remainingPoints));
	res.setHeader("RateLimit-Reset", Math.ceil(state.msBeforeNext / 1000));
};

/**
 * Factory function to create rate limiter middleware
 * @param name The name of the rate limiter (used as the key prefix)
 * @param maxRequests Maximum number of requests allowed in the time window
 * @param windowMs Time window in milliseconds
 * @returns Express middleware function
 */
export const createRateLimiter = (
	name: string,
	maxRequests: number,
	windowMs: number,
) => {
	const limiter = new RateLimiterMemory({
		keyPrefix: `rl_${name}`,
		points: maxRequests,
		duration: Math.max(1, Math.ceil(windowMs / 1000)),
	});

	return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
		const key = `${req.ip || "unknown"}:${req.method}:${req.path}`;

		try {
			const state = await limiter.consume(key);
			setRateLimitHeaders(res, maxRequests, state);
			next();
		} catch (rejection) {
			// consume() rejects with a RateLimiterRes when the budget is spent
			if (rejection instanceof RateLimiterRes) {
				const retryAfterSeconds = Math.ceil(rejection.msBeforeNext / 1000);
				setRateLimitHeaders(res, maxRequests, rejection);
				res.setHeader("Retry-After", retryAfterSeconds);
				log.warn("Rate limit exceeded", {
					limiter: name,
					method: req.method,
					path: req.path,
				});
				next(
					new RateLimitError(
						`Too many requests. Please try again in ${retryAfterSeconds} seconds.`,
					),
				);
				return;
			}

			log.error("Error in rate limiter middleware", {
				limiter: name,
				error: formatError(rejection),
			});
			next(rejection);
		}
	};
};
