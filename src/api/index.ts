// src/api/index.ts
import { createRequireAuth } from "@/middleware/auth";
import { NotFoundError, createErrorHandler } from "@/middleware/error";
import { createRateLimiter } from "@/middleware/rate-limit";
import type { AppServices } from "@/services";
import type { HealthResponse } from "@/types/api";
import type { AppConfig } from "@/types/config";
import { log } from "@/utils/logger";
import cors from "cors";
import express, { type Application } from "express";
import helmet from "helmet";
import { createAuthRouter } from "./routes/auth";
import { createSubscriptionRouter } from "./routes/subscription";

export interface AppDependencies {
	config: AppConfig;
	services: AppServices;
}

export const createApp = ({ config, services }: AppDependencies): Application => {
	const app = express();
	const { windowMs, maxRequestsPerWindow } = config.rateLimit;

	app.use(helmet());
	app.use(
		cors({
			origin: config.corsOrigin,
			methods: ["GET", "POST"],
			allowedHeaders: ["Content-Type", "Authorization"],
		}),
	);

	// Request logger
	app.use((req, res, next) => {
		const start = Date.now();

		res.on("finish", () => {
			log.debug("Request finished", {
				method: req.method,
				path: req.path,
				statusCode: res.statusCode,
				durationMs: Date.now() - start,
			});
		});

		next();
	});

	app.use(express.json({ limit: "1mb" }));

	// Health check endpoint
	app.get("/health", (_req, res) => {
		const body: HealthResponse = { status: "healthy", timestamp: new Date().toISOString() };
		res.status(200).json(body);
	});

	app.use(createRateLimiter("api", maxRequestsPerWindow.default, windowMs));

	app.use(
		"/auth",
		createAuthRouter(services, createRateLimiter("auth", maxRequestsPerWindow.auth, windowMs)),
	);
	app.use(
		"/subscription",
		createSubscriptionRouter(services.entitlements, createRequireAuth(services.sessions)),
	);

	// 404 handler
	app.use((req, _res, next) => {
		next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
	});

	app.use(createErrorHandler(config.nodeEnv));

	return app;
};
