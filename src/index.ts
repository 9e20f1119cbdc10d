// src/index.ts
import "dotenv/config";
import type { Server } from "node:http";
import { createApp } from "@/api";
import { loadConfig } from "@/config";
import { closeDatabase, createDatabase, type DatabaseConnection } from "@/database";
import { runMigrations } from "@/database/migrations";
import { createServices } from "@/services";
import { formatError } from "@/utils/error-formatter";
import { log } from "@/utils/logger";

const SHUTDOWN_TIMEOUT_MS = 10_000;

const startServer = (): void => {
	let connection: DatabaseConnection | null = null;
	try {
		// 1. Configuration: missing or weak secrets abort startup
		const config = loadConfig();

		// 2. Database and schema
		connection = createDatabase(config.databasePath);
		runMigrations(connection.sqlite);

		// 3. Services and HTTP app
		const services = createServices(config, connection.db);
		const app = createApp({ config, services });

		const server: Server = app.listen(config.port, () => {
			log.info(`Server running on port ${config.port} in ${config.nodeEnv} mode`);
		});

		const openConnection = connection;
		const gracefulShutdown = (signal: string): void => {
			log.info("Shutting down server...", { signal });

			server.close((err) => {
				if (err) {
					log.error(`Error closing HTTP server: ${err.message}`);
				} else {
					log.info("HTTP server closed");
				}
				closeDatabase(openConnection);
				log.info("Shutdown complete");
				process.exit(err ? 1 : 0);
			});

			setTimeout(() => {
				log.error("Graceful shutdown timeout exceeded. Forcing exit.");
				process.exit(1);
			}, SHUTDOWN_TIMEOUT_MS).unref();
		};

		process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
		process.on("SIGINT", () => gracefulShutdown("SIGINT"));
	} catch (error) {
		log.error("Server startup failed", { error: formatError(error) });
		if (connection) {
			closeDatabase(connection);
		}
		process.exit(1);
	}
};

startServer();
