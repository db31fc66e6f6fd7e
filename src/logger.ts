/**
 * Logger Module
 *
 * Pino-based structured logging.
 * Provides child loggers for the main components (ingestion, retrieval, storage).
 */

import pino from "pino";

const isDev = process.env.NODE_ENV !== "production";

export const logger = pino({
	level: process.env.LOG_LEVEL || (isDev ? "debug" : "info"),
	transport: isDev
		? {
				target: "pino-pretty",
				options: {
					colorize: true,
					ignore: "pid,hostname",
					translateTime: "HH:MM:ss",
				},
			}
		: undefined,
});

// Child loggers for different components
export const ingestionLogger = logger.child({ module: "ingestion" });
export const retrievalLogger = logger.child({ module: "retrieval" });
export const storageLogger = logger.child({ module: "storage" });
export const configLogger = logger.child({ module: "config" });
