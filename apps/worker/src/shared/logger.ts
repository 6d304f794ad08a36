/**
 * Shared Logger
 *
 * Centralized logging for the worker.
 */

import type { LoggingConfig } from "@eq/config";
import { createNodeLogger, type DestinationStream, type Logger } from "@eq/logger";

export const SERVICE_NAME = "execution-quality";

export interface WorkerLoggerOptions extends Partial<LoggingConfig> {
	environment?: string;
	destination?: DestinationStream;
}

export function createWorkerLogger(options: WorkerLoggerOptions = {}): Logger {
	return createNodeLogger({
		service: SERVICE_NAME,
		level: options.level ?? "info",
		environment: options.environment,
		pretty: options.pretty ?? false,
		destination: options.destination,
	});
}
