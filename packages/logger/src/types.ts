import type { LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface NodeLoggerOptions {
	/** Service name stamped on every record */
	service: string;
	level?: LogLevel;
	environment?: string;
	version?: string;
	/** Human-readable single-line output through pino-pretty */
	pretty?: boolean;
	/** Extra paths to censor, merged with the defaults */
	redactPaths?: string[];
	base?: Record<string, unknown>;
	pinoOptions?: Partial<LoggerOptions>;
}

/**
 * Identifies one batch run in every log line it produces
 */
export interface RunContext {
	runId: string;
	/** Name of the configuration environment the run was loaded with */
	environment?: string;
}
