import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";
import pinoPretty, { type PrettyOptions } from "pino-pretty";
import { mergeRedactPaths } from "./redaction";
import type { NodeLoggerOptions, RunContext } from "./types";

export interface CreateLoggerOptions extends NodeLoggerOptions {
	/** Write records here instead of stdout; pretty output is rendered in-process */
	destination?: DestinationStream;
}

export function createNodeLogger(options: CreateLoggerOptions): Logger {
	const {
		service,
		level = "info",
		environment,
		version,
		pretty,
		redactPaths,
		base = {},
		pinoOptions = {},
		destination,
	} = options;

	const isPretty = pretty ?? process.env.NODE_ENV === "development";

	const loggerOptions: LoggerOptions = {
		level,
		formatters: {
			level: (label) => ({ severity: label.toUpperCase() }),
			bindings: () => ({}), // Remove pid, hostname
		},
		timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
		redact: {
			paths: mergeRedactPaths(redactPaths),
			censor: "[REDACTED]",
		},
		base: {
			service,
			environment,
			version,
			...base,
		},
		...pinoOptions,
	};

	if (isPretty) {
		const prettyOptions: PrettyOptions = {
			colorize: destination === undefined,
			translateTime: "SYS:HH:MM:ss",
			timestampKey: "timestamp",
			ignore: "pid,hostname,service,environment,version",
			customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
			singleLine: true,
		};
		if (destination) {
			return pino(loggerOptions, pinoPretty({ ...prettyOptions, destination }));
		}
		return pino(loggerOptions, pino.transport({ target: "pino-pretty", options: prettyOptions }));
	}

	return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

export function withRunContext(logger: Logger, context: RunContext): Logger {
	return logger.child({
		runId: context.runId,
		configEnvironment: context.environment,
	});
}

/**
 * Flush buffered records, e.g. before the process exits.
 */
export function flushLogger(logger: Logger): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		logger.flush((error) => {
			if (error) {
				reject(error);
				return;
			}
			resolve();
		});
	});
}
