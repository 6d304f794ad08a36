import { z } from "zod";

export const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);
export type LogLevel = z.infer<typeof LogLevel>;

export const LoggingConfigSchema = z.object({
	level: LogLevel.default("info"),
	/** Single-line colored output through pino-pretty */
	pretty: z.boolean().default(false),
});
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
