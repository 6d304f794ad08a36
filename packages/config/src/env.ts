/**
 * Environment Variable Overrides
 *
 * | Variable             | Config path          |
 * |----------------------|----------------------|
 * | EXECUTIONS_FILE_PATH | paths.executions     |
 * | REFDATA_FILE_PATH    | paths.refdata        |
 * | MARKETDATA_FILE_PATH | paths.marketdata     |
 * | OUTPUT_FILE_PATH     | paths.output         |
 * | EQ_TOLERANCE_MS      | engine.toleranceMs   |
 * | LOG_LEVEL            | logging.level        |
 * | EQ_CONFIG_ENV        | selects <env>.yaml   |
 */

import { ConfigurationError } from "@eq/domain";
import { z } from "zod";
import { LogLevel } from "./schemas/logging";

export const ConfigEnvironment = z.enum(["development", "production", "test"]);
export type ConfigEnvironment = z.infer<typeof ConfigEnvironment>;

const EnvSchema = z.object({
	EXECUTIONS_FILE_PATH: z.string().optional(),
	REFDATA_FILE_PATH: z.string().optional(),
	MARKETDATA_FILE_PATH: z.string().optional(),
	OUTPUT_FILE_PATH: z.string().optional(),
	EQ_TOLERANCE_MS: z.coerce.number().int().positive().optional(),
	LOG_LEVEL: z
		.string()
		.transform((val) => val.toLowerCase())
		.pipe(LogLevel)
		.optional(),
	EQ_CONFIG_ENV: ConfigEnvironment.optional(),
	NODE_ENV: z.string().optional(),
});
type Env = z.infer<typeof EnvSchema>;

export type EnvSource = Record<string, string | undefined>;

/**
 * Parse the relevant variables; empty values count as unset.
 *
 * @throws ConfigurationError when a set variable is invalid
 */
export function parseEnv(source: EnvSource): Env {
	const present = Object.fromEntries(
		Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== "")
	);
	const result = EnvSchema.safeParse(present);
	if (!result.success) {
		throw new ConfigurationError(
			"Invalid environment",
			result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
		);
	}
	return result.data;
}

/**
 * Choose which <env>.yaml overlays default.yaml
 */
export function resolveConfigEnvironment(source: EnvSource): ConfigEnvironment {
	const env = parseEnv(source);
	if (env.EQ_CONFIG_ENV) {
		return env.EQ_CONFIG_ENV;
	}
	if (env.NODE_ENV === "production" || env.NODE_ENV === "test") {
		return env.NODE_ENV;
	}
	return "development";
}

/**
 * Build a partial configuration object from environment variables.
 */
export function envOverrides(source: EnvSource): Record<string, Record<string, unknown>> {
	const env = parseEnv(source);

	const paths: Record<string, unknown> = {};
	if (env.EXECUTIONS_FILE_PATH) paths.executions = env.EXECUTIONS_FILE_PATH;
	if (env.REFDATA_FILE_PATH) paths.refdata = env.REFDATA_FILE_PATH;
	if (env.MARKETDATA_FILE_PATH) paths.marketdata = env.MARKETDATA_FILE_PATH;
	if (env.OUTPUT_FILE_PATH) paths.output = env.OUTPUT_FILE_PATH;

	const engine: Record<string, unknown> = {};
	if (env.EQ_TOLERANCE_MS !== undefined) engine.toleranceMs = env.EQ_TOLERANCE_MS;

	const logging: Record<string, unknown> = {};
	if (env.LOG_LEVEL) logging.level = env.LOG_LEVEL;

	return { paths, engine, logging };
}
