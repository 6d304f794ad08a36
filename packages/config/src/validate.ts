/**
 * Configuration Validation
 *
 * Combines the sub-schemas into a single AppConfigSchema.
 */

import { ConfigurationError } from "@eq/domain";
import { z } from "zod";
import { EngineConfigSchema } from "./schemas/engine";
import { LoggingConfigSchema } from "./schemas/logging";
import { PathsConfigSchema } from "./schemas/paths";

// ============================================
// Complete Configuration Schema
// ============================================

export const AppConfigSchema = z.object({
	/**
	 * Benchmark resolution and metric parameters
	 */
	engine: EngineConfigSchema.default({}),

	/**
	 * Dataset and report locations
	 */
	paths: PathsConfigSchema.default({}),

	logging: LoggingConfigSchema.default({}),
});
export type AppConfig = z.infer<typeof AppConfigSchema>;

// ============================================
// Validation Functions
// ============================================

export type ValidationResult =
	| { success: true; data: AppConfig; errors: [] }
	| { success: false; errors: string[] };

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
}

/**
 * Validate a raw configuration object
 */
export function validateConfig(config: unknown): ValidationResult {
	const result = AppConfigSchema.safeParse(config);

	if (result.success) {
		return { success: true, data: result.data, errors: [] };
	}
	return { success: false, errors: formatIssues(result.error) };
}

/**
 * Validate configuration and throw on error
 *
 * @throws ConfigurationError listing every failing path
 */
export function validateConfigOrThrow(config: unknown): AppConfig {
	const result = validateConfig(config);
	if (!result.success) {
		throw new ConfigurationError("Invalid configuration", result.errors);
	}
	return result.data;
}

/**
 * Configuration with every default applied
 */
export function defaultConfig(): AppConfig {
	return AppConfigSchema.parse({});
}
