/**
 * @eq/config - Configuration schemas and loaders
 *
 * This package contains:
 * - Zod schemas for the engine, paths and logging sections
 * - YAML loading with environment-specific overrides
 * - Environment variable overrides
 */

export const PACKAGE_NAME = "@eq/config";
export const VERSION = "0.1.0";

export {
	ConfigEnvironment,
	type EnvSource,
	envOverrides,
	parseEnv,
	resolveConfigEnvironment,
} from "./env";
export { type LoadConfigOptions, loadConfig, loadConfigWithEnv } from "./loader";
export * from "./schemas";
export {
	type AppConfig,
	AppConfigSchema,
	defaultConfig,
	type ValidationResult,
	validateConfig,
	validateConfigOrThrow,
} from "./validate";
