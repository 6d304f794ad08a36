/**
 * Configuration Loader
 *
 * Loads default.yaml, overlays the environment-specific file and then the
 * environment variables, and validates the result.
 *
 * Precedence (highest to lowest):
 * 1. Environment variables (see env.ts)
 * 2. <environment>.yaml
 * 3. default.yaml
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { ConfigurationError, getErrorMessage } from "@eq/domain";
import { deepmergeCustom } from "deepmerge-ts";
import { parse } from "yaml";
import { type ConfigEnvironment, type EnvSource, envOverrides, resolveConfigEnvironment } from "./env";
import { type AppConfig, validateConfigOrThrow } from "./validate";

/**
 * Later sources replace arrays instead of concatenating them
 */
const mergeConfig = deepmergeCustom({ mergeArrays: false });

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
	return isRecord(error) && error.code === "ENOENT";
}

async function readText(path: string, optional: boolean): Promise<string | null> {
	try {
		return await readFile(path, "utf-8");
	} catch (error) {
		if (optional && isMissingFile(error)) {
			return null;
		}
		throw new ConfigurationError(`Failed to load YAML from ${path}: ${getErrorMessage(error)}`, [], {
			cause: error,
		});
	}
}

/**
 * Parse a YAML mapping; an empty document is an empty mapping
 *
 * @throws ConfigurationError if the content cannot be parsed or is not a mapping
 */
function parseMapping(content: string, path: string): Record<string, unknown> {
	let parsed: unknown;
	try {
		parsed = parse(content);
	} catch (error) {
		throw new ConfigurationError(`Failed to parse YAML from ${path}: ${getErrorMessage(error)}`, [], {
			cause: error,
		});
	}

	if (parsed === null || parsed === undefined) {
		return {};
	}
	if (!isRecord(parsed)) {
		throw new ConfigurationError(`Configuration in ${path} must be a mapping`);
	}
	return parsed;
}

async function loadYaml(path: string, optional = false): Promise<Record<string, unknown>> {
	const content = await readText(path, optional);
	return content === null ? {} : parseMapping(content, path);
}

export interface LoadConfigOptions {
	/** Directory holding default.yaml and <environment>.yaml */
	configDir?: string;
	/** Variables to read overrides from; pass {} to ignore the process environment */
	env?: EnvSource;
}

/**
 * Load configuration for an environment
 */
export async function loadConfig(
	environment: ConfigEnvironment,
	options: LoadConfigOptions = {}
): Promise<AppConfig> {
	const { configDir = "configs", env = process.env } = options;

	const base = await loadYaml(join(configDir, "default.yaml"));
	const override = await loadYaml(join(configDir, `${environment}.yaml`), true);

	return validateConfigOrThrow(mergeConfig(base, override, envOverrides(env)));
}

/**
 * Load configuration for the environment selected by EQ_CONFIG_ENV / NODE_ENV
 */
export async function loadConfigWithEnv(
	options: LoadConfigOptions = {}
): Promise<{ environment: ConfigEnvironment; config: AppConfig }> {
	const env = options.env ?? process.env;
	const environment = resolveConfigEnvironment(env);
	const config = await loadConfig(environment, { ...options, env });
	return { environment, config };
}
