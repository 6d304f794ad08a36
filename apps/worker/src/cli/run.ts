/**
 * CLI Runner
 *
 * Resolves configuration, runs one batch and maps the outcome to an exit
 * code: 0 on success, 1 on a fatal error (nothing written).
 */

import { randomUUID } from "node:crypto";
import { type AppConfig, type ConfigEnvironment, type EnvSource, loadConfig, loadConfigWithEnv } from "@eq/config";
import { getErrorMessage, isExecutionQualityError } from "@eq/domain";
import { type DestinationStream, flushLogger, type Logger, withRunContext } from "@eq/logger";
import { runBatch } from "../batch";
import { createWorkerLogger } from "../shared";
import { type CliOptions, parseArgs, USAGE } from "./args";

export interface RunCliOptions {
	env?: EnvSource;
	/** Log destination, replaceable in tests */
	destination?: DestinationStream;
	/** Usage output */
	print?: (text: string) => void;
}

async function resolveConfig(
	options: CliOptions,
	env: EnvSource
): Promise<{ environment: ConfigEnvironment; config: AppConfig }> {
	const resolved = options.environment
		? {
				environment: options.environment,
				config: await loadConfig(options.environment, { configDir: options.configDir, env }),
			}
		: await loadConfigWithEnv({ configDir: options.configDir, env });

	if (options.output) {
		resolved.config.paths.output = options.output;
	}
	return resolved;
}

function logFatal(logger: Logger, error: unknown): void {
	if (isExecutionQualityError(error)) {
		logger.fatal({ error: error.toJSON() }, `Run failed: ${error.message}`);
	} else {
		logger.fatal({ err: error }, `Run failed: ${getErrorMessage(error)}`);
	}
}

export async function runCli(args: readonly string[], options: RunCliOptions = {}): Promise<number> {
	const env = options.env ?? process.env;
	const print = options.print ?? console.log;
	let logger = createWorkerLogger({ destination: options.destination });

	try {
		const cliOptions = parseArgs(args);
		if (cliOptions.help) {
			print(USAGE);
			return 0;
		}

		const { environment, config } = await resolveConfig(cliOptions, env);
		const runId = randomUUID();
		logger = withRunContext(
			createWorkerLogger({ ...config.logging, environment, destination: options.destination }),
			{ runId, environment }
		);

		await runBatch(config, logger, { runId, environment });
		return 0;
	} catch (error) {
		logFatal(logger, error);
		return 1;
	} finally {
		await flushLogger(logger);
	}
}
