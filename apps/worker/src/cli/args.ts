/**
 * Command-line arguments
 *
 * Usage:
 *   execution-quality [options]
 *
 * Options:
 *   --config-dir=DIR   Directory holding default.yaml (default: configs)
 *   --env=NAME         Configuration environment (development, production, test)
 *   --output=DIR       Override paths.output
 *   --help             Show usage
 */

import { ConfigEnvironment } from "@eq/config";
import { ConfigurationError } from "@eq/domain";

export interface CliOptions {
	configDir: string;
	environment: ConfigEnvironment | null;
	output: string | null;
	help: boolean;
}

export const USAGE = `
Execution Quality Calculator

Usage:
  execution-quality [options]

Options:
  --config-dir=DIR   Directory holding default.yaml (default: configs)
  --env=NAME         Configuration environment: development, production, test
  --output=DIR       Write the report to DIR instead of paths.output
  --help             Show this message

Environment:
  EXECUTIONS_FILE_PATH, REFDATA_FILE_PATH, MARKETDATA_FILE_PATH,
  OUTPUT_FILE_PATH, EQ_TOLERANCE_MS, LOG_LEVEL, EQ_CONFIG_ENV
`;

/**
 * @throws ConfigurationError on an unknown option or environment name
 */
export function parseArgs(args: readonly string[]): CliOptions {
	const options: CliOptions = { configDir: "configs", environment: null, output: null, help: false };

	for (const arg of args) {
		if (arg === "--help" || arg === "-h") {
			options.help = true;
		} else if (arg.startsWith("--config-dir=")) {
			options.configDir = arg.replace("--config-dir=", "");
		} else if (arg.startsWith("--output=")) {
			options.output = arg.replace("--output=", "");
		} else if (arg.startsWith("--env=")) {
			const parsed = ConfigEnvironment.safeParse(arg.replace("--env=", ""));
			if (!parsed.success) {
				throw new ConfigurationError("Invalid arguments", [
					`--env: expected one of ${ConfigEnvironment.options.join(", ")}`,
				]);
			}
			options.environment = parsed.data;
		} else {
			throw new ConfigurationError("Invalid arguments", [`unknown option ${arg}`]);
		}
	}

	return options;
}
