#!/usr/bin/env tsx
/**
 * @eq/worker - Execution Quality Batch
 *
 * Reads executions, instrument reference data and market observations,
 * computes slippage against the market benchmark and writes the report.
 *
 * Usage:
 *   npm start -- [--config-dir=DIR] [--env=NAME] [--output=DIR]
 */

import { runCli } from "./cli/run";

runCli(process.argv.slice(2))
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error: unknown) => {
		console.error("Fatal error:", error);
		process.exitCode = 1;
	});
