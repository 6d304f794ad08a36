/**
 * Batch Run
 *
 * One complete run: load the inputs, compute, write the report. A fatal error
 * propagates before anything is written, so a failed run leaves no partial
 * report behind.
 */

import type { AppConfig } from "@eq/config";
import type { Logger } from "@eq/logger";
import { buildRunSummary, type RunSummary, runExecutionQuality } from "./contexts/execution-quality";
import { loadInputs, type WrittenReport, writeReport } from "./io";

export interface BatchOptions {
	runId: string;
	environment: string;
	/** Clock, replaceable in tests */
	now?: () => number;
}

export interface BatchResult {
	summary: RunSummary;
	written: WrittenReport;
}

export async function runBatch(config: AppConfig, logger: Logger, options: BatchOptions): Promise<BatchResult> {
	const now = options.now ?? Date.now;
	const startedAt = now();

	logger.info({ paths: config.paths, engine: config.engine }, "Starting execution quality run");

	const input = await loadInputs(config.paths);
	logger.info(
		{
			executions: input.executions.length,
			instruments: input.instruments.length,
			observations: input.observations.length,
		},
		"Inputs loaded"
	);

	const result = runExecutionQuality(input, config.engine, logger);
	logger.info(result.executions, "Execution summary");

	const summary = buildRunSummary(result, {
		runId: options.runId,
		environment: options.environment,
		startedAt,
		elapsedMs: now() - startedAt,
	});

	const written = await writeReport(config.paths.output, {
		aggregates: result.aggregates,
		records: result.records,
		skipped: result.skipped,
		summary,
	});

	logger.info({ written, elapsedMs: summary.elapsedMs }, "Report written");
	return { summary, written };
}
