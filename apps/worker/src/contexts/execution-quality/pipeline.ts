/**
 * Execution Quality Pipeline
 *
 * Builds the instrument catalog and the market series index once, then runs
 * every execution through:
 *
 *   phase filter -> validation -> duplicate check -> instrument lookup
 *   -> benchmark resolution -> metric computation -> aggregation
 *
 * Failures of a single execution are recorded as skipped and the run goes on.
 * Errors while building the catalog or the index abort the run.
 */

import type { EngineConfig } from "@eq/config";
import {
	type Execution,
	type ExecutionRow,
	type MetricRecord,
	parseExecution,
	type SkipCode,
	type SkippedExecution,
} from "@eq/domain";
import { type Logger, pino } from "@eq/logger";
import { MarketSeriesIndex, snapshotQuotes } from "@eq/marketdata";
import { computeMetrics, ExecutionQualityAggregator } from "@eq/metrics";
import { InstrumentCatalog } from "@eq/universe";
import type { EngineInput } from "../../io/load";
import { summarizeExecutions } from "./summary";
import type { EngineResult, ExecutionOutcome, ResolutionContext } from "./types";

export const UNKNOWN_INSTRUMENT_REASON = "unknown instrument";
export const DUPLICATE_EXECUTION_REASON = "duplicate execution id";

const silentLogger = pino({ level: "silent" });

function skip(executionId: string, code: SkipCode, reason: string): ExecutionOutcome {
	return { ok: false, skipped: { executionId, code, reason } };
}

function keepPhase(row: ExecutionRow, tradingPhases: readonly string[]): boolean {
	const phase = row.phase?.trim();
	if (tradingPhases.length === 0 || !phase) {
		return true;
	}
	return tradingPhases.includes(phase);
}

// ============================================
// Per-Execution Resolution
// ============================================

/**
 * Resolve one validated execution into a metric record, or the reason it
 * was skipped. Pure: reads the context, changes nothing.
 */
export function resolveExecution(execution: Execution, context: ResolutionContext): ExecutionOutcome {
	const { catalog, index, config } = context;

	const instrument = catalog.lookup(execution.instrumentId);
	if (!instrument) {
		return skip(execution.executionId, "UNKNOWN_INSTRUMENT", UNKNOWN_INSTRUMENT_REASON);
	}

	const resolution = index.resolveBenchmark(execution.instrumentId, execution.timestamp);
	if (!resolution.resolved) {
		return skip(execution.executionId, resolution.code, resolution.reason);
	}

	const result = computeMetrics(execution, instrument, resolution.price, {
		convention: config.slippageConvention,
		benchmarkMethod: resolution.method,
		quote: snapshotQuotes(index, execution, config.quoteOffsetMs),
	});
	if (!result.ok) {
		return skip(execution.executionId, result.code, result.reason);
	}

	return { ok: true, record: result.record };
}

// ============================================
// Batch Run
// ============================================

/**
 * Compute metrics and aggregates for a batch of executions.
 *
 * @throws DataIntegrityError on invalid or contradictory reference or market data
 */
export function runExecutionQuality(
	input: EngineInput,
	config: EngineConfig,
	logger: Logger = silentLogger
): EngineResult {
	const catalog = InstrumentCatalog.fromRows(input.instruments);
	const index = MarketSeriesIndex.build(input.observations, {
		toleranceMs: config.toleranceMs,
		marketStates: config.marketStates,
	});
	logger.info({ instruments: catalog.size, observations: index.stats }, "Reference and market data indexed");

	const executions = summarizeExecutions(input.executions);
	logger.info(
		{ total: executions.total, venues: executions.venues, tradeDates: executions.tradeDates },
		"Executions received"
	);

	const context: ResolutionContext = { catalog, index, config };
	const candidates = input.executions.filter((row) => keepPhase(row, config.tradingPhases));
	const filteredByPhase = input.executions.length - candidates.length;
	if (filteredByPhase > 0) {
		logger.info({ filteredByPhase, tradingPhases: config.tradingPhases }, "Executions outside trading phases filtered");
	}

	const records: MetricRecord[] = [];
	const skipped: SkippedExecution[] = [];
	const seen = new Set<string>();
	const aggregator = new ExecutionQualityAggregator();

	const record = (outcome: ExecutionOutcome): void => {
		if (outcome.ok) {
			records.push(outcome.record);
			aggregator.add(outcome.record);
			return;
		}
		skipped.push(outcome.skipped);
		logger.debug(outcome.skipped, "Execution skipped");
	};

	for (const row of candidates) {
		const parsed = parseExecution(row);
		if (!parsed.success) {
			record(skip(row.executionId, parsed.error.code, parsed.error.message));
			continue;
		}

		const execution = parsed.data;
		if (seen.has(execution.executionId)) {
			record(skip(execution.executionId, "DUPLICATE_EXECUTION", DUPLICATE_EXECUTION_REASON));
			continue;
		}
		seen.add(execution.executionId);

		record(resolveExecution(execution, context));
	}

	const skippedByCode: Partial<Record<SkipCode, number>> = {};
	for (const entry of skipped) {
		skippedByCode[entry.code] = (skippedByCode[entry.code] ?? 0) + 1;
	}

	logger.info({ computed: records.length, skipped: skipped.length, skippedByCode }, "Metrics computed");

	return {
		records,
		skipped,
		aggregates: aggregator.rows(),
		counts: {
			executionsReceived: input.executions.length,
			filteredByPhase,
			computed: records.length,
			skipped: skipped.length,
			skippedByCode,
			instruments: catalog.size,
			observations: index.stats,
		},
		executions,
		marketDataRange: index.stats.receivedRange,
	};
}
