/**
 * Run Summary
 *
 * Describes the executions a run received and how the run went, for the
 * log and for summary.json.
 */

import { type ExecutionRow, parseTimestamp, type SkipCode, toIsoTimestamp, utcDateKey } from "@eq/domain";
import type { TimeRange } from "@eq/marketdata";
import type { EngineResult, ExecutionSummary } from "./types";

type SummaryRow = Pick<ExecutionRow, "timestamp" | "venue">;

/**
 * Summarize execution rows as received, before any filtering or validation.
 * Rows whose timestamp does not parse count towards the total only.
 */
export function summarizeExecutions(rows: readonly SummaryRow[]): ExecutionSummary {
	const venues = new Set<string>();
	const tradeDates = new Set<string>();
	let timeRange: TimeRange | null = null;

	for (const row of rows) {
		const venue = row.venue?.trim();
		if (venue) {
			venues.add(venue);
		}

		const timestamp = parseTimestamp(row.timestamp);
		if (timestamp === null) {
			continue;
		}
		tradeDates.add(utcDateKey(timestamp));
		timeRange = timeRange
			? { start: Math.min(timeRange.start, timestamp), end: Math.max(timeRange.end, timestamp) }
			: { start: timestamp, end: timestamp };
	}

	return {
		total: rows.length,
		venues: [...venues].sort(),
		tradeDates: [...tradeDates].sort(),
		timeRange,
	};
}

export interface RunMetadata {
	runId: string;
	environment: string;
	startedAt: number;
	elapsedMs: number;
}

export interface RunSummary {
	runId: string;
	environment: string;
	startedAt: string;
	elapsedMs: number;
	executions: {
		total: number;
		venues: string[];
		tradeDates: string[];
		firstExecution: string | null;
		lastExecution: string | null;
	};
	marketData: {
		received: number;
		indexed: number;
		droppedByMarketState: number;
		duplicatesRemoved: number;
		instruments: number;
		firstObservation: string | null;
		lastObservation: string | null;
	};
	counts: {
		executionsReceived: number;
		filteredByPhase: number;
		computed: number;
		skipped: number;
		skippedByCode: Partial<Record<SkipCode, number>>;
		instruments: number;
	};
}

/**
 * JSON-ready summary of a finished run
 */
export function buildRunSummary(result: EngineResult, metadata: RunMetadata): RunSummary {
	const { counts, executions, marketDataRange } = result;
	const observations = counts.observations;

	return {
		runId: metadata.runId,
		environment: metadata.environment,
		startedAt: toIsoTimestamp(metadata.startedAt),
		elapsedMs: metadata.elapsedMs,
		executions: {
			total: executions.total,
			venues: executions.venues,
			tradeDates: executions.tradeDates,
			firstExecution: executions.timeRange ? toIsoTimestamp(executions.timeRange.start) : null,
			lastExecution: executions.timeRange ? toIsoTimestamp(executions.timeRange.end) : null,
		},
		marketData: {
			received: observations.received,
			indexed: observations.indexed,
			droppedByMarketState: observations.droppedByMarketState,
			duplicatesRemoved: observations.duplicatesRemoved,
			instruments: observations.instruments,
			firstObservation: marketDataRange ? toIsoTimestamp(marketDataRange.start) : null,
			lastObservation: marketDataRange ? toIsoTimestamp(marketDataRange.end) : null,
		},
		counts: {
			executionsReceived: counts.executionsReceived,
			filteredByPhase: counts.filteredByPhase,
			computed: counts.computed,
			skipped: counts.skipped,
			skippedByCode: counts.skippedByCode,
			instruments: counts.instruments,
		},
	};
}
