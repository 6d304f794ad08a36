/**
 * Execution Quality Context Types
 */

import type { EngineConfig } from "@eq/config";
import type { AggregateRow, MetricRecord, SkipCode, SkippedExecution } from "@eq/domain";
import type { MarketSeriesIndex, SeriesIndexStats, TimeRange } from "@eq/marketdata";
import type { InstrumentCatalog } from "@eq/universe";

/**
 * Read-only lookups shared by every execution in a run
 */
export interface ResolutionContext {
	catalog: InstrumentCatalog;
	index: MarketSeriesIndex;
	config: EngineConfig;
}

export type ExecutionOutcome = { ok: true; record: MetricRecord } | { ok: false; skipped: SkippedExecution };

/**
 * Execution rows of a run as received, before filtering and validation
 */
export interface ExecutionSummary {
	total: number;
	/** Distinct venues, sorted */
	venues: string[];
	/** Distinct UTC trade dates (YYYY-MM-DD), sorted */
	tradeDates: string[];
	timeRange: TimeRange | null;
}

export interface RunCounts {
	executionsReceived: number;
	filteredByPhase: number;
	computed: number;
	skipped: number;
	skippedByCode: Partial<Record<SkipCode, number>>;
	instruments: number;
	observations: SeriesIndexStats;
}

export interface EngineResult {
	records: MetricRecord[];
	skipped: SkippedExecution[];
	aggregates: AggregateRow[];
	counts: RunCounts;
	executions: ExecutionSummary;
	marketDataRange: TimeRange | null;
}
