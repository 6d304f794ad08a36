/**
 * Report Types
 *
 * Derived records produced by the calculator. None of them are persisted
 * between runs.
 */

import type { Side } from "./execution";
import type { EpochMillis } from "./time";

// ============================================
// Benchmark
// ============================================

/**
 * How a benchmark price was obtained from the market series
 */
export type BenchmarkMethod = "exact" | "interpolated" | "before_only" | "after_only";

// ============================================
// Quote Snapshot
// ============================================

/**
 * Prevailing quote around an execution
 */
export interface QuoteSnapshot {
	bid: number | null;
	ask: number | null;
	mid: number | null;
	/** Mid quote one offset before the execution */
	midBefore: number | null;
	/** Mid quote one offset after the execution */
	midAfter: number | null;
	/** Where in the spread the fill landed; 1 = at the far touch in the trader's favor */
	spreadCapture: number | null;
}

/** Snapshot with no quote information */
export const EMPTY_QUOTE_SNAPSHOT: Readonly<QuoteSnapshot> = Object.freeze({
	bid: null,
	ask: null,
	mid: null,
	midBefore: null,
	midAfter: null,
	spreadCapture: null,
});

// ============================================
// Metric Record
// ============================================

export interface MetricRecord {
	executionId: string;
	instrumentId: string;
	side: Side;
	quantity: number;
	price: number;
	timestamp: EpochMillis;
	venue: string | null;
	currency: string;
	benchmarkPrice: number;
	benchmarkMethod: BenchmarkMethod;
	/** Signed, in price units */
	slippage: number;
	slippageBps: number;
	slippageTicks: number;
	notional: number;
	quote: QuoteSnapshot;
}

// ============================================
// Skipped Executions
// ============================================

export type SkipCode =
	| "VALIDATION_FAILED"
	| "DUPLICATE_EXECUTION"
	| "UNKNOWN_INSTRUMENT"
	| "NO_MARKET_DATA"
	| "NO_OBSERVATION_WITHIN_TOLERANCE"
	| "ZERO_BENCHMARK"
	| "NON_FINITE_METRIC";

export interface SkippedExecution {
	executionId: string;
	code: SkipCode;
	reason: string;
}

// ============================================
// Aggregates
// ============================================

export type AggregateGroup = "instrument" | "side" | "overall";

export const OVERALL_KEY = "overall";

export interface AggregateRow {
	group: AggregateGroup;
	/** Instrument id, side, or OVERALL_KEY */
	key: string;
	count: number;
	totalQuantity: number;
	totalNotional: number;
	/** Quantity-weighted slippage in price units, null for an empty group */
	weightedSlippage: number | null;
	weightedSlippageBps: number | null;
}
