/**
 * Type definitions for execution quality metrics
 */

import type { BenchmarkMethod, MetricRecord, QuoteSnapshot, SkipCode, SlippageConvention } from "@eq/domain";

/**
 * Basis points per unit of relative price
 */
export const BPS_PER_UNIT = 10_000;

export interface MetricOptions {
	/** Orientation of signed slippage (default favorable_positive) */
	convention?: SlippageConvention;
	/** How the benchmark was resolved (default exact) */
	benchmarkMethod?: BenchmarkMethod;
	/** Quote snapshot to attach to the record */
	quote?: QuoteSnapshot;
}

export type MetricFailureCode = Extract<SkipCode, "VALIDATION_FAILED" | "ZERO_BENCHMARK" | "NON_FINITE_METRIC">;

export type MetricResult =
	| { ok: true; record: MetricRecord }
	| { ok: false; code: MetricFailureCode; reason: string };
