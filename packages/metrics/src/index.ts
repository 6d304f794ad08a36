/**
 * @eq/metrics - Execution Quality Metrics
 *
 * This package derives per-execution slippage metrics against a benchmark
 * price and folds them into grouped summaries.
 */

export const PACKAGE_NAME = "@eq/metrics";
export const VERSION = "0.1.0";

// ============================================
// Execution Quality
// ============================================

export {
	// Types
	type MetricFailureCode,
	type MetricOptions,
	type MetricResult,

	// Constants
	BPS_PER_UNIT,

	// Calculator
	computeMetrics,

	// Aggregation
	aggregateRecords,
	ExecutionQualityAggregator,
	mergeAggregators,

	// Numerical helpers
	CompensatedSum,
	compensatedSum,
} from "./execution-quality";
