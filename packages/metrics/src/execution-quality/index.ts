/**
 * Execution quality metrics
 */

export { aggregateRecords, ExecutionQualityAggregator, mergeAggregators } from "./aggregator";
export { computeMetrics } from "./calculator";
export { CompensatedSum, compensatedSum } from "./summation";
export { BPS_PER_UNIT, type MetricFailureCode, type MetricOptions, type MetricResult } from "./types";
