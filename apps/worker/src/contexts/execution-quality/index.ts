/**
 * Execution Quality Bounded Context
 *
 * Joins executions with reference and market data and derives slippage
 * metrics, aggregates and the run summary.
 */

export {
	DUPLICATE_EXECUTION_REASON,
	resolveExecution,
	runExecutionQuality,
	UNKNOWN_INSTRUMENT_REASON,
} from "./pipeline";
export { buildRunSummary, type RunMetadata, type RunSummary, summarizeExecutions } from "./summary";
export type { EngineResult, ExecutionOutcome, ExecutionSummary, ResolutionContext, RunCounts } from "./types";
