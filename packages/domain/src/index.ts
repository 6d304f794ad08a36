/**
 * @eq/domain - Core domain types and Zod schemas
 *
 * This package contains:
 * - Zod schemas for executions, instruments and market observations
 * - The error taxonomy shared by every package
 * - Report record types
 */

export const PACKAGE_NAME = "@eq/domain";
export const VERSION = "0.1.0";

// Errors
export {
	ConfigurationError,
	type ConfigurationCode,
	DataIntegrityError,
	type DataIntegrityCode,
	type ErrorCode,
	ExecutionQualityError,
	getErrorMessage,
	isExecutionQualityError,
	isFatalError,
	type QualityErrorOptions,
	type ValidationCode,
	ValidationError,
} from "./errors";

// Time
export {
	type EpochMillis,
	EpochMillisSchema,
	parseTimestamp,
	type TimestampInput,
	TimestampInputSchema,
	toIsoTimestamp,
	utcDateKey,
} from "./time";

// Instruments
export {
	type Instrument,
	type InstrumentId,
	InstrumentIdSchema,
	type InstrumentRow,
	InstrumentSchema,
} from "./instrument";

// Market observations
export {
	hasSamePrices,
	type MarketObservation,
	type MarketObservationRow,
	MarketObservationSchema,
	type ObservationParseResult,
	parseObservation,
} from "./observation";

// Executions
export {
	type Execution,
	type ExecutionParseResult,
	type ExecutionRow,
	ExecutionSchema,
	parseExecution,
	Side,
	sideSign,
	SlippageConvention,
} from "./execution";

// Report records
export {
	type AggregateGroup,
	type AggregateRow,
	type BenchmarkMethod,
	EMPTY_QUOTE_SNAPSHOT,
	type MetricRecord,
	OVERALL_KEY,
	type QuoteSnapshot,
	type SkipCode,
	type SkippedExecution,
} from "./report";
