/**
 * @eq/test-fixtures - Test data factories
 *
 * This package contains:
 * - Factory functions for generating test data with sensible defaults
 * - Support for partial overrides with deep merge
 */

export const PACKAGE_NAME = "@eq/test-fixtures";
export const VERSION = "0.1.0";

// ============================================
// Factory Functions
// ============================================

export {
	BASE_TIMESTAMP,
	createExecution,
	createExecutionRow,
	createInstrumentRow,
	createMetricRecord,
	createObservationRow,
	createQuoteSnapshot,
	createTradeSeries,
} from "./factories";
