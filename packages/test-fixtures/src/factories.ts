/**
 * Test Fixture Factory Functions
 *
 * Factory functions for creating valid test data with sensible defaults.
 * All factories accept Partial<T> overrides for customization.
 */

import {
	EMPTY_QUOTE_SNAPSHOT,
	type Execution,
	type ExecutionRow,
	type InstrumentRow,
	type MarketObservationRow,
	type MetricRecord,
	type QuoteSnapshot,
} from "@eq/domain";
import { deepmergeInto } from "deepmerge-ts";

/** 2024-03-01T10:00:00.000Z */
export const BASE_TIMESTAMP = Date.UTC(2024, 2, 1, 10, 0, 0);

function withOverrides<T extends object>(defaults: T, overrides: Partial<T>): T {
	const merged: T = { ...defaults };
	deepmergeInto(merged, overrides);
	return merged;
}

// ============================================
// Reference Data
// ============================================

/**
 * Create an instrument reference row
 *
 * Defaults: XYZ, USD, multiplier 1, one-cent tick
 */
export function createInstrumentRow(overrides: Partial<InstrumentRow> = {}): InstrumentRow {
	const defaults: InstrumentRow = {
		instrumentId: "XYZ",
		currency: "USD",
		multiplier: 1,
		tickSize: 0.01,
	};
	return withOverrides(defaults, overrides);
}

// ============================================
// Market Data
// ============================================

/**
 * Create a market observation row with a 99.99 / 100.01 quote and a last
 * trade at 100
 */
export function createObservationRow(overrides: Partial<MarketObservationRow> = {}): MarketObservationRow {
	const defaults: MarketObservationRow = {
		instrumentId: "XYZ",
		timestamp: BASE_TIMESTAMP,
		bid: 99.99,
		ask: 100.01,
		last: 100,
		volume: 100,
		marketState: null,
	};
	return withOverrides(defaults, overrides);
}

/**
 * Create one last-trade-only observation per [offsetMs, last] point,
 * offsets relative to BASE_TIMESTAMP
 */
export function createTradeSeries(
	instrumentId: string,
	points: ReadonlyArray<readonly [offsetMs: number, last: number]>
): MarketObservationRow[] {
	return points.map(([offsetMs, last]) =>
		createObservationRow({
			instrumentId,
			timestamp: BASE_TIMESTAMP + offsetMs,
			bid: null,
			ask: null,
			last,
		})
	);
}

// ============================================
// Executions
// ============================================

/**
 * Create a raw execution row (a 50 lot buy of XYZ at 100)
 */
export function createExecutionRow(overrides: Partial<ExecutionRow> = {}): ExecutionRow {
	const defaults: ExecutionRow = {
		executionId: "E1",
		instrumentId: "XYZ",
		side: "BUY",
		quantity: 50,
		price: 100,
		timestamp: BASE_TIMESTAMP,
		venue: "XNAS",
		phase: null,
	};
	return withOverrides(defaults, overrides);
}

/**
 * Create a validated execution
 */
export function createExecution(overrides: Partial<Execution> = {}): Execution {
	const defaults: Execution = {
		executionId: "E1",
		instrumentId: "XYZ",
		side: "BUY",
		quantity: 50,
		price: 100,
		timestamp: BASE_TIMESTAMP,
		venue: "XNAS",
		phase: null,
	};
	return withOverrides(defaults, overrides);
}

// ============================================
// Metric Records
// ============================================

export function createQuoteSnapshot(overrides: Partial<QuoteSnapshot> = {}): QuoteSnapshot {
	return withOverrides<QuoteSnapshot>({ ...EMPTY_QUOTE_SNAPSHOT }, overrides);
}

/**
 * Create a metric record. Derived fields are NOT recomputed from overrides;
 * pass consistent values when the test depends on them.
 */
export function createMetricRecord(overrides: Partial<MetricRecord> = {}): MetricRecord {
	const defaults: MetricRecord = {
		executionId: "E1",
		instrumentId: "XYZ",
		side: "BUY",
		quantity: 50,
		price: 100,
		timestamp: BASE_TIMESTAMP,
		venue: "XNAS",
		currency: "USD",
		benchmarkPrice: 100,
		benchmarkMethod: "exact",
		slippage: 0,
		slippageBps: 0,
		slippageTicks: 0,
		notional: 5000,
		quote: createQuoteSnapshot(),
	};
	return withOverrides(defaults, overrides);
}
