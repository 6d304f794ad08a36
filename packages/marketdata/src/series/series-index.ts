/**
 * Market Series Index
 *
 * Per-instrument market observations in ascending timestamp order, answering
 * "what was the market price at time t" for arbitrary t.
 *
 * Benchmark resolution:
 * - nearest usable observation at-or-before t, and at-or-after t, each no
 *   further than toleranceMs away (observations with no usable price are
 *   stepped over)
 * - both found: linear interpolation on elapsed time (exact match when both
 *   are the same observation)
 * - one found: that observation's price, no extrapolation
 * - none found: unresolved
 */

import {
	ConfigurationError,
	DataIntegrityError,
	hasSamePrices,
	type MarketObservation,
	type MarketObservationRow,
	parseObservation,
} from "@eq/domain";
import { usablePrice } from "./price";
import { lowerBound, upperBound } from "./search";
import type {
	BenchmarkCandidate,
	BenchmarkResolution,
	ObservationSeries,
	PrevailingQuote,
	SeriesIndexOptions,
	SeriesIndexStats,
	TimeRange,
} from "./types";

export const NO_MARKET_DATA_REASON = "no market data for instrument";
export const OUTSIDE_TOLERANCE_REASON = "no observation within tolerance";

const EMPTY_SERIES: ObservationSeries = Object.freeze([]);

// ============================================
// Construction Helpers
// ============================================

function keepMarketState(observation: MarketObservation, marketStates: readonly string[]): boolean {
	if (marketStates.length === 0 || observation.marketState === null) {
		return true;
	}
	return marketStates.includes(observation.marketState);
}

function extendRange(range: TimeRange | null, start: number, end: number): TimeRange {
	return range ? { start: Math.min(range.start, start), end: Math.max(range.end, end) } : { start, end };
}

/**
 * Sort one instrument's observations and collapse identical duplicates.
 *
 * @throws DataIntegrityError when two observations share a timestamp but not their prices
 */
function normalizeSeries(
	instrumentId: string,
	observations: MarketObservation[]
): { series: ObservationSeries; duplicates: number } {
	const sorted = [...observations].sort((a, b) => a.timestamp - b.timestamp);
	const kept: Readonly<MarketObservation>[] = [];
	let duplicates = 0;

	for (const observation of sorted) {
		const previous = kept[kept.length - 1];
		if (previous !== undefined && previous.timestamp === observation.timestamp) {
			if (!hasSamePrices(previous, observation)) {
				throw new DataIntegrityError(
					`conflicting market observations for ${instrumentId} at ${observation.timestamp}`,
					"CONFLICTING_OBSERVATION",
					{
						details: {
							instrumentId,
							timestamp: observation.timestamp,
							first: { bid: previous.bid, ask: previous.ask, last: previous.last },
							second: { bid: observation.bid, ask: observation.ask, last: observation.last },
						},
					}
				);
			}
			duplicates++;
			continue;
		}
		kept.push(Object.freeze(observation));
	}

	return { series: Object.freeze(kept), duplicates };
}

// ============================================
// Market Series Index
// ============================================

export class MarketSeriesIndex {
	readonly #series: ReadonlyMap<string, ObservationSeries>;
	readonly toleranceMs: number;
	readonly stats: Readonly<SeriesIndexStats>;

	private constructor(
		series: Map<string, ObservationSeries>,
		toleranceMs: number,
		stats: SeriesIndexStats
	) {
		this.#series = series;
		this.toleranceMs = toleranceMs;
		this.stats = Object.freeze(stats);
	}

	/**
	 * Validate, filter, group and sort market observations.
	 *
	 * @throws DataIntegrityError on an invalid row or conflicting duplicate
	 * @throws ConfigurationError on a negative or non-finite tolerance
	 */
	static build(rows: Iterable<MarketObservationRow>, options: SeriesIndexOptions): MarketSeriesIndex {
		const { toleranceMs, marketStates = [] } = options;
		if (!Number.isFinite(toleranceMs) || toleranceMs < 0) {
			throw new ConfigurationError("Invalid series index options", [
				`toleranceMs: must be a non-negative number, got ${toleranceMs}`,
			]);
		}

		const groups = new Map<string, MarketObservation[]>();
		let received = 0;
		let droppedByMarketState = 0;
		let receivedRange: TimeRange | null = null;

		for (const row of rows) {
			received++;
			const result = parseObservation(row);
			if (!result.success) {
				throw new DataIntegrityError(
					`invalid market observation at row ${received}: ${result.issues.join("; ")}`,
					"INVALID_OBSERVATION",
					{ details: { row: received, instrumentId: row.instrumentId, issues: result.issues } }
				);
			}

			const observation = result.data;
			receivedRange = extendRange(receivedRange, observation.timestamp, observation.timestamp);
			if (!keepMarketState(observation, marketStates)) {
				droppedByMarketState++;
				continue;
			}

			const group = groups.get(observation.instrumentId);
			if (group) {
				group.push(observation);
			} else {
				groups.set(observation.instrumentId, [observation]);
			}
		}

		const series = new Map<string, ObservationSeries>();
		let duplicatesRemoved = 0;
		let indexed = 0;
		for (const [instrumentId, observations] of groups) {
			const normalized = normalizeSeries(instrumentId, observations);
			series.set(instrumentId, normalized.series);
			duplicatesRemoved += normalized.duplicates;
			indexed += normalized.series.length;
		}

		return new MarketSeriesIndex(series, toleranceMs, {
			received,
			droppedByMarketState,
			duplicatesRemoved,
			indexed,
			instruments: series.size,
			receivedRange,
		});
	}

	// -------------------------------------------------------------------------
	// Queries
	// -------------------------------------------------------------------------

	/**
	 * Resolve the benchmark price of an instrument at a timestamp.
	 */
	resolveBenchmark(instrumentId: string, timestamp: number): BenchmarkResolution {
		const series = this.#series.get(instrumentId);
		if (series === undefined || series.length === 0) {
			return { resolved: false, code: "NO_MARKET_DATA", reason: NO_MARKET_DATA_REASON };
		}

		const before = this.findUsable(series, upperBound(series, timestamp) - 1, -1, timestamp);
		const after = this.findUsable(series, lowerBound(series, timestamp), 1, timestamp);

		if (before && after) {
			if (before.timestamp === after.timestamp) {
				return { resolved: true, price: before.price, method: "exact", before, after };
			}
			const fraction = (timestamp - before.timestamp) / (after.timestamp - before.timestamp);
			return {
				resolved: true,
				price: before.price + (after.price - before.price) * fraction,
				method: "interpolated",
				before,
				after,
			};
		}
		if (before) {
			return { resolved: true, price: before.price, method: "before_only", before, after: null };
		}
		if (after) {
			return { resolved: true, price: after.price, method: "after_only", before: null, after };
		}

		return {
			resolved: false,
			code: "NO_OBSERVATION_WITHIN_TOLERANCE",
			reason: OUTSIDE_TOLERANCE_REASON,
		};
	}

	/**
	 * Latest two-sided quote at-or-before a timestamp, within tolerance.
	 */
	prevailingQuote(instrumentId: string, timestamp: number): PrevailingQuote | null {
		const series = this.#series.get(instrumentId) ?? EMPTY_SERIES;

		for (let i = upperBound(series, timestamp) - 1; i >= 0; i--) {
			const observation = series[i];
			if (observation === undefined || timestamp - observation.timestamp > this.toleranceMs) {
				break;
			}
			if (observation.bid !== null && observation.ask !== null) {
				return {
					timestamp: observation.timestamp,
					bid: observation.bid,
					ask: observation.ask,
					mid: (observation.bid + observation.ask) / 2,
				};
			}
		}
		return null;
	}

	series(instrumentId: string): ObservationSeries {
		return this.#series.get(instrumentId) ?? EMPTY_SERIES;
	}

	instrumentIds(): string[] {
		return Array.from(this.#series.keys());
	}

	/**
	 * Earliest and latest indexed timestamp across all instruments
	 */
	timeRange(): TimeRange | null {
		let range: TimeRange | null = null;
		for (const series of this.#series.values()) {
			const first = series[0];
			const last = series[series.length - 1];
			if (first === undefined || last === undefined) {
				continue;
			}
			range = extendRange(range, first.timestamp, last.timestamp);
		}
		return range;
	}

	// -------------------------------------------------------------------------
	// Private Helpers
	// -------------------------------------------------------------------------

	/**
	 * Walk from `start` in direction `step` to the first observation with a
	 * usable price, giving up beyond the tolerance window.
	 */
	private findUsable(
		series: ObservationSeries,
		start: number,
		step: 1 | -1,
		timestamp: number
	): BenchmarkCandidate | null {
		for (let i = start; i >= 0 && i < series.length; i += step) {
			const observation = series[i];
			if (observation === undefined || Math.abs(observation.timestamp - timestamp) > this.toleranceMs) {
				return null;
			}
			const price = usablePrice(observation);
			if (price !== null) {
				return { timestamp: observation.timestamp, price };
			}
		}
		return null;
	}
}
