/**
 * Market Data Package
 *
 * Time-ordered market observations per instrument and the benchmark price
 * lookups built on them.
 *
 * @example
 * ```ts
 * import { MarketSeriesIndex } from "@eq/marketdata";
 *
 * const index = MarketSeriesIndex.build(rows, { toleranceMs: 60_000 });
 * const resolution = index.resolveBenchmark("XYZ", Date.parse("2024-03-01T10:00:15Z"));
 * if (resolution.resolved) {
 *   console.log(resolution.method, resolution.price);
 * }
 * ```
 */

// Series index
export {
	MarketSeriesIndex,
	NO_MARKET_DATA_REASON,
	OUTSIDE_TOLERANCE_REASON,
} from "./series/series-index";
export { midPrice, usablePrice } from "./series/price";
export { lowerBound, upperBound } from "./series/search";
export type {
	BenchmarkCandidate,
	BenchmarkResolution,
	ObservationSeries,
	PrevailingQuote,
	SeriesIndexOptions,
	SeriesIndexStats,
	TimeRange,
	UnresolvedCode,
} from "./series/types";

// Quote snapshots
export { snapshotQuotes, spreadCapture } from "./snapshot/quotes";
