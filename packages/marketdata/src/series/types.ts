/**
 * Type definitions for the market series index
 */

import type { BenchmarkMethod, MarketObservation } from "@eq/domain";

export interface SeriesIndexOptions {
	/** Maximum distance (ms) from the query time for a candidate observation */
	toleranceMs: number;
	/**
	 * Market states to keep. Observations without a state are always kept;
	 * an empty list keeps everything.
	 */
	marketStates?: readonly string[];
}

export interface SeriesIndexStats {
	/** Rows received */
	received: number;
	/** Dropped by the market state filter */
	droppedByMarketState: number;
	/** Same timestamp, same prices: kept once */
	duplicatesRemoved: number;
	/** Observations held by the index */
	indexed: number;
	instruments: number;
	/** Earliest and latest timestamp of every received row, before any filter */
	receivedRange: TimeRange | null;
}

/**
 * A single observation chosen as one side of the benchmark
 */
export interface BenchmarkCandidate {
	timestamp: number;
	price: number;
}

export type UnresolvedCode = "NO_MARKET_DATA" | "NO_OBSERVATION_WITHIN_TOLERANCE";

export type BenchmarkResolution =
	| {
			resolved: true;
			price: number;
			method: BenchmarkMethod;
			before: BenchmarkCandidate | null;
			after: BenchmarkCandidate | null;
	  }
	| {
			resolved: false;
			code: UnresolvedCode;
			reason: string;
	  };

/**
 * Two-sided quote in force at a point in time
 */
export interface PrevailingQuote {
	timestamp: number;
	bid: number;
	ask: number;
	mid: number;
}

export type ObservationSeries = readonly Readonly<MarketObservation>[];

export interface TimeRange {
	start: number;
	end: number;
}
