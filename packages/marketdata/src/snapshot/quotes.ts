/**
 * Quote Snapshot
 *
 * Prevailing quote around an execution and where in the spread the fill
 * landed.
 */

import type { Execution, QuoteSnapshot, Side } from "@eq/domain";
import type { MarketSeriesIndex } from "../series/series-index";

type SnapshotExecution = Pick<Execution, "instrumentId" | "side" | "price" | "timestamp">;

/**
 * Fraction of the spread captured by a fill.
 *
 * 1 when a buy fills at the bid (or a sell at the ask), 0 at the far touch.
 * Null for a locked or crossed book.
 */
export function spreadCapture(side: Side, price: number, bid: number, ask: number): number | null {
	const spread = ask - bid;
	if (!(spread > 0)) {
		return null;
	}
	return side === "BUY" ? (ask - price) / spread : (price - bid) / spread;
}

export function snapshotQuotes(
	index: MarketSeriesIndex,
	execution: SnapshotExecution,
	offsetMs: number
): QuoteSnapshot {
	const { instrumentId, timestamp } = execution;
	const current = index.prevailingQuote(instrumentId, timestamp);
	const before = index.prevailingQuote(instrumentId, timestamp - offsetMs);
	const after = index.prevailingQuote(instrumentId, timestamp + offsetMs);

	return {
		bid: current?.bid ?? null,
		ask: current?.ask ?? null,
		mid: current?.mid ?? null,
		midBefore: before?.mid ?? null,
		midAfter: after?.mid ?? null,
		spreadCapture: current ? spreadCapture(execution.side, execution.price, current.bid, current.ask) : null,
	};
}
