/**
 * Market Observations
 *
 * A timestamped quote/trade snapshot for one instrument. Any of the three
 * prices may be absent.
 */

import { z } from "zod";
import { InstrumentIdSchema } from "./instrument";
import { EpochMillisSchema, parseTimestamp, type TimestampInput } from "./time";

// ============================================
// Schemas
// ============================================

const NullablePriceSchema = z.number().finite().nullable();

export const MarketObservationSchema = z
	.object({
		instrumentId: InstrumentIdSchema,
		timestamp: EpochMillisSchema,
		bid: NullablePriceSchema,
		ask: NullablePriceSchema,
		last: NullablePriceSchema,
		volume: z.number().finite().nonnegative(),
		/** Trading phase of the venue when the observation was taken */
		marketState: z.string().nullable(),
	})
	.refine((obs) => obs.bid === null || obs.ask === null || obs.bid <= obs.ask, {
		message: "bid must not exceed ask",
		path: ["bid"],
	});
export type MarketObservation = z.infer<typeof MarketObservationSchema>;

/**
 * Market data row as handed over by a loader
 */
export interface MarketObservationRow {
	instrumentId: string;
	timestamp: TimestampInput;
	bid: number | null;
	ask: number | null;
	last: number | null;
	volume: number | null;
	marketState?: string | null;
}

export type ObservationParseResult =
	| { success: true; data: MarketObservation }
	| { success: false; issues: string[] };

// ============================================
// Parsing
// ============================================

/**
 * Validate a raw market data row. Absent volume reads as zero.
 */
export function parseObservation(row: MarketObservationRow): ObservationParseResult {
	const timestamp = parseTimestamp(row.timestamp);
	if (timestamp === null) {
		return { success: false, issues: [`timestamp: cannot parse "${String(row.timestamp)}"`] };
	}

	const result = MarketObservationSchema.safeParse({
		instrumentId: row.instrumentId,
		timestamp,
		bid: row.bid,
		ask: row.ask,
		last: row.last,
		volume: row.volume ?? 0,
		marketState: row.marketState ?? null,
	});

	if (result.success) {
		return { success: true, data: result.data };
	}
	return {
		success: false,
		issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
	};
}

/**
 * True when two observations carry the same bid, ask and last
 */
export function hasSamePrices(a: MarketObservation, b: MarketObservation): boolean {
	return a.bid === b.bid && a.ask === b.ask && a.last === b.last;
}
