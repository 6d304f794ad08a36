/**
 * Instrument Reference Data
 */

import { z } from "zod";

export const InstrumentIdSchema = z.string().trim().min(1, "is required");
export type InstrumentId = z.infer<typeof InstrumentIdSchema>;

/**
 * Static per-instrument attributes
 */
export const InstrumentSchema = z.object({
	instrumentId: InstrumentIdSchema,
	/** ISO currency code the instrument trades in */
	currency: z.string().trim().min(1, "is required"),
	/** Scales a raw price to notional */
	multiplier: z.number().finite().positive(),
	/** Minimum price increment */
	tickSize: z.number().finite().positive(),
});
export type Instrument = z.infer<typeof InstrumentSchema>;

/**
 * Reference data row as handed over by a loader
 */
export interface InstrumentRow {
	instrumentId: string;
	currency: string;
	multiplier: number;
	tickSize: number;
}
