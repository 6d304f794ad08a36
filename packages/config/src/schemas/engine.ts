/**
 * Engine Configuration Schema
 *
 * Parameters of the metrics computation itself. Everything the engine needs
 * arrives through this object; nothing in the core reads the environment.
 */

import { SlippageConvention } from "@eq/domain";
import { z } from "zod";

export const CONTINUOUS_TRADING = "CONTINUOUS_TRADING";

export const EngineConfigSchema = z.object({
	/**
	 * Maximum distance (ms) between an execution and a market observation
	 * for the observation to count as a benchmark candidate
	 */
	toleranceMs: z.number().int().positive().default(60_000),

	/**
	 * Orientation of signed slippage
	 *
	 * favorable_positive: SELL +1, BUY -1
	 * cost_positive: SELL -1, BUY +1
	 */
	slippageConvention: SlippageConvention.default("favorable_positive"),

	/**
	 * Execution phases kept for analysis; empty keeps every execution
	 */
	tradingPhases: z.array(z.string().min(1)).default([CONTINUOUS_TRADING]),

	/**
	 * Market states kept when building the series index; empty keeps all
	 */
	marketStates: z.array(z.string().min(1)).default([CONTINUOUS_TRADING]),

	/**
	 * Offset (ms) of the before/after mid quotes in the quote snapshot
	 */
	quoteOffsetMs: z.number().int().positive().default(1000),
});
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
