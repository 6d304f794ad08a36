/**
 * Trade Executions
 *
 * One fill record per row. Rows are validated one at a time; a row that fails
 * validation is skipped with a reason and never aborts the batch.
 */

import { z } from "zod";
import { ValidationError } from "./errors";
import { InstrumentIdSchema } from "./instrument";
import { EpochMillisSchema, parseTimestamp, type TimestampInput } from "./time";

// ============================================
// Side
// ============================================

export const Side = z.enum(["BUY", "SELL"]);
export type Side = z.infer<typeof Side>;

/**
 * How signed slippage is oriented.
 *
 * - favorable_positive: positive means better than benchmark for the trader
 * - cost_positive: positive means a cost to the trader
 */
export const SlippageConvention = z.enum(["favorable_positive", "cost_positive"]);
export type SlippageConvention = z.infer<typeof SlippageConvention>;

const SIDE_SIGNS: Record<SlippageConvention, Record<Side, 1 | -1>> = {
	favorable_positive: { BUY: -1, SELL: 1 },
	cost_positive: { BUY: 1, SELL: -1 },
};

/**
 * Multiplier applied to (execution price - benchmark price)
 */
export function sideSign(side: Side, convention: SlippageConvention = "favorable_positive"): 1 | -1 {
	return SIDE_SIGNS[convention][side];
}

// ============================================
// Execution
// ============================================

export const ExecutionSchema = z.object({
	executionId: z.string().trim().min(1, "is required"),
	instrumentId: InstrumentIdSchema,
	side: Side,
	quantity: z.number().finite().positive("must be positive"),
	price: z.number().finite().positive("must be positive"),
	timestamp: EpochMillisSchema,
	venue: z.string().nullable(),
	/** Trading phase the fill happened in (e.g. CONTINUOUS_TRADING) */
	phase: z.string().nullable(),
});
export type Execution = z.infer<typeof ExecutionSchema>;

/**
 * Execution row as handed over by a loader.
 *
 * When `side` is empty the sign of `quantity` decides it: negative quantities
 * are sells, and the quantity becomes its absolute value.
 */
export interface ExecutionRow {
	executionId: string;
	instrumentId: string;
	side: string | null;
	quantity: number;
	price: number;
	timestamp: TimestampInput;
	venue?: string | null;
	phase?: string | null;
}

export type ExecutionParseResult =
	| { success: true; data: Execution }
	| { success: false; error: ValidationError };

// ============================================
// Parsing
// ============================================

function resolveSide(row: ExecutionRow): { side: string; quantity: number } {
	const raw = row.side?.trim() ?? "";
	if (raw.length === 0) {
		return row.quantity < 0
			? { side: "SELL", quantity: Math.abs(row.quantity) }
			: { side: "BUY", quantity: row.quantity };
	}
	return { side: raw.toUpperCase(), quantity: row.quantity };
}

/**
 * Validate a raw execution row.
 */
export function parseExecution(row: ExecutionRow): ExecutionParseResult {
	const timestamp = parseTimestamp(row.timestamp);
	const { side, quantity } = resolveSide(row);

	const result = ExecutionSchema.safeParse({
		executionId: row.executionId,
		instrumentId: row.instrumentId,
		side,
		quantity,
		price: row.price,
		timestamp: timestamp ?? Number.NaN,
		venue: row.venue ?? null,
		phase: row.phase ?? null,
	});

	if (result.success) {
		return { success: true, data: result.data };
	}

	const issues = result.error.issues.map((issue) =>
		issue.path[0] === "timestamp"
			? `timestamp: cannot parse "${String(row.timestamp)}"`
			: `${issue.path.join(".")}: ${issue.message}`
	);
	return {
		success: false,
		error: new ValidationError(`invalid execution: ${issues.join("; ")}`, issues, "VALIDATION_FAILED", {
			details: { executionId: row.executionId },
		}),
	};
}
