/**
 * Timestamp Utilities
 *
 * Inside the calculator every point in time is an epoch-millisecond number.
 * Input rows may carry either epoch milliseconds or date-time strings; naive
 * date-times (no offset, e.g. "2023-01-01 12:00:00.123456") are read as UTC and
 * truncated to millisecond precision.
 */

import { z } from "zod";

// ============================================
// Constants
// ============================================

const NAIVE_DATETIME_REGEX = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2})(:\d{2})?(?:\.(\d+))?$/;

const NUMERIC_REGEX = /^-?\d+(\.\d+)?$/;

/** Largest distance from the epoch a `Date` can represent */
const MAX_EPOCH_MILLIS = 8.64e15;

// ============================================
// Schemas
// ============================================

export const TimestampInputSchema = z.union([z.number(), z.string(), z.date()]);
export type TimestampInput = z.infer<typeof TimestampInputSchema>;

/**
 * Epoch milliseconds within the range of `Date`
 */
export const EpochMillisSchema = z.number().finite().min(-MAX_EPOCH_MILLIS).max(MAX_EPOCH_MILLIS);
export type EpochMillis = z.infer<typeof EpochMillisSchema>;

// ============================================
// Parsing
// ============================================

/**
 * Normalize a timestamp input to epoch milliseconds.
 *
 * @returns epoch milliseconds, or null when the input cannot be parsed
 */
export function parseTimestamp(value: TimestampInput): EpochMillis | null {
	const parsed = readTimestamp(value);
	return parsed !== null && Math.abs(parsed) <= MAX_EPOCH_MILLIS ? parsed : null;
}

function readTimestamp(value: TimestampInput): number | null {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : null;
	}
	if (value instanceof Date) {
		const time = value.getTime();
		return Number.isNaN(time) ? null : time;
	}

	const trimmed = value.trim();
	if (trimmed.length === 0) {
		return null;
	}
	if (NUMERIC_REGEX.test(trimmed)) {
		return Number(trimmed);
	}

	const naive = NAIVE_DATETIME_REGEX.exec(trimmed);
	if (naive) {
		const date = naive[1] ?? "";
		const hoursMinutes = naive[2] ?? "";
		const seconds = naive[3] ?? ":00";
		const fraction = (naive[4] ?? "").padEnd(3, "0").slice(0, 3);
		const parsed = Date.parse(`${date}T${hoursMinutes}${seconds}.${fraction}Z`);
		return Number.isNaN(parsed) ? null : parsed;
	}

	const parsed = Date.parse(trimmed);
	return Number.isNaN(parsed) ? null : parsed;
}

// ============================================
// Formatting
// ============================================

export function toIsoTimestamp(timestamp: EpochMillis): string {
	return new Date(timestamp).toISOString();
}

/**
 * UTC calendar date (YYYY-MM-DD) of a timestamp
 */
export function utcDateKey(timestamp: EpochMillis): string {
	return toIsoTimestamp(timestamp).slice(0, 10);
}
