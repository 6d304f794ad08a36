/**
 * Input loading
 *
 * Maps the three CSV inputs onto the row types the engine takes. Cells are
 * only trimmed and converted here; validation belongs to the domain schemas.
 * Empty cells become null.
 */

import { readFile } from "node:fs/promises";
import {
	ConfigurationError,
	DataIntegrityError,
	type ExecutionRow,
	getErrorMessage,
	type InstrumentRow,
	type MarketObservationRow,
} from "@eq/domain";
import type { PathsConfig } from "@eq/config";
import { type CsvRecord, type CsvTable, parseCsv } from "./csv";

// ============================================
// Column Layout
// ============================================

export const EXECUTION_COLUMNS = ["execution_id", "instrument_id", "side", "quantity", "price", "timestamp"] as const;
export const REFDATA_COLUMNS = ["instrument_id", "currency", "multiplier", "tick_size"] as const;
export const MARKETDATA_COLUMNS = ["instrument_id", "timestamp", "bid", "ask", "last", "volume"] as const;

export interface EngineInput {
	executions: ExecutionRow[];
	instruments: InstrumentRow[];
	observations: MarketObservationRow[];
}

// ============================================
// Cell Helpers
// ============================================

function text(row: CsvRecord, column: string): string | null {
	const value = row[column]?.trim() ?? "";
	return value.length > 0 ? value : null;
}

/**
 * Numeric cell; null when empty, NaN when not a number
 */
function numeric(row: CsvRecord, column: string): number | null {
	const value = text(row, column);
	return value === null ? null : Number(value);
}

function requireColumns(table: CsvTable, columns: readonly string[], source: string): void {
	const missing = columns.filter((column) => !table.header.includes(column));
	if (missing.length > 0) {
		throw new DataIntegrityError(`${source} is missing required columns: ${missing.join(", ")}`, "MALFORMED_INPUT", {
			details: { source, missing },
		});
	}
}

// ============================================
// Row Mapping
// ============================================

export function toExecutionRows(table: CsvTable, source = "executions"): ExecutionRow[] {
	requireColumns(table, EXECUTION_COLUMNS, source);
	return table.rows.map((row) => ({
		executionId: text(row, "execution_id") ?? "",
		instrumentId: text(row, "instrument_id") ?? "",
		side: text(row, "side"),
		quantity: numeric(row, "quantity") ?? Number.NaN,
		price: numeric(row, "price") ?? Number.NaN,
		timestamp: text(row, "timestamp") ?? "",
		venue: text(row, "venue"),
		phase: text(row, "phase"),
	}));
}

export function toInstrumentRows(table: CsvTable, source = "refdata"): InstrumentRow[] {
	requireColumns(table, REFDATA_COLUMNS, source);
	return table.rows.map((row) => ({
		instrumentId: text(row, "instrument_id") ?? "",
		currency: text(row, "currency") ?? "",
		multiplier: numeric(row, "multiplier") ?? Number.NaN,
		tickSize: numeric(row, "tick_size") ?? Number.NaN,
	}));
}

export function toObservationRows(table: CsvTable, source = "marketdata"): MarketObservationRow[] {
	requireColumns(table, MARKETDATA_COLUMNS, source);
	return table.rows.map((row) => ({
		instrumentId: text(row, "instrument_id") ?? "",
		timestamp: text(row, "timestamp") ?? "",
		bid: numeric(row, "bid"),
		ask: numeric(row, "ask"),
		last: numeric(row, "last"),
		volume: numeric(row, "volume"),
		marketState: text(row, "market_state"),
	}));
}

// ============================================
// Files
// ============================================

/**
 * @throws ConfigurationError when the file cannot be read
 */
export async function readCsvFile(path: string): Promise<CsvTable> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		throw new ConfigurationError(`Cannot read input file ${path}: ${getErrorMessage(error)}`, [], { cause: error });
	}
	return parseCsv(content, path);
}

/**
 * Read all three inputs
 */
export async function loadInputs(paths: Pick<PathsConfig, "executions" | "refdata" | "marketdata">): Promise<EngineInput> {
	const [executions, refdata, marketdata] = await Promise.all([
		readCsvFile(paths.executions),
		readCsvFile(paths.refdata),
		readCsvFile(paths.marketdata),
	]);

	return {
		executions: toExecutionRows(executions, paths.executions),
		instruments: toInstrumentRows(refdata, paths.refdata),
		observations: toObservationRows(marketdata, paths.marketdata),
	};
}
