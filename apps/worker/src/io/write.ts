/**
 * Report Writer
 *
 * Writes the report tables and the run summary into the output directory:
 *
 * - aggregates.csv  one row per aggregate group
 * - executions.csv  one row per computed execution
 * - skipped.csv     execution id, code and reason of every skipped execution
 * - summary.json    run summary
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { type AggregateRow, type MetricRecord, type SkippedExecution, toIsoTimestamp } from "@eq/domain";
import type { RunSummary } from "../contexts/execution-quality/summary";
import { type CsvValue, formatCsv } from "./csv";

export const AGGREGATE_HEADER = [
	"group",
	"key",
	"count",
	"total_quantity",
	"total_notional",
	"weighted_slippage",
	"weighted_slippage_bps",
] as const;

export const EXECUTION_HEADER = [
	"execution_id",
	"instrument_id",
	"side",
	"quantity",
	"price",
	"timestamp",
	"venue",
	"currency",
	"benchmark_price",
	"benchmark_method",
	"slippage",
	"slippage_bps",
	"slippage_ticks",
	"notional",
	"bid",
	"ask",
	"mid",
	"mid_before",
	"mid_after",
	"spread_capture",
] as const;

export const SKIPPED_HEADER = ["execution_id", "code", "reason"] as const;

export interface ReportContents {
	aggregates: readonly AggregateRow[];
	records: readonly MetricRecord[];
	skipped: readonly SkippedExecution[];
	summary: RunSummary;
}

export interface WrittenReport {
	aggregates: string;
	executions: string;
	skipped: string;
	summary: string;
}

// ============================================
// Row Formatting
// ============================================

export function aggregateCells(row: AggregateRow): CsvValue[] {
	return [
		row.group,
		row.key,
		row.count,
		row.totalQuantity,
		row.totalNotional,
		row.weightedSlippage,
		row.weightedSlippageBps,
	];
}

export function executionCells(record: MetricRecord): CsvValue[] {
	const { quote } = record;
	return [
		record.executionId,
		record.instrumentId,
		record.side,
		record.quantity,
		record.price,
		toIsoTimestamp(record.timestamp),
		record.venue,
		record.currency,
		record.benchmarkPrice,
		record.benchmarkMethod,
		record.slippage,
		record.slippageBps,
		record.slippageTicks,
		record.notional,
		quote.bid,
		quote.ask,
		quote.mid,
		quote.midBefore,
		quote.midAfter,
		quote.spreadCapture,
	];
}

export function skippedCells(entry: SkippedExecution): CsvValue[] {
	return [entry.executionId, entry.code, entry.reason];
}

// ============================================
// Writing
// ============================================

/**
 * Write every report file, creating the output directory if needed
 */
export async function writeReport(outputDir: string, contents: ReportContents): Promise<WrittenReport> {
	await mkdir(outputDir, { recursive: true });

	const written: WrittenReport = {
		aggregates: join(outputDir, "aggregates.csv"),
		executions: join(outputDir, "executions.csv"),
		skipped: join(outputDir, "skipped.csv"),
		summary: join(outputDir, "summary.json"),
	};

	await Promise.all([
		writeFile(written.aggregates, formatCsv(AGGREGATE_HEADER, contents.aggregates.map(aggregateCells))),
		writeFile(written.executions, formatCsv(EXECUTION_HEADER, contents.records.map(executionCells))),
		writeFile(written.skipped, formatCsv(SKIPPED_HEADER, contents.skipped.map(skippedCells))),
		writeFile(written.summary, `${JSON.stringify(contents.summary, null, 2)}\n`),
	]);

	return written;
}
