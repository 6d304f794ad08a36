import { EngineConfigSchema } from "@eq/config";
import { DataIntegrityError } from "@eq/domain";
import { MarketSeriesIndex } from "@eq/marketdata";
import {
	BASE_TIMESTAMP,
	createExecution,
	createExecutionRow,
	createInstrumentRow,
	createObservationRow,
	createTradeSeries,
} from "@eq/test-fixtures";
import { InstrumentCatalog } from "@eq/universe";
import { describe, expect, it } from "vitest";
import type { EngineInput } from "../../io/load";
import { resolveExecution, runExecutionQuality } from "./pipeline";
import { buildRunSummary } from "./summary";

const T = (offsetMs: number) => BASE_TIMESTAMP + offsetMs;
const DEFAULT_ENGINE = EngineConfigSchema.parse({});

function xyzInput(executions: EngineInput["executions"]): EngineInput {
	return {
		instruments: [createInstrumentRow()],
		observations: createTradeSeries("XYZ", [
			[10_000, 100],
			[20_000, 110],
		]),
		executions,
	};
}

describe("runExecutionQuality", () => {
	it("computes the interpolated buy example", () => {
		const result = runExecutionQuality(
			xyzInput([createExecutionRow({ side: "BUY", quantity: 50, price: 103, timestamp: T(15_000) })]),
			DEFAULT_ENGINE
		);

		expect(result.skipped).toEqual([]);
		expect(result.records).toHaveLength(1);
		const [record] = result.records;
		expect(record?.benchmarkPrice).toBe(105);
		expect(record?.benchmarkMethod).toBe("interpolated");
		expect(record?.slippage).toBe(2);
		expect(record?.notional).toBe(5150);
		expect(record?.slippageBps).toBeCloseTo(190.48, 2);
	});

	it("skips an unknown instrument without aggregating it", () => {
		const result = runExecutionQuality(
			xyzInput([
				createExecutionRow({ executionId: "E1", timestamp: T(15_000) }),
				createExecutionRow({ executionId: "E2", instrumentId: "UNKNOWN", timestamp: T(15_000) }),
			]),
			DEFAULT_ENGINE
		);

		expect(result.skipped).toEqual([{ executionId: "E2", code: "UNKNOWN_INSTRUMENT", reason: "unknown instrument" }]);
		expect(result.aggregates.map((row) => [row.group, row.key, row.count])).toEqual([
			["instrument", "XYZ", 1],
			["side", "BUY", 1],
			["overall", "overall", 1],
		]);
	});

	it("records every kind of per-execution failure and keeps going", () => {
		const result = runExecutionQuality(
			xyzInput([
				createExecutionRow({ executionId: "E1", timestamp: T(15_000) }),
				createExecutionRow({ executionId: "E2", instrumentId: "UNKNOWN" }),
				createExecutionRow({ executionId: "E3", quantity: 0 }),
				createExecutionRow({ executionId: "E1", timestamp: T(16_000) }),
				createExecutionRow({ executionId: "E4", timestamp: T(200_000) }),
				createExecutionRow({ executionId: "E5", phase: "CLOSING_AUCTION" }),
			]),
			DEFAULT_ENGINE
		);

		expect(result.skipped).toEqual([
			{ executionId: "E2", code: "UNKNOWN_INSTRUMENT", reason: "unknown instrument" },
			{ executionId: "E3", code: "VALIDATION_FAILED", reason: "invalid execution: quantity: must be positive" },
			{ executionId: "E1", code: "DUPLICATE_EXECUTION", reason: "duplicate execution id" },
			{ executionId: "E4", code: "NO_OBSERVATION_WITHIN_TOLERANCE", reason: "no observation within tolerance" },
		]);
		expect(result.counts).toMatchObject({
			executionsReceived: 6,
			filteredByPhase: 1,
			computed: 1,
			skipped: 4,
			skippedByCode: {
				UNKNOWN_INSTRUMENT: 1,
				VALIDATION_FAILED: 1,
				DUPLICATE_EXECUTION: 1,
				NO_OBSERVATION_WITHIN_TOLERANCE: 1,
			},
			instruments: 1,
		});
		expect(result.executions.total).toBe(6);
	});

	it("skips an execution whose timestamp a Date cannot hold", () => {
		const result = runExecutionQuality(
			xyzInput([
				createExecutionRow({ executionId: "E1", timestamp: T(15_000) }),
				createExecutionRow({ executionId: "E2", timestamp: "99999999999999999" }),
			]),
			DEFAULT_ENGINE
		);

		expect(result.skipped).toEqual([
			{
				executionId: "E2",
				code: "VALIDATION_FAILED",
				reason: 'invalid execution: timestamp: cannot parse "99999999999999999"',
			},
		]);
		expect(result.records.map((record) => record.executionId)).toEqual(["E1"]);

		const summary = buildRunSummary(result, { runId: "run-1", environment: "test", startedAt: T(0), elapsedMs: 1 });
		expect(summary.executions).toEqual({
			total: 2,
			venues: ["XNAS"],
			tradeDates: ["2024-03-01"],
			firstExecution: "2024-03-01T10:00:15.000Z",
			lastExecution: "2024-03-01T10:00:15.000Z",
		});
	});

	it("summarizes every received execution, filtered ones included", () => {
		const result = runExecutionQuality(
			xyzInput([
				createExecutionRow({ executionId: "E1", timestamp: T(15_000) }),
				createExecutionRow({
					executionId: "E2",
					phase: "CLOSING_AUCTION",
					venue: "XLON",
					timestamp: Date.UTC(2024, 2, 4, 16, 30),
				}),
				createExecutionRow({ executionId: "E3", quantity: 0, timestamp: T(16_000) }),
			]),
			DEFAULT_ENGINE
		);

		expect(result.counts.filteredByPhase).toBe(1);
		expect(result.executions).toEqual({
			total: 3,
			venues: ["XLON", "XNAS"],
			tradeDates: ["2024-03-01", "2024-03-04"],
			timeRange: { start: T(15_000), end: Date.UTC(2024, 2, 4, 16, 30) },
		});
	});

	it("keeps the overall count equal to the records produced", () => {
		const result = runExecutionQuality(
			xyzInput([
				createExecutionRow({ executionId: "E1", timestamp: T(11_000) }),
				createExecutionRow({ executionId: "E2", side: "SELL", timestamp: T(12_000) }),
				createExecutionRow({ executionId: "E3", instrumentId: "UNKNOWN" }),
			]),
			DEFAULT_ENGINE
		);

		const overall = result.aggregates.find((row) => row.group === "overall");
		expect(overall?.count).toBe(result.records.length);
		expect(overall?.count).toBe(2);
	});

	it("infers the side from a signed quantity", () => {
		const result = runExecutionQuality(
			xyzInput([createExecutionRow({ side: null, quantity: -50, price: 107, timestamp: T(15_000) })]),
			DEFAULT_ENGINE
		);

		const [record] = result.records;
		expect(record?.side).toBe("SELL");
		expect(record?.quantity).toBe(50);
		expect(record?.slippage).toBe(2);
	});

	it("applies the configured slippage convention", () => {
		const result = runExecutionQuality(
			xyzInput([createExecutionRow({ price: 103, timestamp: T(15_000) })]),
			EngineConfigSchema.parse({ slippageConvention: "cost_positive" })
		);

		expect(result.records[0]?.slippage).toBe(-2);
	});

	it("skips a zero benchmark", () => {
		const result = runExecutionQuality(
			{
				instruments: [createInstrumentRow()],
				observations: createTradeSeries("XYZ", [[0, 0]]),
				executions: [createExecutionRow()],
			},
			DEFAULT_ENGINE
		);

		expect(result.skipped).toEqual([{ executionId: "E1", code: "ZERO_BENCHMARK", reason: "benchmark price is zero" }]);
	});

	it("drops observations outside the configured market states", () => {
		const result = runExecutionQuality(
			{
				instruments: [createInstrumentRow()],
				observations: [createObservationRow({ marketState: "CLOSING_AUCTION" })],
				executions: [createExecutionRow()],
			},
			DEFAULT_ENGINE
		);

		expect(result.skipped).toEqual([
			{ executionId: "E1", code: "NO_MARKET_DATA", reason: "no market data for instrument" },
		]);
		expect(result.counts.observations.droppedByMarketState).toBe(1);
		expect(result.marketDataRange).toEqual({ start: BASE_TIMESTAMP, end: BASE_TIMESTAMP });
	});

	it("keeps every phase when no trading phases are configured", () => {
		const result = runExecutionQuality(
			xyzInput([createExecutionRow({ phase: "CLOSING_AUCTION", timestamp: T(15_000) })]),
			EngineConfigSchema.parse({ tradingPhases: [] })
		);

		expect(result.counts.filteredByPhase).toBe(0);
		expect(result.records).toHaveLength(1);
	});

	it("attaches the prevailing quote", () => {
		const result = runExecutionQuality(
			{
				instruments: [createInstrumentRow()],
				observations: [createObservationRow({ bid: 99, ask: 101, last: 100 })],
				executions: [createExecutionRow({ side: "BUY", price: 100.5 })],
			},
			DEFAULT_ENGINE
		);

		expect(result.records[0]?.quote).toEqual({
			bid: 99,
			ask: 101,
			mid: 100,
			midBefore: null,
			midAfter: 100,
			spreadCapture: 0.25,
		});
	});

	it("aborts on conflicting market data", () => {
		const row = createObservationRow();
		expect(() =>
			runExecutionQuality(
				{ instruments: [createInstrumentRow()], observations: [row, { ...row, last: 101 }], executions: [] },
				DEFAULT_ENGINE
			)
		).toThrow(DataIntegrityError);
	});

	it("aborts on duplicate reference data", () => {
		expect(() =>
			runExecutionQuality(
				{ instruments: [createInstrumentRow(), createInstrumentRow()], observations: [], executions: [] },
				DEFAULT_ENGINE
			)
		).toThrow("duplicate instrument id in reference data: XYZ");
	});

	it("produces an overall row for an empty batch", () => {
		const result = runExecutionQuality(xyzInput([]), DEFAULT_ENGINE);

		expect(result.aggregates).toEqual([
			{
				group: "overall",
				key: "overall",
				count: 0,
				totalQuantity: 0,
				totalNotional: 0,
				weightedSlippage: null,
				weightedSlippageBps: null,
			},
		]);
		expect(result.executions.timeRange).toBeNull();
	});
});

describe("resolveExecution", () => {
	const context = {
		catalog: InstrumentCatalog.fromRows([createInstrumentRow()]),
		index: MarketSeriesIndex.build(
			createTradeSeries("XYZ", [
				[10_000, 100],
				[20_000, 110],
			]),
			{ toleranceMs: 60_000 }
		),
		config: DEFAULT_ENGINE,
	};

	it("resolves an exact timestamp match", () => {
		const outcome = resolveExecution(createExecution({ timestamp: T(20_000), price: 109 }), context);

		expect(outcome.ok).toBe(true);
		if (outcome.ok) {
			expect(outcome.record.benchmarkMethod).toBe("exact");
			expect(outcome.record.slippage).toBe(1);
		}
	});

	it("does not depend on earlier calls", () => {
		const execution = createExecution({ timestamp: T(15_000), price: 103 });

		expect(resolveExecution(execution, context)).toEqual(resolveExecution(execution, context));
	});
});
