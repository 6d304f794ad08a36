import { EngineConfigSchema } from "@eq/config";
import { createExecutionRow, createInstrumentRow, createTradeSeries } from "@eq/test-fixtures";
import { describe, expect, it } from "vitest";
import { runExecutionQuality } from "./pipeline";
import { buildRunSummary, summarizeExecutions } from "./summary";

const DAY_ONE = Date.UTC(2024, 2, 1, 15, 30);
const DAY_TWO = Date.UTC(2024, 2, 4, 9, 0);

describe("summarizeExecutions", () => {
	it("collects venues, trade dates and the time range", () => {
		const summary = summarizeExecutions([
			{ timestamp: DAY_TWO, venue: "XLON" },
			{ timestamp: DAY_ONE, venue: "XNAS" },
			{ timestamp: DAY_ONE + 60_000, venue: null },
			{ timestamp: DAY_TWO, venue: "XNAS" },
		]);

		expect(summary).toEqual({
			total: 4,
			venues: ["XLON", "XNAS"],
			tradeDates: ["2024-03-01", "2024-03-04"],
			timeRange: { start: DAY_ONE, end: DAY_TWO },
		});
	});

	it("counts rows whose timestamp does not parse without dating them", () => {
		expect(
			summarizeExecutions([
				{ timestamp: DAY_ONE, venue: " XNAS " },
				{ timestamp: "not a time", venue: "" },
			])
		).toEqual({
			total: 2,
			venues: ["XNAS"],
			tradeDates: ["2024-03-01"],
			timeRange: { start: DAY_ONE, end: DAY_ONE },
		});
	});

	it("has no time range without executions", () => {
		expect(summarizeExecutions([])).toEqual({ total: 0, venues: [], tradeDates: [], timeRange: null });
	});
});

describe("buildRunSummary", () => {
	it("renders timestamps as ISO strings", () => {
		const result = runExecutionQuality(
			{
				instruments: [createInstrumentRow()],
				observations: createTradeSeries("XYZ", [[0, 100]]),
				executions: [createExecutionRow({ timestamp: DAY_ONE })],
			},
			EngineConfigSchema.parse({})
		);

		const summary = buildRunSummary(result, {
			runId: "run-1",
			environment: "test",
			startedAt: DAY_TWO,
			elapsedMs: 42,
		});

		expect(summary.startedAt).toBe("2024-03-04T09:00:00.000Z");
		expect(summary.elapsedMs).toBe(42);
		expect(summary.executions).toEqual({
			total: 1,
			venues: ["XNAS"],
			tradeDates: ["2024-03-01"],
			firstExecution: "2024-03-01T15:30:00.000Z",
			lastExecution: "2024-03-01T15:30:00.000Z",
		});
		expect(summary.marketData).toEqual({
			received: 1,
			indexed: 1,
			droppedByMarketState: 0,
			duplicatesRemoved: 0,
			instruments: 1,
			firstObservation: "2024-03-01T10:00:00.000Z",
			lastObservation: "2024-03-01T10:00:00.000Z",
		});
		expect(summary.counts).toEqual({
			executionsReceived: 1,
			filteredByPhase: 0,
			computed: 0,
			skipped: 1,
			skippedByCode: { NO_OBSERVATION_WITHIN_TOLERANCE: 1 },
			instruments: 1,
		});
	});
});
