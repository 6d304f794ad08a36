import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { USAGE } from "./args";
import { runCli } from "./run";

const EXECUTIONS = `execution_id,instrument_id,side,quantity,price,timestamp,venue,phase
E1,XYZ,BUY,50,103,2024-03-01T10:00:15Z,XNAS,CONTINUOUS_TRADING
E2,UNKNOWN,SELL,10,50,2024-03-01T10:00:15Z,XNAS,CONTINUOUS_TRADING
`;

const REFDATA = `instrument_id,currency,multiplier,tick_size
XYZ,USD,1,0.01
`;

const MARKETDATA = `instrument_id,timestamp,bid,ask,last,volume,market_state
XYZ,2024-03-01T10:00:10Z,,,100,500,CONTINUOUS_TRADING
XYZ,2024-03-01T10:00:20Z,,,110,300,CONTINUOUS_TRADING
`;

function capture(): { lines: Record<string, unknown>[]; destination: { write(msg: string): void } } {
	const lines: Record<string, unknown>[] = [];
	return {
		lines,
		destination: {
			write(msg: string) {
				lines.push(JSON.parse(msg));
			},
		},
	};
}

describe("runCli", () => {
	let dir: string;
	let env: Record<string, string>;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "eq-cli-"));
		await mkdir(join(dir, "configs"));
		await writeFile(join(dir, "configs", "default.yaml"), "engine:\n  toleranceMs: 60000\n");
		await writeFile(join(dir, "executions.csv"), EXECUTIONS);
		await writeFile(join(dir, "refdata.csv"), REFDATA);
		await writeFile(join(dir, "marketdata.csv"), MARKETDATA);

		env = {
			EXECUTIONS_FILE_PATH: join(dir, "executions.csv"),
			REFDATA_FILE_PATH: join(dir, "refdata.csv"),
			MARKETDATA_FILE_PATH: join(dir, "marketdata.csv"),
			OUTPUT_FILE_PATH: join(dir, "output"),
		};
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("writes the report and exits 0", async () => {
		const { lines, destination } = capture();

		const code = await runCli([`--config-dir=${join(dir, "configs")}`, "--env=test"], { env, destination });

		expect(code).toBe(0);

		const aggregates = (await readFile(join(dir, "output", "aggregates.csv"), "utf-8")).trimEnd().split("\n");
		expect(aggregates[0]).toBe(
			"group,key,count,total_quantity,total_notional,weighted_slippage,weighted_slippage_bps"
		);
		expect(aggregates[1]).toMatch(/^instrument,XYZ,1,50,5150,2,190\.47/);
		expect(aggregates[2]).toMatch(/^side,BUY,1,50,5150,2,190\.47/);
		expect(aggregates[3]).toMatch(/^overall,overall,1,50,5150,2,190\.47/);
		expect(aggregates).toHaveLength(4);

		const skipped = await readFile(join(dir, "output", "skipped.csv"), "utf-8");
		expect(skipped).toBe("execution_id,code,reason\nE2,UNKNOWN_INSTRUMENT,unknown instrument\n");

		const executions = (await readFile(join(dir, "output", "executions.csv"), "utf-8")).trimEnd().split("\n");
		expect(executions).toHaveLength(2);
		expect(executions[1]).toMatch(/^E1,XYZ,BUY,50,103,2024-03-01T10:00:15\.000Z,XNAS,USD,105,interpolated,2,/);

		const summary = JSON.parse(await readFile(join(dir, "output", "summary.json"), "utf-8"));
		expect(summary.environment).toBe("test");
		expect(summary.counts).toEqual({
			executionsReceived: 2,
			filteredByPhase: 0,
			computed: 1,
			skipped: 1,
			skippedByCode: { UNKNOWN_INSTRUMENT: 1 },
			instruments: 1,
		});
		expect(summary.marketData.firstObservation).toBe("2024-03-01T10:00:10.000Z");

		const done = lines.find((line) => line.msg === "Report written");
		expect(done?.runId).toBe(summary.runId);
		expect(done?.service).toBe("execution-quality");
	});

	it("overrides the output directory from the command line", async () => {
		const { destination } = capture();
		const output = join(dir, "elsewhere");

		const code = await runCli([`--config-dir=${join(dir, "configs")}`, `--output=${output}`], { env, destination });

		expect(code).toBe(0);
		expect(existsSync(join(output, "summary.json"))).toBe(true);
		expect(existsSync(join(dir, "output"))).toBe(false);
	});

	it("exits 1 without writing anything on a data integrity error", async () => {
		const { lines, destination } = capture();
		await writeFile(join(dir, "refdata.csv"), `${REFDATA}XYZ,EUR,1,0.01\n`);

		const code = await runCli([`--config-dir=${join(dir, "configs")}`], { env, destination });

		expect(code).toBe(1);
		expect(existsSync(join(dir, "output"))).toBe(false);
		const fatal = lines.find((line) => line.severity === "FATAL");
		expect(fatal?.msg).toBe("Run failed: duplicate instrument id in reference data: XYZ");
	});

	it("exits 1 on invalid configuration", async () => {
		const { lines, destination } = capture();

		const code = await runCli([`--config-dir=${join(dir, "configs")}`], {
			env: { ...env, EQ_TOLERANCE_MS: "soon" },
			destination,
		});

		expect(code).toBe(1);
		expect(lines.some((line) => line.severity === "FATAL")).toBe(true);
	});

	it("prints usage", async () => {
		const printed: string[] = [];

		const code = await runCli(["--help"], { env, print: (text) => printed.push(text) });

		expect(code).toBe(0);
		expect(printed).toEqual([USAGE]);
	});
});
