import { DataIntegrityError } from "@eq/domain";
import { describe, expect, it } from "vitest";
import { escapeCsv, formatCsv, parseCsv } from "./csv";

describe("parseCsv", () => {
	it("keys rows by header", () => {
		expect(parseCsv("a,b\n1,2\n")).toEqual({ header: ["a", "b"], rows: [{ a: "1", b: "2" }] });
	});

	it("unescapes quoted fields", () => {
		const table = parseCsv('id,reason\n1,"has, comma and ""quote"""\n');
		expect(table.rows[0]?.reason).toBe('has, comma and "quote"');
	});

	it("keeps line breaks inside quoted fields", () => {
		const table = parseCsv('a,b\n"x\ny",2\n');
		expect(table.rows).toEqual([{ a: "x\ny", b: "2" }]);
	});

	it("handles CRLF, blank lines and a byte order mark", () => {
		const table = parseCsv("\uFEFFa,b\r\n1,2\r\n\r\n3,4");
		expect(table.header).toEqual(["a", "b"]);
		expect(table.rows).toEqual([
			{ a: "1", b: "2" },
			{ a: "3", b: "4" },
		]);
	});

	it("trims header names", () => {
		expect(parseCsv(" a , b\n1,2").header).toEqual(["a", "b"]);
	});

	it("reads missing trailing fields as empty", () => {
		expect(parseCsv("a,b,c\n1\n").rows).toEqual([{ a: "1", b: "", c: "" }]);
	});

	it("returns an empty table for empty input", () => {
		expect(parseCsv("")).toEqual({ header: [], rows: [] });
	});

	it("rejects rows with extra fields", () => {
		expect(() => parseCsv("a,b\n1,2,3\n", "executions.csv")).toThrow(
			"executions.csv: row 1 has 3 fields, expected 2"
		);
	});

	it("rejects an unterminated quote", () => {
		let caught: unknown;
		try {
			parseCsv('a\n"oops\n');
		} catch (error) {
			caught = error;
		}
		expect(caught).toBeInstanceOf(DataIntegrityError);
		if (caught instanceof DataIntegrityError) {
			expect(caught.code).toBe("MALFORMED_INPUT");
		}
	});
});

describe("formatCsv", () => {
	it("escapes values that need quoting", () => {
		expect(
			formatCsv(
				["a", "b"],
				[
					[1, null],
					["x,y", 'q"'],
				]
			)
		).toBe('a,b\n1,\n"x,y","q"""\n');
	});

	it("writes only the header for no rows", () => {
		expect(formatCsv(["execution_id", "code", "reason"], [])).toBe("execution_id,code,reason\n");
	});

	it("renders empty values for null and undefined", () => {
		expect(escapeCsv(null)).toBe("");
		expect(escapeCsv(undefined)).toBe("");
		expect(escapeCsv(0)).toBe("0");
	});
});
