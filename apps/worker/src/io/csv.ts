/**
 * CSV reading and writing
 *
 * Comma separated, header row first, fields optionally double-quoted with ""
 * as an escaped quote. Quoted fields may span lines.
 */

import { DataIntegrityError } from "@eq/domain";

export type CsvRecord = Record<string, string>;

export interface CsvTable {
	header: string[];
	rows: CsvRecord[];
}

export type CsvValue = string | number | null | undefined;

// ============================================
// Reading
// ============================================

/**
 * Split CSV text into records of raw fields
 */
function tokenize(text: string, source: string): string[][] {
	const records: string[][] = [];
	let record: string[] = [];
	let field = "";
	let inQuotes = false;
	let line = 1;

	for (let i = 0; i < text.length; i++) {
		const char = text[i];

		if (inQuotes) {
			if (char === '"') {
				if (text[i + 1] === '"') {
					field += '"';
					i++;
				} else {
					inQuotes = false;
				}
			} else {
				if (char === "\n") line++;
				field += char;
			}
			continue;
		}

		if (char === '"') {
			inQuotes = true;
		} else if (char === ",") {
			record.push(field);
			field = "";
		} else if (char === "\n" || char === "\r") {
			if (char === "\r" && text[i + 1] === "\n") {
				i++;
			}
			record.push(field);
			records.push(record);
			record = [];
			field = "";
			line++;
		} else {
			field += char;
		}
	}

	if (inQuotes) {
		throw new DataIntegrityError(`${source}: unterminated quoted field at line ${line}`, "MALFORMED_INPUT", {
			details: { source, line },
		});
	}
	if (field.length > 0 || record.length > 0) {
		record.push(field);
		records.push(record);
	}

	return records.filter((fields) => fields.some((value) => value.trim().length > 0));
}

/**
 * Parse CSV text into rows keyed by the trimmed header names.
 * Blank lines are ignored; missing trailing fields read as "".
 *
 * @throws DataIntegrityError when a row has more fields than the header
 */
export function parseCsv(text: string, source = "csv"): CsvTable {
	const content = text.startsWith("\uFEFF") ? text.slice(1) : text;
	const [headerFields, ...records] = tokenize(content, source);
	if (!headerFields) {
		return { header: [], rows: [] };
	}

	const header = headerFields.map((name) => name.trim());
	const rows = records.map((fields, index) => {
		if (fields.length > header.length) {
			throw new DataIntegrityError(
				`${source}: row ${index + 1} has ${fields.length} fields, expected ${header.length}`,
				"MALFORMED_INPUT",
				{ details: { source, row: index + 1 } }
			);
		}
		const row: CsvRecord = {};
		header.forEach((name, column) => {
			row[name] = fields[column] ?? "";
		});
		return row;
	});

	return { header, rows };
}

// ============================================
// Writing
// ============================================

export function escapeCsv(value: CsvValue): string {
	if (value === null || value === undefined) return "";
	const str = String(value);
	if (str.includes(",") || str.includes('"') || str.includes("\n") || str.includes("\r")) {
		return `"${str.replace(/"/g, '""')}"`;
	}
	return str;
}

/**
 * Render a header and rows as CSV text, newline terminated
 */
export function formatCsv(header: readonly string[], rows: ReadonlyArray<readonly CsvValue[]>): string {
	const lines = [header.map(escapeCsv).join(","), ...rows.map((row) => row.map(escapeCsv).join(","))];
	return `${lines.join("\n")}\n`;
}
