/**
 * Instrument Catalog
 *
 * Maps instrument ids to reference attributes. Built once from reference
 * rows; read-only afterwards.
 */

import {
	DataIntegrityError,
	type Instrument,
	type InstrumentRow,
	InstrumentSchema,
} from "@eq/domain";

export class InstrumentCatalog {
	readonly #instruments: ReadonlyMap<string, Readonly<Instrument>>;

	private constructor(instruments: Map<string, Readonly<Instrument>>) {
		this.#instruments = instruments;
	}

	/**
	 * Build the catalog from reference data rows.
	 *
	 * @throws DataIntegrityError on a duplicate instrument id or invalid attributes
	 */
	static fromRows(rows: Iterable<InstrumentRow>): InstrumentCatalog {
		const instruments = new Map<string, Readonly<Instrument>>();

		let rowNumber = 0;
		for (const row of rows) {
			rowNumber++;
			const result = InstrumentSchema.safeParse(row);
			if (!result.success) {
				const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
				throw new DataIntegrityError(
					`invalid reference data for instrument "${row.instrumentId}": ${issues.join("; ")}`,
					"INVALID_REFERENCE_DATA",
					{ details: { row: rowNumber, instrumentId: row.instrumentId, issues } }
				);
			}

			const instrument = result.data;
			if (instruments.has(instrument.instrumentId)) {
				throw new DataIntegrityError(
					`duplicate instrument id in reference data: ${instrument.instrumentId}`,
					"DUPLICATE_INSTRUMENT",
					{ details: { row: rowNumber, instrumentId: instrument.instrumentId } }
				);
			}
			instruments.set(instrument.instrumentId, Object.freeze(instrument));
		}

		return new InstrumentCatalog(instruments);
	}

	/**
	 * @returns the instrument, or undefined when the id is not in the catalog
	 */
	lookup(instrumentId: string): Readonly<Instrument> | undefined {
		return this.#instruments.get(instrumentId);
	}

	has(instrumentId: string): boolean {
		return this.#instruments.has(instrumentId);
	}

	get size(): number {
		return this.#instruments.size;
	}

	ids(): string[] {
		return Array.from(this.#instruments.keys());
	}
}
