export { type CsvRecord, type CsvTable, type CsvValue, escapeCsv, formatCsv, parseCsv } from "./csv";
export {
	type EngineInput,
	EXECUTION_COLUMNS,
	loadInputs,
	MARKETDATA_COLUMNS,
	readCsvFile,
	REFDATA_COLUMNS,
	toExecutionRows,
	toInstrumentRows,
	toObservationRows,
} from "./load";
export {
	AGGREGATE_HEADER,
	EXECUTION_HEADER,
	type ReportContents,
	SKIPPED_HEADER,
	type WrittenReport,
	writeReport,
} from "./write";
