/**
 * Error Taxonomy
 *
 * | Error Class        | Scope                               | Fatal |
 * |--------------------|-------------------------------------|-------|
 * | DataIntegrityError | input files, reference/market data  | Yes   |
 * | ValidationError    | one execution row                   | No    |
 * | ConfigurationError | engine/env configuration            | Yes   |
 *
 * Fatal errors abort the run before any report is written. Non-fatal errors
 * are converted into skipped-execution entries and the batch continues.
 */

// ============================================
// Error Codes
// ============================================

export type DataIntegrityCode =
	| "DUPLICATE_INSTRUMENT"
	| "INVALID_REFERENCE_DATA"
	| "INVALID_OBSERVATION"
	| "CONFLICTING_OBSERVATION"
	| "MALFORMED_INPUT";

export type ValidationCode = "VALIDATION_FAILED" | "DUPLICATE_EXECUTION";

export type ConfigurationCode = "CONFIGURATION_INVALID";

export type ErrorCode = DataIntegrityCode | ValidationCode | ConfigurationCode;

export interface QualityErrorOptions {
	/** Structured context for logging */
	details?: Record<string, unknown>;
	cause?: unknown;
}

// ============================================
// Base Error Class
// ============================================

/**
 * Base class for every error raised by the calculator.
 */
export abstract class ExecutionQualityError extends Error {
	abstract readonly code: ErrorCode;

	/** Whether the error aborts the whole run */
	abstract readonly fatal: boolean;

	readonly details: Record<string, unknown>;

	constructor(message: string, options: QualityErrorOptions = {}) {
		super(message, { cause: options.cause });
		this.name = this.constructor.name;
		this.details = options.details ?? {};
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			details: this.details,
		};
	}
}

// ============================================
// Concrete Errors
// ============================================

/**
 * Malformed or self-contradictory reference or market data.
 */
export class DataIntegrityError extends ExecutionQualityError {
	readonly code: DataIntegrityCode;
	readonly fatal = true;

	constructor(message: string, code: DataIntegrityCode, options?: QualityErrorOptions) {
		super(message, options);
		this.code = code;
	}
}

/**
 * A single execution row that cannot be used. Skipped, never fatal.
 */
export class ValidationError extends ExecutionQualityError {
	readonly code: ValidationCode;
	readonly fatal = false;

	/** Individual problems, one per offending field */
	readonly issues: string[];

	constructor(
		message: string,
		issues: string[] = [],
		code: ValidationCode = "VALIDATION_FAILED",
		options?: QualityErrorOptions
	) {
		super(message, options);
		this.code = code;
		this.issues = issues;
	}
}

export class ConfigurationError extends ExecutionQualityError {
	readonly code: ConfigurationCode = "CONFIGURATION_INVALID";
	readonly fatal = true;
	readonly issues: string[];

	constructor(message: string, issues: string[] = [], options?: QualityErrorOptions) {
		super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
		this.issues = issues;
	}
}

// ============================================
// Type Guards
// ============================================

export function isExecutionQualityError(error: unknown): error is ExecutionQualityError {
	return error instanceof ExecutionQualityError;
}

export function isFatalError(error: unknown): boolean {
	return !isExecutionQualityError(error) || error.fatal;
}

/**
 * Get a safe error message from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
