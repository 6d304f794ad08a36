/**
 * Paths censored in every log record.
 */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
	"password",
	"secret",
	"token",
	"apiKey",
	"*.password",
	"*.secret",
	"*.token",
	"*.apiKey",
];

export function mergeRedactPaths(extra: readonly string[] = []): string[] {
	return Array.from(new Set([...DEFAULT_REDACT_PATHS, ...extra]));
}
