/**
 * Binary search over a series sorted by ascending timestamp.
 */

interface Timestamped {
	readonly timestamp: number;
}

/**
 * Index of the first element with timestamp >= target (length if none)
 */
export function lowerBound(series: readonly Timestamped[], target: number): number {
	let lo = 0;
	let hi = series.length;
	while (lo < hi) {
		const mid = (lo + hi) >>> 1;
		const item = series[mid];
		if (item !== undefined && item.timestamp < target) {
			lo = mid + 1;
		} else {
			hi = mid;
		}
	}
	return lo;
}

/**
 * Index of the first element with timestamp > target (length if none)
 */
export function upperBound(series: readonly Timestamped[], target: number): number {
	let lo = 0;
	let hi = series.length;
	while (lo < hi) {
		const mid = (lo + hi) >>> 1;
		const item = series[mid];
		if (item !== undefined && item.timestamp <= target) {
			lo = mid + 1;
		} else {
			hi = mid;
		}
	}
	return lo;
}
