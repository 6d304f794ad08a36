/**
 * Execution Quality Calculator
 *
 * Derives the metrics of a single execution against its benchmark price.
 *
 * Formulas:
 * - notional       = quantity * price * multiplier
 * - slippage       = (price - benchmark) * sideSign(side, convention)
 * - slippage (bps) = slippage / benchmark * 10,000
 * - slippage (ticks) = slippage / tickSize
 *
 * Under the default favorable_positive convention a buy below the benchmark
 * and a sell above it both give positive slippage.
 */

import { EMPTY_QUOTE_SNAPSHOT, type Execution, type Instrument, sideSign } from "@eq/domain";
import { BPS_PER_UNIT, type MetricOptions, type MetricResult } from "./types";

function isPositive(value: number): boolean {
	return Number.isFinite(value) && value > 0;
}

/**
 * Compute the metric record of one execution.
 *
 * Non-positive quantity or price fails validation; a zero benchmark and any
 * non-finite derived value leave the execution unresolved.
 */
export function computeMetrics(
	execution: Execution,
	instrument: Instrument,
	benchmarkPrice: number,
	options: MetricOptions = {}
): MetricResult {
	const { convention = "favorable_positive", benchmarkMethod = "exact", quote = EMPTY_QUOTE_SNAPSHOT } = options;
	const { quantity, price } = execution;

	if (!isPositive(quantity)) {
		return { ok: false, code: "VALIDATION_FAILED", reason: `quantity must be positive, got ${quantity}` };
	}
	if (!isPositive(price)) {
		return { ok: false, code: "VALIDATION_FAILED", reason: `price must be positive, got ${price}` };
	}
	if (benchmarkPrice === 0) {
		return { ok: false, code: "ZERO_BENCHMARK", reason: "benchmark price is zero" };
	}

	const notional = quantity * price * instrument.multiplier;
	const slippage = (price - benchmarkPrice) * sideSign(execution.side, convention);
	const slippageBps = (slippage / benchmarkPrice) * BPS_PER_UNIT;
	const slippageTicks = slippage / instrument.tickSize;

	const derived = { benchmarkPrice, notional, slippage, slippageBps, slippageTicks };
	for (const [name, value] of Object.entries(derived)) {
		if (!Number.isFinite(value)) {
			return { ok: false, code: "NON_FINITE_METRIC", reason: `${name} is not finite` };
		}
	}

	return {
		ok: true,
		record: {
			executionId: execution.executionId,
			instrumentId: execution.instrumentId,
			side: execution.side,
			quantity,
			price,
			timestamp: execution.timestamp,
			venue: execution.venue,
			currency: instrument.currency,
			benchmarkPrice,
			benchmarkMethod,
			slippage,
			slippageBps,
			slippageTicks,
			notional,
			quote: { ...quote },
		},
	};
}
