/**
 * Execution Quality Aggregator
 *
 * Folds metric records into per-instrument, per-side and overall summaries.
 *
 * Each group keeps compensated running sums of quantity, notional and
 * quantity-weighted slippage; the weighted averages are divided out once when
 * rows are emitted. The result does not depend on the order records arrive in.
 */

import { type AggregateGroup, type AggregateRow, type MetricRecord, OVERALL_KEY, type Side } from "@eq/domain";
import { CompensatedSum } from "./summation";

const SIDE_ORDER: readonly Side[] = ["BUY", "SELL"];

// ============================================
// Group Accumulator
// ============================================

class GroupAccumulator {
	count = 0;
	readonly quantity = new CompensatedSum();
	readonly notional = new CompensatedSum();
	readonly weightedSlippage = new CompensatedSum();
	readonly weightedSlippageBps = new CompensatedSum();

	add(record: MetricRecord): void {
		this.count++;
		this.quantity.add(record.quantity);
		this.notional.add(record.notional);
		this.weightedSlippage.add(record.quantity * record.slippage);
		this.weightedSlippageBps.add(record.quantity * record.slippageBps);
	}

	merge(other: GroupAccumulator): void {
		this.count += other.count;
		this.quantity.merge(other.quantity);
		this.notional.merge(other.notional);
		this.weightedSlippage.merge(other.weightedSlippage);
		this.weightedSlippageBps.merge(other.weightedSlippageBps);
	}

	toRow(group: AggregateGroup, key: string): AggregateRow {
		const totalQuantity = this.quantity.value;
		return {
			group,
			key,
			count: this.count,
			totalQuantity,
			totalNotional: this.notional.value,
			weightedSlippage: totalQuantity > 0 ? this.weightedSlippage.value / totalQuantity : null,
			weightedSlippageBps: totalQuantity > 0 ? this.weightedSlippageBps.value / totalQuantity : null,
		};
	}
}

function accumulatorFor<K>(groups: Map<K, GroupAccumulator>, key: K): GroupAccumulator {
	let accumulator = groups.get(key);
	if (!accumulator) {
		accumulator = new GroupAccumulator();
		groups.set(key, accumulator);
	}
	return accumulator;
}

function mergeGroups<K>(target: Map<K, GroupAccumulator>, source: ReadonlyMap<K, GroupAccumulator>): void {
	for (const [key, accumulator] of source) {
		accumulatorFor(target, key).merge(accumulator);
	}
}

// ============================================
// Aggregator
// ============================================

export class ExecutionQualityAggregator {
	readonly #instruments = new Map<string, GroupAccumulator>();
	readonly #sides = new Map<Side, GroupAccumulator>();
	readonly #overall = new GroupAccumulator();

	add(record: MetricRecord): this {
		accumulatorFor(this.#instruments, record.instrumentId).add(record);
		accumulatorFor(this.#sides, record.side).add(record);
		this.#overall.add(record);
		return this;
	}

	addAll(records: Iterable<MetricRecord>): this {
		for (const record of records) {
			this.add(record);
		}
		return this;
	}

	/**
	 * Fold another aggregator's totals into this one
	 */
	merge(other: ExecutionQualityAggregator): this {
		mergeGroups(this.#instruments, other.#instruments);
		mergeGroups(this.#sides, other.#sides);
		this.#overall.merge(other.#overall);
		return this;
	}

	get count(): number {
		return this.#overall.count;
	}

	/**
	 * Instrument rows sorted by id, then BUY and SELL rows for the sides seen,
	 * then the overall row (always present).
	 */
	rows(): AggregateRow[] {
		const rows: AggregateRow[] = [];

		const instrumentIds = Array.from(this.#instruments.keys()).sort();
		for (const instrumentId of instrumentIds) {
			const accumulator = this.#instruments.get(instrumentId);
			if (accumulator) {
				rows.push(accumulator.toRow("instrument", instrumentId));
			}
		}

		for (const side of SIDE_ORDER) {
			const accumulator = this.#sides.get(side);
			if (accumulator) {
				rows.push(accumulator.toRow("side", side));
			}
		}

		rows.push(this.#overall.toRow("overall", OVERALL_KEY));
		return rows;
	}
}

/**
 * Combine two partial aggregators into a new one; neither input is modified.
 */
export function mergeAggregators(
	a: ExecutionQualityAggregator,
	b: ExecutionQualityAggregator
): ExecutionQualityAggregator {
	return new ExecutionQualityAggregator().merge(a).merge(b);
}

/**
 * Aggregate a batch of records in one call
 */
export function aggregateRecords(records: Iterable<MetricRecord>): AggregateRow[] {
	return new ExecutionQualityAggregator().addAll(records).rows();
}
