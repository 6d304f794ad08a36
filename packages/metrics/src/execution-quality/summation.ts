/**
 * Compensated summation (Neumaier's variant of Kahan summation).
 *
 * Keeps a running compensation term so the total does not depend on the
 * order the terms arrive in, within a few ulps.
 */
export class CompensatedSum {
	#sum = 0;
	#compensation = 0;

	add(value: number): this {
		const total = this.#sum + value;
		if (Math.abs(this.#sum) >= Math.abs(value)) {
			this.#compensation += this.#sum - total + value;
		} else {
			this.#compensation += value - total + this.#sum;
		}
		this.#sum = total;
		return this;
	}

	/**
	 * Fold another partial sum into this one
	 */
	merge(other: CompensatedSum): this {
		this.add(other.#sum);
		this.#compensation += other.#compensation;
		return this;
	}

	get value(): number {
		return this.#sum + this.#compensation;
	}
}

/**
 * Compensated total of a list of numbers
 */
export function compensatedSum(values: Iterable<number>): number {
	const sum = new CompensatedSum();
	for (const value of values) {
		sum.add(value);
	}
	return sum.value;
}
