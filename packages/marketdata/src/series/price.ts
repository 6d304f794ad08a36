/**
 * Usable Price Rules
 *
 * Which single price an observation contributes to a benchmark:
 * 1. last trade, if present
 * 2. bid/ask midpoint, if both sides are present
 * 3. whichever side is present
 * Otherwise the observation has no usable price.
 */

import type { MarketObservation } from "@eq/domain";

type Prices = Pick<MarketObservation, "bid" | "ask" | "last">;

export function midPrice(bid: number | null, ask: number | null): number | null {
	if (bid === null || ask === null) {
		return null;
	}
	return (bid + ask) / 2;
}

export function usablePrice(observation: Prices): number | null {
	if (observation.last !== null) {
		return observation.last;
	}
	return midPrice(observation.bid, observation.ask) ?? observation.bid ?? observation.ask;
}
