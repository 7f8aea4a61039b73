import { Decimal } from "../shared/decimal.js";
import type { InstrumentId } from "../shared/identifiers.js";
import type { BookLevel, BookSide, Quote } from "./types.js";

function compareDesc(a: BookLevel, b: BookLevel): number {
	return b.price.cmp(a.price);
}

function compareAsc(a: BookLevel, b: BookLevel): number {
	return a.price.cmp(b.price);
}

/**
 * Builds a Quote from raw levels in any order: drops empty levels, sorts each
 * side best-first and derives the best prices.
 * @example
 * const quote = buildQuote(id, [{ price: bid, size }], [], clock.now());
 */
export function buildQuote(
	instrument: InstrumentId,
	bids: readonly BookLevel[],
	asks: readonly BookLevel[],
	timestampMs: number,
): Quote {
	const sortedBids = bids.filter((l) => l.size.isPositive() && l.price.isPositive()).sort(compareDesc);
	const sortedAsks = asks.filter((l) => l.size.isPositive() && l.price.isPositive()).sort(compareAsc);
	return {
		instrument,
		bestBid: sortedBids[0]?.price ?? null,
		bestAsk: sortedAsks[0]?.price ?? null,
		bids: sortedBids,
		asks: sortedAsks,
		timestampMs,
	};
}

/**
 * Calculates the spread (difference between best ask and best bid).
 * @returns The spread, or null if either side is empty
 */
export function spread(quote: Quote): Decimal | null {
	if (quote.bestBid === null || quote.bestAsk === null) return null;
	return quote.bestAsk.sub(quote.bestBid);
}

/**
 * Calculates the mid-price (average of best bid and best ask).
 * @returns The mid-price, or null if either side is empty
 */
export function midPrice(quote: Quote): Decimal | null {
	if (quote.bestBid === null || quote.bestAsk === null) return null;
	return quote.bestBid.add(quote.bestAsk).div(Decimal.from(2));
}

/**
 * Observed price for the price history: the mid when both sides are quoted,
 * otherwise whichever side is present, otherwise null.
 */
export function observedPrice(quote: Quote): Decimal | null {
	return midPrice(quote) ?? quote.bestBid ?? quote.bestAsk;
}

/** Notional (price × size) resting at the best level of a side; zero when empty. */
export function topOfBookNotional(quote: Quote, side: BookSide): Decimal {
	const top = side === "buy" ? quote.asks[0] : quote.bids[0];
	return top ? top.price.mul(top.size) : Decimal.zero();
}

/** Total size resting on a side across at most `maxLevels` levels. */
export function depthSize(levels: readonly BookLevel[], maxLevels: number): Decimal {
	return Decimal.sum(levels.slice(0, maxLevels).map((l) => l.size));
}

/**
 * Calculates the effective price for executing a trade of a given size.
 * Walks the book levels to compute the average fill price.
 * @param side - "buy" walks the asks, "sell" walks the bids
 * @returns The volume-weighted fill price, or null if liquidity is insufficient
 * @example
 * const vwap = effectivePrice(quote, Decimal.from(150), "sell");
 */
export function effectivePrice(quote: Quote, size: Decimal, side: BookSide): Decimal | null {
	if (!size.isPositive()) return null;
	const levels = side === "buy" ? quote.asks : quote.bids;
	let remaining = size;
	let totalCost = Decimal.zero();

	for (const lvl of levels) {
		if (remaining.isZero()) break;
		const fillSize = Decimal.min(remaining, lvl.size);
		totalCost = totalCost.add(fillSize.mul(lvl.price));
		remaining = remaining.sub(fillSize);
	}

	if (remaining.isPositive()) return null;
	return totalCost.div(size);
}
