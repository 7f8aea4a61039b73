import type { Decimal } from "../shared/decimal.js";
import type { InstrumentId } from "../shared/identifiers.js";

/**
 * A single price level in an order book.
 */
export interface BookLevel {
	readonly price: Decimal;
	readonly size: Decimal;
}

/**
 * Top-of-book plus depth for one instrument, as reported by the venue.
 * Bids are sorted best (highest) first, asks best (lowest) first.
 * A side with no resting orders has a null best price and no levels.
 */
export interface Quote {
	readonly instrument: InstrumentId;
	readonly bestBid: Decimal | null;
	readonly bestAsk: Decimal | null;
	readonly bids: readonly BookLevel[];
	readonly asks: readonly BookLevel[];
	readonly timestampMs: number;
}

/** Instrument labels carried through for display; no behavioral effect. */
export interface InstrumentMeta {
	readonly eventSlug: string;
	readonly outcome: string;
}

/** Which side of the book an order takes liquidity from. */
export type BookSide = "buy" | "sell";
