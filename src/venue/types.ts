/**
 * Venue gateway contract — the typed surface the engine trades through.
 *
 * Quote retrieval returns a tagged `QuoteError` so an empty book is data the
 * caller can branch on; only `transient` failures are worth retrying.
 */

import type { ValidationError } from "../lib/validation/index.js";
import type { BookSide, Quote } from "../market/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { InstrumentId, VenueOrderId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { PositionInfo } from "../state/types.js";

export type QuoteError =
	| { readonly kind: "no_liquidity" }
	| { readonly kind: "transient"; readonly error: TradingError }
	| { readonly kind: "validation"; readonly error: ValidationError };

export const OrderType = {
	/** Fill-or-kill: the whole order fills immediately or nothing does. */
	FOK: "FOK",
	/** Good-till-cancelled resting limit order. */
	GTC: "GTC",
} as const;

export type OrderType = (typeof OrderType)[keyof typeof OrderType];

export interface OrderRequest {
	readonly instrument: InstrumentId;
	readonly side: BookSide;
	/** USD for FOK buys; shares for FOK sells and every GTC order. */
	readonly amount: Decimal;
	readonly limitPrice: Decimal;
	readonly type: OrderType;
}

/** Venue acknowledgment. Anything short of `success: true` is a failed order. */
export interface OrderAck {
	readonly success: boolean;
	readonly filledShares: Decimal;
	readonly averagePrice: Decimal | null;
	readonly orderId: VenueOrderId | null;
}

export interface MarketOutcome {
	readonly instrument: InstrumentId;
	readonly label: string;
}

/** One binary market of an event, with its outcome tokens. */
export interface ResolvedMarket {
	readonly eventSlug: string;
	readonly outcomes: readonly MarketOutcome[];
}

export interface VenueGateway {
	getQuote(instrument: InstrumentId): Promise<Result<Quote, QuoteError>>;
	submitOrder(order: OrderRequest): Promise<Result<OrderAck, TradingError>>;
	/** Spendable USDC. */
	getBalance(): Promise<Result<Decimal, TradingError>>;
	getPositions(): Promise<Result<PositionInfo[], TradingError>>;
	resolveMarket(eventSlug: string): Promise<Result<ResolvedMarket[], TradingError>>;
}
