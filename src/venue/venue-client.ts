/**
 * VenueClient — wraps the host's raw venue calls behind Result error handling.
 *
 * The host injects `VenueProviders` (HTTP or SDK calls returning untyped
 * JSON). Every response is validated, every throw is classified, and every
 * call is bounded by a timeout.
 */

import { validate } from "../lib/validation/index.js";
import { buildQuote } from "../market/orderbook.js";
import type { Quote } from "../market/types.js";
import type { Decimal } from "../shared/decimal.js";
import { TimeoutError, classifyError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { idToString, instrumentId, venueOrderId } from "../shared/identifiers.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { type Result, err, ok, tryCatchAsync } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import type { PositionInfo } from "../state/types.js";
import {
	rawBalanceSchema,
	rawEventSchema,
	rawOrderAckSchema,
	rawOrderBookSchema,
	rawPositionsSchema,
} from "./schemas.js";
import type { RawEvent, RawPosition } from "./schemas.js";
import type {
	OrderAck,
	OrderRequest,
	QuoteError,
	ResolvedMarket,
	VenueGateway,
} from "./types.js";

/** Wire shape of an order handed to the host. Decimals travel as strings. */
export interface RawOrderRequest {
	readonly tokenId: string;
	readonly side: "BUY" | "SELL";
	readonly amount: string;
	readonly price: string;
	readonly orderType: "FOK" | "GTC";
}

/**
 * Raw calls supplied by the host. Each may throw; responses are checked
 * against the schemas in `schemas.ts`.
 */
export interface VenueProviders {
	getOrderBook(tokenId: string): Promise<unknown>;
	postOrder(req: RawOrderRequest): Promise<unknown>;
	getBalance(): Promise<unknown>;
	getPositions(): Promise<unknown>;
	getEvent(slug: string): Promise<unknown>;
}

export interface VenueClientOptions {
	readonly timeoutMs: number;
	readonly clock?: Clock | undefined;
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(
			() => reject(new TimeoutError(`${operation} timed out after ${timeoutMs}ms`, { timeoutMs })),
			timeoutMs,
		);
	});
	try {
		return await Promise.race([promise, timeout]);
	} finally {
		if (timer !== undefined) clearTimeout(timer);
	}
}

function toPosition(raw: RawPosition): PositionInfo {
	return {
		eventSlug: raw.eventSlug,
		outcome: raw.outcome,
		asset: instrumentId(raw.asset),
		avgPrice: raw.avgPrice,
		shares: raw.size,
		currentPrice: raw.curPrice,
		initialValue: raw.initialValue,
		currentValue: raw.currentValue,
		pnl: raw.cashPnl,
		percentPnl: raw.percentPnl,
		realizedPnl: raw.realizedPnl,
	};
}

function toMarkets(event: RawEvent): ResolvedMarket[] {
	return event.markets.map((m) => ({
		eventSlug: event.slug,
		outcomes: m.clobTokenIds
			.filter((token) => token.trim().length > 0)
			.map((token, i) => ({
				instrument: instrumentId(token),
				label: m.outcomes?.[i] ?? (i === 0 ? "YES" : "NO"),
			})),
	}));
}

export class VenueClient implements VenueGateway {
	private readonly providers: VenueProviders;
	private readonly timeoutMs: number;
	private readonly clock: Clock;

	constructor(providers: VenueProviders, options: VenueClientOptions) {
		this.providers = providers;
		this.timeoutMs = options.timeoutMs;
		this.clock = options.clock ?? SystemClock;
	}

	async getQuote(instrument: InstrumentId): Promise<Result<Quote, QuoteError>> {
		const raw = await this.call(() => this.providers.getOrderBook(idToString(instrument)), "getOrderBook");
		if (!raw.ok) return err({ kind: "transient", error: raw.error });

		const parsed = validate(rawOrderBookSchema, raw.value, "order book");
		if (!parsed.ok) return err({ kind: "validation", error: parsed.error });

		const book = parsed.value;
		const quote = buildQuote(instrument, book.bids, book.asks, book.timestamp ?? this.clock.now());
		if (quote.bestBid === null && quote.bestAsk === null) {
			return err({ kind: "no_liquidity" });
		}
		return ok(quote);
	}

	/**
	 * Posts an order. A timeout surfaces as `TimeoutError`: the outcome is
	 * unknown and callers must not treat it as filled.
	 */
	async submitOrder(order: OrderRequest): Promise<Result<OrderAck, TradingError>> {
		const req: RawOrderRequest = {
			tokenId: idToString(order.instrument),
			side: order.side === "buy" ? "BUY" : "SELL",
			amount: order.amount.toString(),
			price: order.limitPrice.toString(),
			orderType: order.type,
		};
		const raw = await this.call(() => this.providers.postOrder(req), "postOrder");
		if (!raw.ok) return raw;

		const parsed = validate(rawOrderAckSchema, raw.value, "order acknowledgment");
		if (!parsed.ok) return parsed;

		const ack = parsed.value;
		const orderId = ack.orderID !== undefined && ack.orderID.trim().length > 0 ? venueOrderId(ack.orderID) : null;
		return ok({
			success: ack.success,
			filledShares: ack.filledShares ?? this.requestedShares(order),
			averagePrice: ack.avgPrice ?? null,
			orderId,
		});
	}

	async getBalance(): Promise<Result<Decimal, TradingError>> {
		const raw = await this.call(() => this.providers.getBalance(), "getBalance");
		if (!raw.ok) return raw;
		const parsed = validate(rawBalanceSchema, raw.value, "balance");
		return parsed.ok ? ok(parsed.value.balance) : parsed;
	}

	async getPositions(): Promise<Result<PositionInfo[], TradingError>> {
		const raw = await this.call(() => this.providers.getPositions(), "getPositions");
		if (!raw.ok) return raw;
		const parsed = validate(rawPositionsSchema, raw.value, "positions");
		return parsed.ok ? ok(parsed.value.map(toPosition)) : parsed;
	}

	async resolveMarket(eventSlug: string): Promise<Result<ResolvedMarket[], TradingError>> {
		const raw = await this.call(() => this.providers.getEvent(eventSlug), "getEvent");
		if (!raw.ok) return raw;
		const parsed = validate(rawEventSchema, raw.value, "event");
		return parsed.ok ? ok(toMarkets(parsed.value)) : parsed;
	}

	private call(fn: () => Promise<unknown>, operation: string): Promise<Result<unknown, TradingError>> {
		return tryCatchAsync(() => withTimeout(fn(), this.timeoutMs, operation), classifyError);
	}

	/** Fallback fill size when the ack omits it: shares requested. */
	private requestedShares(order: OrderRequest): Decimal {
		if (order.side === "buy" && order.type === "FOK" && order.limitPrice.isPositive()) {
			return order.amount.div(order.limitPrice);
		}
		return order.amount;
	}
}
