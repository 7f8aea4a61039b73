/**
 * OrderExecutor — turns intents into venue orders (or ledger fills in
 * simulation) under the engine's concurrency guards.
 *
 * A buy holds a trade slot and the instrument's order lock from the first
 * venue call until its commit; a sell or quote holds only the lock. Every
 * path releases what it acquired in `finally`.
 */

import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { depthSize, effectivePrice, topOfBookNotional } from "../market/orderbook.js";
import type { BookSide, Quote } from "../market/types.js";
import type { EngineConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { TimeoutError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import type { InstrumentId, VenueOrderId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { IntentSink, TradeIntent } from "../signal/types.js";
import type { SharedState } from "../state/shared-state.js";
import { OrderType } from "../venue/types.js";
import type { OrderAck, OrderRequest, VenueGateway } from "../venue/types.js";
import { describeQuoteError } from "../venue/quote-service.js";
import type { QuoteService } from "../venue/quote-service.js";
import { isRetryableOrderError, rateLimitHint, withRetry } from "./retry.js";

export type OrderExecutorConfig = Pick<
	EngineConfig,
	| "maxConcurrentTrades"
	| "singleEntryPerMarket"
	| "minLiquidityUsd"
	| "slippageTolerance"
	| "tradeUnitUsd"
	| "minOrderShares"
	| "keepMinShares"
	| "maxDepthLevels"
	| "retry"
>;

export interface OrderExecutorDeps {
	readonly state: SharedState;
	readonly quotes: QuoteService;
	readonly gateway: VenueGateway;
	readonly config: OrderExecutorConfig;
	readonly logger: Logger;
}

// ── Events ──────────────────────────────────────────────────────────

export interface TradeEvent {
	readonly side: BookSide;
	readonly instrument: InstrumentId;
	readonly shares: Decimal;
	readonly price: Decimal;
	readonly reason: string;
	readonly simulated: boolean;
	readonly timestampMs: number;
	readonly orderId: VenueOrderId | null;
	/** Sells of an active trade only. */
	readonly realizedPnl: Decimal | null;
}

export interface QuotePostedEvent {
	readonly instrument: InstrumentId;
	readonly bidPrice: Decimal;
	readonly askPrice: Decimal;
	readonly size: Decimal;
	readonly simulated: boolean;
}

export type ExecutorEvents = {
	trade: (event: TradeEvent) => void;
	quotePosted: (event: QuotePostedEvent) => void;
};

interface Fill {
	readonly shares: Decimal;
	readonly price: Decimal;
	readonly orderId: VenueOrderId | null;
}

export class OrderExecutor implements IntentSink {
	readonly events = new TypedEmitter<ExecutorEvents>();

	private readonly state: SharedState;
	private readonly quotes: QuoteService;
	private readonly gateway: VenueGateway;
	private readonly config: OrderExecutorConfig;
	private readonly logger: Logger;
	private readonly minLiquidityUsd: Decimal;
	private readonly slippageTolerance: Decimal;
	private readonly tradeUnitUsd: Decimal;
	private readonly minOrderShares: Decimal;
	private readonly keepMinShares: Decimal;

	constructor(deps: OrderExecutorDeps) {
		this.state = deps.state;
		this.quotes = deps.quotes;
		this.gateway = deps.gateway;
		this.config = deps.config;
		this.logger = deps.logger.child({ component: "order-executor" });
		this.minLiquidityUsd = Decimal.from(deps.config.minLiquidityUsd);
		this.slippageTolerance = Decimal.from(deps.config.slippageTolerance);
		this.tradeUnitUsd = Decimal.from(deps.config.tradeUnitUsd);
		this.minOrderShares = Decimal.from(deps.config.minOrderShares);
		this.keepMinShares = Decimal.from(deps.config.keepMinShares);
	}

	get simulated(): boolean {
		return this.state.ledger !== null;
	}

	dispatch(intent: TradeIntent): Promise<boolean> {
		switch (intent.kind) {
			case "buy":
				return this.placeBuy(intent.instrument, intent.reason);
			case "sell":
				return this.placeSell(intent.instrument, intent.reason);
			case "quote":
				return this.placeQuote(intent);
		}
	}

	// ── Buy ─────────────────────────────────────────────────────────

	async placeBuy(instrument: InstrumentId, reason: string): Promise<boolean> {
		const log = this.logger.child({ side: "buy", instrument, reason });
		const { state } = this;

		if (state.isShutdown()) {
			log.debug("shutting down, buy skipped");
			return false;
		}
		if (state.activeTradeCount() >= this.config.maxConcurrentTrades && !state.getActiveTrade(instrument)) {
			log.info({ active: state.activeTradeCount() }, "max concurrent trades reached, buy skipped");
			return false;
		}
		if (!state.tryReserveTradeSlot(instrument)) {
			log.info("no free trade slot, buy skipped");
			return false;
		}
		if (!state.tryAcquireAssetOrder(instrument)) {
			state.releaseTradeSlot(instrument);
			log.debug("order already in flight for instrument, buy skipped");
			return false;
		}

		try {
			return await this.buyHoldingLocks(instrument, reason, log);
		} finally {
			state.releaseAssetOrder(instrument);
			state.releaseTradeSlot(instrument);
		}
	}

	private async buyHoldingLocks(instrument: InstrumentId, reason: string, log: Logger): Promise<boolean> {
		const { state } = this;

		if (this.config.singleEntryPerMarket) {
			const pair = state.pairOf(instrument);
			if (state.hasBoughtOnce(instrument) || (pair !== undefined && state.hasBoughtOnce(pair))) {
				log.info("market already entered once, buy skipped");
				return false;
			}
		}

		const quote = await this.freshQuote(instrument, log);
		if (!quote) return false;
		const ask = quote.bestAsk;
		const top = quote.asks[0];
		if (ask === null || !top) {
			log.info("no ask, buy skipped");
			return false;
		}
		const liquidity = topOfBookNotional(quote, "buy");
		if (liquidity.lt(this.minLiquidityUsd)) {
			log.info({ liquidityUsd: liquidity.toFixed(2) }, "ask too thin, buy skipped");
			return false;
		}
		const last = state.lastPrice(instrument);
		if (last && ask.sub(last).gt(this.slippageTolerance)) {
			log.info({ ask: ask.toString(), last: last.toString() }, "ask slipped past tolerance, buy skipped");
			return false;
		}

		const capital = await this.availableCapital(log);
		if (capital === null) return false;

		const shares = Decimal.min(top.size, Decimal.min(this.tradeUnitUsd.div(ask), capital.div(ask))).roundDown(2);
		if (!shares.isPositive() || shares.lt(this.minOrderShares)) {
			log.info(
				{ shares: shares.toString(), capital: capital.toFixed(2) },
				"order size below minimum, buy skipped",
			);
			return false;
		}

		const fill = this.simulated
			? { shares, price: ask, orderId: null }
			: await this.submit(
					{ instrument, side: "buy", amount: shares.mul(ask), limitPrice: ask, type: OrderType.FOK },
					shares,
					log,
				);
		if (!fill) return false;

		if (state.isShutdown()) {
			log.warn({ shares: fill.shares.toString() }, "shutdown during buy, fill discarded");
			return false;
		}

		const now = state.clock.now();
		if (state.ledger) {
			const meta = state.instrumentMeta(instrument) ?? { eventSlug: "", outcome: "" };
			state.ledger.applyBuy(instrument, meta, fill.shares, fill.price);
		}
		state.addActiveTrade({
			instrument,
			entryPrice: fill.price,
			entryTimeMs: now,
			amountUsd: fill.shares.mul(fill.price),
			shares: fill.shares,
			triggeredBySystem: true,
			reason,
		});
		state.markBuy(instrument, now);
		state.markBoughtOnce(instrument);

		log.info(
			{ shares: fill.shares.toString(), price: fill.price.toString(), simulated: this.simulated },
			"buy filled",
		);
		this.events.emit("trade", {
			side: "buy",
			instrument,
			shares: fill.shares,
			price: fill.price,
			reason,
			simulated: this.simulated,
			timestampMs: now,
			orderId: fill.orderId,
			realizedPnl: null,
		});
		return true;
	}

	// ── Sell ────────────────────────────────────────────────────────

	async placeSell(instrument: InstrumentId, reason: string): Promise<boolean> {
		const log = this.logger.child({ side: "sell", instrument, reason });
		if (!this.state.tryAcquireAssetOrder(instrument)) {
			log.debug("order already in flight for instrument, sell skipped");
			return false;
		}
		try {
			return await this.sellHoldingLock(instrument, reason, log);
		} finally {
			this.state.releaseAssetOrder(instrument);
		}
	}

	private async sellHoldingLock(instrument: InstrumentId, reason: string, log: Logger): Promise<boolean> {
		const { state } = this;
		const trade = state.getActiveTrade(instrument);
		const held = trade?.shares ?? state.findPosition(instrument)?.shares ?? Decimal.zero();
		const sellable = held.sub(this.keepMinShares);
		if (!sellable.isPositive()) {
			log.info({ held: held.toString() }, "nothing to sell");
			return false;
		}

		const quote = await this.freshQuote(instrument, log);
		if (!quote) return false;
		const bid = quote.bestBid;
		if (bid === null) {
			log.info("no bids, sell skipped");
			return false;
		}
		const liquidity = topOfBookNotional(quote, "sell");
		if (liquidity.lt(this.minLiquidityUsd)) {
			log.info({ liquidityUsd: liquidity.toFixed(2) }, "bid too thin, sell skipped");
			return false;
		}
		const last = state.lastPrice(instrument);
		if (last && last.sub(bid).gt(this.slippageTolerance)) {
			log.info({ bid: bid.toString(), last: last.toString() }, "bid slipped past tolerance, sell skipped");
			return false;
		}

		const size = Decimal.min(sellable, depthSize(quote.bids, this.config.maxDepthLevels)).roundDown(2);
		if (!size.isPositive() || size.lt(this.minOrderShares)) {
			log.info({ size: size.toString() }, "sell size below minimum, skipped");
			return false;
		}
		const price = effectivePrice(quote, size, "sell") ?? bid;

		const fill = this.simulated
			? { shares: size, price, orderId: null }
			: await this.submit(
					{ instrument, side: "sell", amount: size, limitPrice: price, type: OrderType.FOK },
					size,
					log,
				);
		if (!fill) return false;

		const now = state.clock.now();
		let sold = fill.shares;
		if (state.ledger) {
			const booked = state.ledger.applySell(instrument, fill.shares, fill.price);
			if (booked) sold = booked.shares;
		}
		const realizedPnl = trade ? fill.price.sub(trade.entryPrice).mul(sold) : null;
		const remaining = state.reduceActiveTrade(instrument, sold);
		state.markSell(instrument, now);
		if (trade && !remaining) state.markTradeClosed(now);

		log.info(
			{
				shares: sold.toString(),
				price: fill.price.toString(),
				remaining: remaining?.shares.toString() ?? "0",
				simulated: this.simulated,
			},
			"sell filled",
		);
		this.events.emit("trade", {
			side: "sell",
			instrument,
			shares: sold,
			price: fill.price,
			reason,
			simulated: this.simulated,
			timestampMs: now,
			orderId: fill.orderId,
			realizedPnl,
		});
		return true;
	}

	// ── Quote (market making) ───────────────────────────────────────

	async placeQuote(intent: Extract<TradeIntent, { kind: "quote" }>): Promise<boolean> {
		const { instrument } = intent;
		const log = this.logger.child({ side: "quote", instrument, reason: intent.reason });
		if (this.state.isShutdown()) {
			log.debug("shutting down, quote skipped");
			return false;
		}
		if (!this.state.tryAcquireAssetOrder(instrument)) {
			log.debug("order already in flight for instrument, quote skipped");
			return false;
		}

		try {
			const prices = {
				bid: intent.bidPrice.toString(),
				ask: intent.askPrice.toString(),
				size: intent.size.toString(),
			};
			if (this.simulated) {
				log.info(prices, "simulated quote");
			} else {
				const resting = (side: BookSide, limitPrice: Decimal): OrderRequest => ({
					instrument,
					side,
					amount: intent.size,
					limitPrice,
					type: OrderType.GTC,
				});
				const [bid, ask] = await Promise.all([
					this.post(resting("buy", intent.bidPrice)),
					this.post(resting("sell", intent.askPrice)),
				]);
				const failed = [bid, ask].filter((r) => !r.ok || !r.value.success).length;
				if (failed > 0) {
					log.warn({ ...prices, failed }, "quote only partly posted");
					return false;
				}
				log.info(prices, "quote posted");
			}
			this.events.emit("quotePosted", {
				instrument,
				bidPrice: intent.bidPrice,
				askPrice: intent.askPrice,
				size: intent.size,
				simulated: this.simulated,
			});
			return true;
		} finally {
			this.state.releaseAssetOrder(instrument);
		}
	}

	// ── Venue helpers ───────────────────────────────────────────────

	private async freshQuote(instrument: InstrumentId, log: Logger): Promise<Quote | null> {
		const result = await this.quotes.get(instrument, { fresh: true });
		if (result.ok) return result.value;
		log.info({ error: describeQuoteError(result.error) }, "no usable quote, order skipped");
		return null;
	}

	private async availableCapital(log: Logger): Promise<Decimal | null> {
		if (this.state.ledger) return this.state.ledger.balance();
		const result = await withRetry(() => this.gateway.getBalance(), {
			policy: this.config.retry,
			shouldRetry: (e) => isRetryableOrderError(e) && !this.state.isShutdown(),
			retryAfterMs: rateLimitHint,
			sleep: async (ms) => {
				await this.state.pause(ms);
			},
		});
		if (result.ok) return result.value;
		log.warn({ error: result.error.message }, "balance unavailable, buy skipped");
		return null;
	}

	private post(order: OrderRequest): Promise<Result<OrderAck, TradingError>> {
		return withRetry(() => this.gateway.submitOrder(order), {
			policy: this.config.retry,
			shouldRetry: isRetryableOrderError,
			retryAfterMs: rateLimitHint,
			sleep: async (ms) => {
				await this.state.pause(ms);
			},
			onRetry: (e, attempt, delayMs) => {
				this.logger.warn(
					{
						instrument: order.instrument,
						side: order.side,
						attempt,
						delayMs: Math.round(delayMs),
						error: e.message,
					},
					"order submission failed, retrying",
				);
			},
		});
	}

	/** Submits a fill-or-kill order; null unless the venue explicitly acknowledged a fill. */
	private async submit(order: OrderRequest, requestedShares: Decimal, log: Logger): Promise<Fill | null> {
		const result = await this.post(order);
		if (!result.ok) {
			if (result.error instanceof TimeoutError) {
				log.warn({ error: result.error.message }, "order outcome unknown after timeout, treated as not filled");
			} else {
				log.warn({ error: result.error.message, code: result.error.code }, "order failed");
			}
			return null;
		}
		const ack = result.value;
		if (!ack.success) {
			log.warn({ orderId: ack.orderId }, "order not acknowledged as filled");
			return null;
		}
		return {
			shares: ack.filledShares.isPositive() ? ack.filledShares : requestedShares,
			price: ack.averagePrice ?? order.limitPrice,
			orderId: ack.orderId,
		};
	}
}
