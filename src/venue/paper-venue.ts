/**
 * PaperVenue — in-process venue backed by mutable order books.
 *
 * FOK orders walk the book and consume the levels they take; GTC orders
 * rest without matching. Calls can be scripted to fail, so tests and dry
 * runs exercise the engine's error paths without a network.
 */

import { buildQuote } from "../market/orderbook.js";
import type { BookLevel, InstrumentMeta, Quote } from "../market/types.js";
import { Decimal } from "../shared/decimal.js";
import { InsufficientBalanceError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { venueOrderId } from "../shared/identifiers.js";
import type { InstrumentId, VenueOrderId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { SimLedger } from "../state/sim-ledger.js";
import type { PositionInfo } from "../state/types.js";
import type {
	OrderAck,
	OrderRequest,
	QuoteError,
	ResolvedMarket,
	VenueGateway,
} from "./types.js";

export type PaperVenueMethod = keyof VenueGateway;

export interface PaperVenueConfig {
	readonly startUsdc: Decimal;
	readonly clock: Clock;
}

interface MutableLevel {
	readonly price: Decimal;
	size: Decimal;
}

interface Book {
	bids: MutableLevel[];
	asks: MutableLevel[];
}

/** Residual budget below this counts as fully spent. */
const DUST = Decimal.from("0.000000001");

const UNFILLED: Omit<OrderAck, "orderId"> = {
	success: false,
	filledShares: Decimal.zero(),
	averagePrice: null,
};

function copyLevels(levels: readonly BookLevel[]): MutableLevel[] {
	return levels.map((l) => ({ price: l.price, size: l.size }));
}

export class PaperVenue implements VenueGateway {
	private readonly clock: Clock;
	private readonly account: SimLedger;
	private readonly books = new Map<InstrumentId, Book>();
	private readonly meta = new Map<InstrumentId, InstrumentMeta>();
	private readonly markets = new Map<string, ResolvedMarket[]>();
	private readonly failures = new Map<PaperVenueMethod, TradingError[]>();
	private readonly orders: OrderRequest[] = [];
	private orderCounter = 0;

	constructor(config?: Partial<PaperVenueConfig>) {
		this.clock = config?.clock ?? SystemClock;
		this.account = new SimLedger(config?.startUsdc ?? Decimal.from(1_000));
	}

	// ── Scripting ───────────────────────────────────────────────────

	/** Replace both sides of an instrument's book. */
	setBook(instrument: InstrumentId, bids: readonly BookLevel[], asks: readonly BookLevel[]): void {
		const sorted = buildQuote(instrument, bids, asks, this.clock.now());
		this.books.set(instrument, { bids: copyLevels(sorted.bids), asks: copyLevels(sorted.asks) });
	}

	/** Register an event so `resolveMarket` can find it; outcome labels become position metadata. */
	addMarket(market: ResolvedMarket): void {
		const list = this.markets.get(market.eventSlug) ?? [];
		list.push(market);
		this.markets.set(market.eventSlug, list);
		for (const o of market.outcomes) {
			this.meta.set(o.instrument, { eventSlug: market.eventSlug, outcome: o.label });
		}
	}

	/** Seed a held position without spending balance. */
	seedPosition(instrument: InstrumentId, meta: InstrumentMeta, shares: Decimal, avgPrice: Decimal): void {
		this.meta.set(instrument, meta);
		this.account.seed([{ instrument, meta, shares, avgPrice }]);
	}

	/** The next `times` calls to `method` fail with `error`. */
	failNext(method: PaperVenueMethod, error: TradingError, times = 1): void {
		const queue = this.failures.get(method) ?? [];
		for (let i = 0; i < times; i++) queue.push(error);
		this.failures.set(method, queue);
	}

	/** Every order accepted so far, in submission order. */
	submittedOrders(): readonly OrderRequest[] {
		return [...this.orders];
	}

	// ── VenueGateway ────────────────────────────────────────────────

	async getQuote(instrument: InstrumentId): Promise<Result<Quote, QuoteError>> {
		const failure = this.takeFailure("getQuote");
		if (failure) return err({ kind: "transient", error: failure });

		const quote = this.quote(instrument);
		if (quote.bestBid === null && quote.bestAsk === null) return err({ kind: "no_liquidity" });
		return ok(quote);
	}

	async submitOrder(order: OrderRequest): Promise<Result<OrderAck, TradingError>> {
		const failure = this.takeFailure("submitOrder");
		if (failure) return err(failure);

		this.orders.push(order);
		const orderId = venueOrderId(`paper-${++this.orderCounter}`);

		if (order.type === "GTC") {
			return ok({ success: true, filledShares: Decimal.zero(), averagePrice: null, orderId });
		}
		return order.side === "buy" ? this.fillBuy(order, orderId) : this.fillSell(order, orderId);
	}

	async getBalance(): Promise<Result<Decimal, TradingError>> {
		const failure = this.takeFailure("getBalance");
		if (failure) return err(failure);
		return ok(this.account.balance());
	}

	async getPositions(): Promise<Result<PositionInfo[], TradingError>> {
		const failure = this.takeFailure("getPositions");
		if (failure) return err(failure);

		for (const [instrument] of this.meta) {
			const quote = this.quote(instrument);
			const mark = quote.bestBid ?? quote.bestAsk;
			if (mark) this.account.markPrice(instrument, mark);
		}
		return ok([...this.account.grouped().values()].flat());
	}

	async resolveMarket(eventSlug: string): Promise<Result<ResolvedMarket[], TradingError>> {
		const failure = this.takeFailure("resolveMarket");
		if (failure) return err(failure);
		return ok([...(this.markets.get(eventSlug) ?? [])]);
	}

	// ── Matching ────────────────────────────────────────────────────

	private fillBuy(order: OrderRequest, orderId: VenueOrderId): Result<OrderAck, TradingError> {
		if (this.account.balance().lt(order.amount)) {
			return err(
				new InsufficientBalanceError("Paper balance cannot cover order", {
					required: order.amount.toString(),
					available: this.account.balance().toString(),
				}),
			);
		}
		const book = this.books.get(order.instrument);
		const asks = book?.asks ?? [];
		let budget = order.amount;
		let shares = Decimal.zero();
		const takes: { level: MutableLevel; size: Decimal }[] = [];

		for (const level of asks) {
			if (budget.lte(DUST) || level.price.gt(order.limitPrice)) break;
			const size = Decimal.min(level.size, budget.div(level.price));
			takes.push({ level, size });
			shares = shares.add(size);
			budget = budget.sub(size.mul(level.price));
		}
		if (budget.gt(DUST) || !shares.isPositive()) return ok({ ...UNFILLED, orderId });

		for (const t of takes) t.level.size = t.level.size.sub(t.size);
		this.prune(book);
		const averagePrice = order.amount.div(shares);
		const spent = order.amount.sub(budget);
		this.account.applyBuy(order.instrument, this.metaFor(order.instrument), shares, averagePrice, spent);
		return ok({ success: true, filledShares: shares, averagePrice, orderId });
	}

	private fillSell(order: OrderRequest, orderId: VenueOrderId): Result<OrderAck, TradingError> {
		const held = this.account.position(order.instrument)?.shares ?? Decimal.zero();
		if (held.lt(order.amount)) return ok({ ...UNFILLED, orderId });

		const book = this.books.get(order.instrument);
		const bids = book?.bids ?? [];
		let remaining = order.amount;
		let proceeds = Decimal.zero();
		const takes: { level: MutableLevel; size: Decimal }[] = [];

		for (const level of bids) {
			if (!remaining.isPositive() || level.price.lt(order.limitPrice)) break;
			const size = Decimal.min(level.size, remaining);
			takes.push({ level, size });
			proceeds = proceeds.add(size.mul(level.price));
			remaining = remaining.sub(size);
		}
		if (remaining.isPositive() || !order.amount.isPositive()) return ok({ ...UNFILLED, orderId });

		for (const t of takes) t.level.size = t.level.size.sub(t.size);
		this.prune(book);
		const averagePrice = proceeds.div(order.amount);
		this.account.applySell(order.instrument, order.amount, averagePrice);
		return ok({ success: true, filledShares: order.amount, averagePrice, orderId });
	}

	private prune(book: Book | undefined): void {
		if (!book) return;
		book.bids = book.bids.filter((l) => l.size.isPositive());
		book.asks = book.asks.filter((l) => l.size.isPositive());
	}

	private quote(instrument: InstrumentId): Quote {
		const book = this.books.get(instrument);
		return buildQuote(instrument, book?.bids ?? [], book?.asks ?? [], this.clock.now());
	}

	private metaFor(instrument: InstrumentId): InstrumentMeta {
		return this.meta.get(instrument) ?? { eventSlug: "paper", outcome: "UNKNOWN" };
	}

	private takeFailure(method: PaperVenueMethod): TradingError | undefined {
		return this.failures.get(method)?.shift();
	}
}
