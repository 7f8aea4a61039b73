/**
 * SharedState — the one container every worker reads and mutates.
 *
 * Each concern is its own store. Every accessor completes without awaiting,
 * so on the event loop a call is a critical section by itself. The only
 * primitives held across an await are the trade-slot counter and the
 * per-instrument order set; callers release both in `finally`.
 */

import { Latch, Notifier } from "../lib/concurrency/index.js";
import { Cache } from "../lib/cache/index.js";
import { ValidationError } from "../lib/validation/index.js";
import type { InstrumentMeta, Quote } from "../market/types.js";
import { Decimal } from "../shared/decimal.js";
import { idToString } from "../shared/identifiers.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { PriceRing } from "./price-ring.js";
import { SimLedger } from "./sim-ledger.js";
import type { ActiveTrade, GroupedPositions, PositionInfo, PricePoint } from "./types.js";

export interface SharedStateOptions {
	readonly maxConcurrentTrades: number;
	readonly priceHistorySize: number;
	readonly quoteCacheTtlMs: number;
	/** Window for `isRecentlyBought` / `isRecentlySold`. */
	readonly cooldownMs: number;
	/** Starting balance of the simulation ledger; null runs without one (live). */
	readonly simStartUsdc: Decimal | null;
	readonly clock?: Clock | undefined;
}

interface TradeMarks {
	lastBuyAt?: number;
	lastSellAt?: number;
}

export class SharedState {
	readonly clock: Clock;
	readonly maxConcurrentTrades: number;
	/** Present only in simulation. */
	readonly ledger: SimLedger | null;
	/** Raised by the ingestor after each cycle that wrote prices. */
	readonly updates = new Notifier();
	readonly shutdownSignal = new Latch();

	private readonly options: SharedStateOptions;
	private readonly cleanup = new Latch();

	private readonly meta = new Map<InstrumentId, InstrumentMeta>();
	private readonly history = new Map<InstrumentId, PriceRing<PricePoint>>();
	private readonly activeTrades = new Map<InstrumentId, ActiveTrade>();
	private readonly inFlight = new Set<InstrumentId>();
	private readonly pendingOpens = new Set<InstrumentId>();
	private readonly pairTable = new Map<InstrumentId, InstrumentId>();
	private readonly marks = new Map<InstrumentId, TradeMarks>();
	private readonly boughtOnce = new Set<InstrumentId>();
	private tradeClosedAt: number | undefined;
	private livePositions: GroupedPositions = new Map();
	private readonly quotes: Cache<Quote>;

	constructor(options: SharedStateOptions) {
		this.options = options;
		this.clock = options.clock ?? SystemClock;
		this.maxConcurrentTrades = options.maxConcurrentTrades;
		this.ledger = options.simStartUsdc === null ? null : new SimLedger(options.simStartUsdc);
		this.quotes = new Cache<Quote>({
			ttlMs: options.quoteCacheTtlMs,
			capacity: 4_096,
			clock: this.clock,
		});
	}

	// ── Instruments ─────────────────────────────────────────────────

	registerInstrument(id: InstrumentId, meta: InstrumentMeta): void {
		this.meta.set(id, meta);
	}

	instrumentMeta(id: InstrumentId): InstrumentMeta | undefined {
		return this.meta.get(id);
	}

	instruments(): InstrumentId[] {
		return [...this.meta.keys()];
	}

	// ── Price history ───────────────────────────────────────────────

	addPrice(id: InstrumentId, timestampMs: number, price: Decimal, eventSlug: string, outcome: string): void {
		let ring = this.history.get(id);
		if (!ring) {
			ring = new PriceRing<PricePoint>(this.options.priceHistorySize);
			this.history.set(id, ring);
		}
		ring.push({ timestampMs, price, eventSlug, outcome });
	}

	/** Oldest first; empty for instruments with no observations. */
	getPriceHistory(id: InstrumentId): readonly PricePoint[] {
		return Object.freeze(this.history.get(id)?.toArray() ?? []);
	}

	lastPrice(id: InstrumentId): Decimal | undefined {
		return this.history.get(id)?.last()?.price;
	}

	// ── Active trades ───────────────────────────────────────────────

	/**
	 * Records a fill. A second buy on the same instrument merges: shares and
	 * amount add up, the entry price becomes amount / shares and the entry
	 * time is kept. Returns the stored trade.
	 */
	addActiveTrade(trade: ActiveTrade): ActiveTrade {
		const existing = this.activeTrades.get(trade.instrument);
		if (!existing) {
			this.activeTrades.set(trade.instrument, trade);
			return trade;
		}
		const shares = existing.shares.add(trade.shares);
		const amountUsd = existing.amountUsd.add(trade.amountUsd);
		const merged: ActiveTrade = {
			...existing,
			shares,
			amountUsd,
			entryPrice: shares.isPositive() ? amountUsd.div(shares) : existing.entryPrice,
		};
		this.activeTrades.set(trade.instrument, merged);
		return merged;
	}

	/** Subtracts sold shares; removes the trade at zero. Returns what remains. */
	reduceActiveTrade(id: InstrumentId, shares: Decimal): ActiveTrade | undefined {
		const existing = this.activeTrades.get(id);
		if (!existing) return undefined;
		const remaining = existing.shares.sub(shares);
		if (!remaining.isPositive()) {
			this.activeTrades.delete(id);
			return undefined;
		}
		const reduced: ActiveTrade = {
			...existing,
			shares: remaining,
			amountUsd: existing.entryPrice.mul(remaining),
		};
		this.activeTrades.set(id, reduced);
		return reduced;
	}

	removeActiveTrade(id: InstrumentId): boolean {
		return this.activeTrades.delete(id);
	}

	getActiveTrade(id: InstrumentId): ActiveTrade | undefined {
		return this.activeTrades.get(id);
	}

	getActiveTrades(): Map<InstrumentId, ActiveTrade> {
		return new Map(this.activeTrades);
	}

	activeTradeCount(): number {
		return this.activeTrades.size;
	}

	// ── Cross-await primitives ──────────────────────────────────────

	/**
	 * Claims a trade slot for a buy on `id`. Open trades plus pending buys for
	 * instruments without a trade stay within `maxConcurrentTrades`; a buy
	 * that merges into an open trade needs no new slot.
	 */
	tryReserveTradeSlot(id: InstrumentId): boolean {
		if (this.pendingOpens.has(id)) return false;
		if (!this.activeTrades.has(id) && this.occupiedSlots() >= this.maxConcurrentTrades) return false;
		this.pendingOpens.add(id);
		return true;
	}

	/** Safe to call twice; call it after the buy committed or gave up. */
	releaseTradeSlot(id: InstrumentId): void {
		this.pendingOpens.delete(id);
	}

	/** Pending buys still holding a reservation. */
	reservedSlots(): number {
		return this.pendingOpens.size;
	}

	/** Open trades plus pending buys that would open a new one. */
	occupiedSlots(): number {
		let pending = 0;
		for (const id of this.pendingOpens) {
			if (!this.activeTrades.has(id)) pending++;
		}
		return this.activeTrades.size + pending;
	}

	tryAcquireAssetOrder(id: InstrumentId): boolean {
		if (this.inFlight.has(id)) return false;
		this.inFlight.add(id);
		return true;
	}

	releaseAssetOrder(id: InstrumentId): void {
		this.inFlight.delete(id);
	}

	// ── Pairs ───────────────────────────────────────────────────────

	/**
	 * Links two instruments as opposite outcomes. Re-registering the same pair
	 * is a no-op; a pair that conflicts with an existing one is rejected and
	 * nothing changes.
	 */
	setPair(a: InstrumentId, b: InstrumentId): Result<void, ValidationError> {
		if (a === b) {
			return err(
				new ValidationError("Invalid pair", [{ path: [idToString(a)], message: "cannot pair with itself" }]),
			);
		}
		const pairA = this.pairTable.get(a);
		const pairB = this.pairTable.get(b);
		if ((pairA !== undefined && pairA !== b) || (pairB !== undefined && pairB !== a)) {
			return err(
				new ValidationError("Invalid pair", [
					{
						path: [idToString(a), idToString(b)],
						message: `conflicts with existing pair ${pairA ?? pairB}`,
					},
				]),
			);
		}
		this.pairTable.set(a, b);
		this.pairTable.set(b, a);
		return ok(undefined);
	}

	pairOf(id: InstrumentId): InstrumentId | undefined {
		return this.pairTable.get(id);
	}

	/** Every pair once, in registration order. */
	pairs(): [InstrumentId, InstrumentId][] {
		const seen = new Set<InstrumentId>();
		const out: [InstrumentId, InstrumentId][] = [];
		for (const [a, b] of this.pairTable) {
			if (seen.has(a)) continue;
			seen.add(a);
			seen.add(b);
			out.push([a, b]);
		}
		return out;
	}

	// ── Trade marks ─────────────────────────────────────────────────

	markBuy(id: InstrumentId, nowMs: number): void {
		this.marksFor(id).lastBuyAt = nowMs;
	}

	markSell(id: InstrumentId, nowMs: number): void {
		this.marksFor(id).lastSellAt = nowMs;
	}

	lastBuyAt(id: InstrumentId): number | undefined {
		return this.marks.get(id)?.lastBuyAt;
	}

	lastSellAt(id: InstrumentId): number | undefined {
		return this.marks.get(id)?.lastSellAt;
	}

	isRecentlyBought(id: InstrumentId, nowMs: number): boolean {
		const at = this.lastBuyAt(id);
		return at !== undefined && nowMs - at < this.options.cooldownMs;
	}

	isRecentlySold(id: InstrumentId, nowMs: number): boolean {
		const at = this.lastSellAt(id);
		return at !== undefined && nowMs - at < this.options.cooldownMs;
	}

	markBoughtOnce(id: InstrumentId): void {
		this.boughtOnce.add(id);
	}

	hasBoughtOnce(id: InstrumentId): boolean {
		return this.boughtOnce.has(id);
	}

	markTradeClosed(nowMs: number): void {
		this.tradeClosedAt = nowMs;
	}

	lastTradeClosedAt(): number | undefined {
		return this.tradeClosedAt;
	}

	private marksFor(id: InstrumentId): TradeMarks {
		let m = this.marks.get(id);
		if (!m) {
			m = {};
			this.marks.set(id, m);
		}
		return m;
	}

	// ── Positions ───────────────────────────────────────────────────

	/** Live mode: swap in the latest venue snapshot. */
	replacePositions(grouped: GroupedPositions): void {
		const copy = new Map<string, readonly PositionInfo[]>();
		for (const [slug, list] of grouped) copy.set(slug, [...list]);
		this.livePositions = copy;
	}

	/** Ledger positions in simulation, the last venue snapshot otherwise. */
	getPositions(): GroupedPositions {
		if (this.ledger) return this.ledger.grouped();
		return new Map(this.livePositions);
	}

	findPosition(id: InstrumentId): PositionInfo | undefined {
		if (this.ledger) return this.ledger.position(id);
		for (const list of this.livePositions.values()) {
			const found = list.find((p) => p.asset === id);
			if (found) return found;
		}
		return undefined;
	}

	// ── Quote cache ─────────────────────────────────────────────────

	cacheQuote(quote: Quote): void {
		this.quotes.set(idToString(quote.instrument), quote);
	}

	cachedQuote(id: InstrumentId): Quote | undefined {
		return this.quotes.get(idToString(id));
	}

	// ── Shutdown ────────────────────────────────────────────────────

	requestShutdown(): void {
		this.shutdownSignal.set();
		this.updates.notify();
	}

	isShutdown(): boolean {
		return this.shutdownSignal.isSet();
	}

	/** Sleeps up to `ms`, waking early on shutdown. Resolves true once shutting down. */
	pause(ms: number): Promise<boolean> {
		return this.shutdownSignal.wait(ms);
	}

	markCleanupComplete(): void {
		this.cleanup.set();
	}

	waitForCleanup(timeoutMs: number): Promise<boolean> {
		return this.cleanup.wait(timeoutMs);
	}
}
