/**
 * In-memory USDC balance and positions for simulation mode.
 *
 * Buys debit the balance and average into the position; sells credit it and
 * book realized PnL. The balance never goes below zero.
 */

import type { InstrumentMeta } from "../market/types.js";
import { Decimal } from "../shared/decimal.js";
import type { InstrumentId } from "../shared/identifiers.js";
import type { GroupedPositions, PositionInfo } from "./types.js";

export interface SellFill {
	/** Shares actually removed, clamped to what was held. */
	readonly shares: Decimal;
	readonly proceeds: Decimal;
	readonly realizedPnl: Decimal;
	/** True when the position reached zero and was dropped. */
	readonly closed: boolean;
}

export interface LedgerSeed {
	readonly instrument: InstrumentId;
	readonly meta: InstrumentMeta;
	readonly shares: Decimal;
	readonly avgPrice: Decimal;
}

interface MutablePosition {
	readonly meta: InstrumentMeta;
	avgPrice: Decimal;
	shares: Decimal;
	currentPrice: Decimal;
	realizedPnl: Decimal;
}

function snapshot(asset: InstrumentId, p: MutablePosition): PositionInfo {
	const initialValue = p.avgPrice.mul(p.shares);
	const currentValue = p.currentPrice.mul(p.shares);
	const pnl = currentValue.sub(initialValue);
	return {
		eventSlug: p.meta.eventSlug,
		outcome: p.meta.outcome,
		asset,
		avgPrice: p.avgPrice,
		shares: p.shares,
		currentPrice: p.currentPrice,
		initialValue,
		currentValue,
		pnl,
		percentPnl: initialValue.isPositive() ? pnl.div(initialValue) : Decimal.zero(),
		realizedPnl: p.realizedPnl,
	};
}

export class SimLedger {
	private usdc: Decimal;
	private realized = Decimal.zero();
	private readonly positions = new Map<InstrumentId, MutablePosition>();

	constructor(startUsdc: Decimal) {
		this.usdc = Decimal.max(startUsdc, Decimal.zero());
	}

	balance(): Decimal {
		return this.usdc;
	}

	/** Cumulative realized PnL, including positions already closed. */
	realizedPnl(): Decimal {
		return this.realized;
	}

	/** `cost` defaults to shares × price; venues that walk the book pass the exact spend. */
	applyBuy(
		instrument: InstrumentId,
		meta: InstrumentMeta,
		shares: Decimal,
		price: Decimal,
		cost: Decimal = shares.mul(price),
	): void {
		if (!shares.isPositive()) return;
		this.usdc = Decimal.max(this.usdc.sub(cost), Decimal.zero());

		const existing = this.positions.get(instrument);
		if (!existing) {
			this.positions.set(instrument, {
				meta,
				avgPrice: price,
				shares,
				currentPrice: price,
				realizedPnl: Decimal.zero(),
			});
			return;
		}
		const total = existing.shares.add(shares);
		existing.avgPrice = existing.avgPrice.mul(existing.shares).add(price.mul(shares)).div(total);
		existing.shares = total;
		existing.currentPrice = price;
	}

	/** Returns null when nothing is held or `shares` is not positive. */
	applySell(instrument: InstrumentId, shares: Decimal, price: Decimal): SellFill | null {
		const pos = this.positions.get(instrument);
		if (!pos || !shares.isPositive()) return null;

		const sold = Decimal.min(shares, pos.shares);
		const proceeds = sold.mul(price);
		const realizedPnl = price.sub(pos.avgPrice).mul(sold);

		this.usdc = this.usdc.add(proceeds);
		this.realized = this.realized.add(realizedPnl);
		pos.shares = pos.shares.sub(sold);
		pos.currentPrice = price;
		pos.realizedPnl = pos.realizedPnl.add(realizedPnl);

		const closed = !pos.shares.isPositive();
		if (closed) this.positions.delete(instrument);
		return { shares: sold, proceeds, realizedPnl, closed };
	}

	/** Revalue a held position at the latest observed price. */
	markPrice(instrument: InstrumentId, price: Decimal): void {
		const pos = this.positions.get(instrument);
		if (pos) pos.currentPrice = price;
	}

	/** Load starting positions without touching the balance. */
	seed(seeds: readonly LedgerSeed[]): void {
		for (const s of seeds) {
			if (!s.shares.isPositive()) continue;
			this.positions.set(s.instrument, {
				meta: s.meta,
				avgPrice: s.avgPrice,
				shares: s.shares,
				currentPrice: s.avgPrice,
				realizedPnl: Decimal.zero(),
			});
		}
	}

	position(instrument: InstrumentId): PositionInfo | undefined {
		const pos = this.positions.get(instrument);
		return pos ? snapshot(instrument, pos) : undefined;
	}

	grouped(): GroupedPositions {
		const out = new Map<string, PositionInfo[]>();
		for (const [asset, pos] of this.positions) {
			const bucket = out.get(pos.meta.eventSlug) ?? [];
			bucket.push(snapshot(asset, pos));
			out.set(pos.meta.eventSlug, bucket);
		}
		return out;
	}
}
