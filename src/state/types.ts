import type { Decimal } from "../shared/decimal.js";
import type { InstrumentId } from "../shared/identifiers.js";

/** One observed price, stamped with the labels of its instrument. */
export interface PricePoint {
	readonly timestampMs: number;
	readonly price: Decimal;
	readonly eventSlug: string;
	readonly outcome: string;
}

/**
 * A position the engine opened and is managing. At most one per instrument;
 * repeated buys merge into it.
 */
export interface ActiveTrade {
	readonly instrument: InstrumentId;
	readonly entryPrice: Decimal;
	readonly entryTimeMs: number;
	readonly amountUsd: Decimal;
	readonly shares: Decimal;
	/** Set for trades the engine opened itself; only these are exit-managed. */
	readonly triggeredBySystem: boolean;
	readonly reason: string;
}

/** Venue-style position snapshot, also produced by the simulation ledger. */
export interface PositionInfo {
	readonly eventSlug: string;
	readonly outcome: string;
	readonly asset: InstrumentId;
	readonly avgPrice: Decimal;
	readonly shares: Decimal;
	readonly currentPrice: Decimal;
	readonly initialValue: Decimal;
	readonly currentValue: Decimal;
	readonly pnl: Decimal;
	readonly percentPnl: Decimal;
	readonly realizedPnl: Decimal;
}

/** Positions keyed by event slug. */
export type GroupedPositions = ReadonlyMap<string, readonly PositionInfo[]>;
