import type { EngineConfig } from "../../shared/config.js";
import { StrategyKind } from "../../shared/config.js";
import { Decimal } from "../../shared/decimal.js";
import type { InstrumentId } from "../../shared/identifiers.js";
import { midPrice } from "../../market/orderbook.js";
import type { Strategy, StrategyContext, StrategyTrigger, TradeIntent } from "../types.js";

export type MarketMakerConfig = Pick<EngineConfig, "mmSpreadBps" | "mmOrderSize" | "mmMaxInventory" | "mmRefreshMs">;

const PRICE_FLOOR = Decimal.from("0.001");
const PRICE_CEILING = Decimal.from("0.999");
const BPS = Decimal.from(10_000);

/**
 * Passive two-sided quoting around the mid. Quotes never improve on the
 * current best prices and stay inside the (0, 1) price range.
 */
export class MarketMakerStrategy implements Strategy {
	readonly kind: StrategyKind = StrategyKind.MarketMaking;
	readonly trigger: StrategyTrigger;

	private readonly halfSpread: Decimal;
	private readonly orderSize: Decimal;
	private readonly maxInventory: Decimal;

	constructor(config: MarketMakerConfig) {
		this.halfSpread = Decimal.from(config.mmSpreadBps).div(BPS).div(Decimal.from(2));
		this.orderSize = Decimal.from(config.mmOrderSize);
		this.maxInventory = Decimal.from(config.mmMaxInventory);
		this.trigger = { mode: "interval", intervalMs: config.mmRefreshMs };
	}

	async evaluate(ctx: StrategyContext): Promise<TradeIntent[]> {
		const intents: TradeIntent[] = [];
		for (const instrument of ctx.state.instruments()) {
			const intent = await this.check(instrument, ctx);
			if (intent) intents.push(intent);
		}
		return intents;
	}

	private async check(instrument: InstrumentId, ctx: StrategyContext): Promise<TradeIntent | null> {
		const result = await ctx.quotes.get(instrument);
		if (!result.ok) return null;
		const quote = result.value;
		const mid = midPrice(quote);
		if (mid === null || quote.bestBid === null || quote.bestAsk === null) return null;

		const held = this.heldShares(instrument, ctx);
		if (held.gt(this.maxInventory)) {
			ctx.logger.info(
				{ instrument, held: held.toString(), max: this.maxInventory.toString() },
				"inventory above limit, not quoting",
			);
			return null;
		}

		return {
			kind: "quote",
			instrument,
			bidPrice: Decimal.min(quote.bestBid, mid.sub(this.halfSpread)).clamp(PRICE_FLOOR, PRICE_CEILING),
			askPrice: Decimal.max(quote.bestAsk, mid.add(this.halfSpread)).clamp(PRICE_FLOOR, PRICE_CEILING),
			size: this.orderSize,
			reason: `market making around mid ${mid.toFixed(4)}`,
		};
	}

	private heldShares(instrument: InstrumentId, ctx: StrategyContext): Decimal {
		return (
			ctx.state.getActiveTrade(instrument)?.shares ?? ctx.state.findPosition(instrument)?.shares ?? Decimal.zero()
		);
	}
}
