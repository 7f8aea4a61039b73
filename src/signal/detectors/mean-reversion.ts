import type { EngineConfig } from "../../shared/config.js";
import { StrategyKind } from "../../shared/config.js";
import { Decimal } from "../../shared/decimal.js";
import type { InstrumentId } from "../../shared/identifiers.js";
import { zScore } from "../statistics.js";
import type { Strategy, StrategyContext, StrategyTrigger, TradeIntent } from "../types.js";

export type MeanReversionConfig = Pick<EngineConfig, "mrLookback" | "mrEntryZ">;

const MIN_WINDOW = 3;

/**
 * Buys an instrument stretched below its recent mean and sells a held one
 * stretched above it. The stretch is the z-score of the last price against
 * the last `mrLookback` prices.
 */
export class MeanReversionStrategy implements Strategy {
	readonly kind: StrategyKind = StrategyKind.MeanReversion;
	readonly trigger: StrategyTrigger = { mode: "updates" };

	private readonly lookback: number;
	private readonly entryZ: Decimal;

	constructor(config: MeanReversionConfig) {
		this.lookback = config.mrLookback;
		this.entryZ = Decimal.from(config.mrEntryZ);
	}

	async evaluate(ctx: StrategyContext): Promise<TradeIntent[]> {
		const intents: TradeIntent[] = [];
		for (const instrument of ctx.state.instruments()) {
			const intent = this.check(instrument, ctx);
			if (intent) intents.push(intent);
		}
		return intents;
	}

	private check(instrument: InstrumentId, ctx: StrategyContext): TradeIntent | null {
		const prices = ctx.state
			.getPriceHistory(instrument)
			.slice(-this.lookback)
			.map((p) => p.price);
		const last = prices[prices.length - 1];
		if (prices.length < MIN_WINDOW || !last) return null;

		const score = zScore(last, prices);
		if (!score) return null;
		const z = score.z.toFixed(2);

		if (score.z.lte(this.entryZ.neg())) {
			if (ctx.state.isRecentlyBought(instrument, ctx.now)) {
				ctx.logger.debug({ instrument, z }, "mean reversion buy suppressed: recently bought");
				return null;
			}
			return { kind: "buy", instrument, reason: `mean reversion z=${z}` };
		}

		if (score.z.gte(this.entryZ) && ctx.state.getActiveTrade(instrument)) {
			if (ctx.state.isRecentlySold(instrument, ctx.now)) {
				ctx.logger.debug({ instrument, z }, "mean reversion sell suppressed: recently sold");
				return null;
			}
			return { kind: "sell", instrument, reason: `mean reversion z=${z}` };
		}

		return null;
	}
}
