import type { EngineConfig } from "../../shared/config.js";
import { StrategyKind } from "../../shared/config.js";
import { Decimal } from "../../shared/decimal.js";
import type { InstrumentId } from "../../shared/identifiers.js";
import type { Quote } from "../../market/types.js";
import { describeQuoteError } from "../../venue/quote-service.js";
import type { Strategy, StrategyContext, StrategyTrigger, TradeIntent } from "../types.js";

export type PairArbitrageConfig = Pick<EngineConfig, "arbEntrySum" | "arbIntervalMs" | "maxConcurrentTrades">;

/**
 * Pair-sum arbitrage on the two outcomes of a binary market.
 *
 * Exactly one outcome pays 1, so buying both below a combined ask of
 * `arbEntrySum` locks in the difference. A held pair is sold back once the
 * combined bid beats the combined entry.
 */
export class PairArbitrageStrategy implements Strategy {
	readonly kind: StrategyKind = StrategyKind.PairArbitrage;
	readonly trigger: StrategyTrigger;

	private readonly entrySum: Decimal;
	private readonly maxConcurrentTrades: number;

	constructor(config: PairArbitrageConfig) {
		this.entrySum = Decimal.from(config.arbEntrySum);
		this.maxConcurrentTrades = config.maxConcurrentTrades;
		this.trigger = { mode: "interval", intervalMs: config.arbIntervalMs };
	}

	async evaluate(ctx: StrategyContext): Promise<TradeIntent[]> {
		const intents: TradeIntent[] = [];
		for (const [a, b] of ctx.state.pairs()) {
			const [quoteA, quoteB] = await Promise.all([this.quote(a, ctx), this.quote(b, ctx)]);
			if (!quoteA || !quoteB) continue;
			intents.push(...this.check(a, quoteA, b, quoteB, ctx));
		}
		return intents;
	}

	private check(a: InstrumentId, quoteA: Quote, b: InstrumentId, quoteB: Quote, ctx: StrategyContext): TradeIntent[] {
		const { state } = ctx;
		const tradeA = state.getActiveTrade(a);
		const tradeB = state.getActiveTrade(b);

		if (tradeA && tradeB) {
			if (quoteA.bestBid === null || quoteB.bestBid === null) return [];
			const bidSum = quoteA.bestBid.add(quoteB.bestBid);
			const entrySum = tradeA.entryPrice.add(tradeB.entryPrice);
			if (!bidSum.gt(entrySum)) return [];
			const reason = `pair exit: bids ${bidSum.toFixed(4)} > entry ${entrySum.toFixed(4)}`;
			return [
				{ kind: "sell", instrument: a, reason },
				{ kind: "sell", instrument: b, reason },
			];
		}

		const askA = quoteA.bestAsk;
		const askB = quoteB.bestAsk;
		if (!askA?.isPositive() || !askB?.isPositive()) return [];
		const askSum = askA.add(askB);
		if (!askSum.lt(this.entrySum)) return [];

		const log = ctx.logger.child({ pair: `${a}:${b}`, askSum: askSum.toFixed(4) });
		if (state.activeTradeCount() + 2 > this.maxConcurrentTrades) {
			log.info("pair entry skipped: not enough free trade slots");
			return [];
		}
		if (state.isRecentlyBought(a, ctx.now) || state.isRecentlyBought(b, ctx.now)) {
			log.debug("pair entry skipped: a side was recently bought");
			return [];
		}

		const reason = `pair entry: asks ${askSum.toFixed(4)} < ${this.entrySum.toString()}`;
		return [
			{ kind: "buy", instrument: a, reason },
			{ kind: "buy", instrument: b, reason },
		];
	}

	private async quote(instrument: InstrumentId, ctx: StrategyContext): Promise<Quote | null> {
		const result = await ctx.quotes.get(instrument);
		if (result.ok) return result.value;
		ctx.logger.debug({ instrument, error: describeQuoteError(result.error) }, "pair quote unavailable");
		return null;
	}
}
