import type { EngineConfig } from "../../shared/config.js";
import { DeltaMode, StrategyKind } from "../../shared/config.js";
import { Decimal } from "../../shared/decimal.js";
import type { InstrumentId } from "../../shared/identifiers.js";
import { spread } from "../../market/orderbook.js";
import type { PricePoint } from "../../state/types.js";
import { populationStdev, simpleReturns } from "../statistics.js";
import type { Strategy, StrategyContext, StrategyTrigger, TradeIntent } from "../types.js";

export type SpikeConfig = Pick<
	EngineConfig,
	| "spikeThreshold"
	| "deltaMode"
	| "lookbackSamples"
	| "lookbackMs"
	| "dynamicThreshold"
	| "volatilityK"
	| "spreadBuffer"
	| "minPrice"
	| "maxPrice"
	| "cooldownMs"
	| "minTriggerIntervalMs"
	| "priceFreshnessMs"
>;

/** The numbers behind one spike decision, kept for logging. */
export interface SpikeReading {
	readonly reference: Decimal;
	readonly last: Decimal;
	readonly delta: Decimal;
	readonly threshold: Decimal;
}

/**
 * Points the reference price is taken from. A window with fewer than two
 * points falls back to the whole history.
 */
export function spikeWindow(
	history: readonly PricePoint[],
	config: Pick<SpikeConfig, "deltaMode" | "lookbackSamples" | "lookbackMs">,
): readonly PricePoint[] {
	const newest = history[history.length - 1];
	if (!newest) return history;

	let window: readonly PricePoint[] = history;
	switch (config.deltaMode) {
		case DeltaMode.Single:
			window = history.slice(-2);
			break;
		case DeltaMode.Samples:
			window = history.slice(-Math.max(1, config.lookbackSamples));
			break;
		case DeltaMode.Time: {
			const cutoff = newest.timestampMs - config.lookbackMs;
			window = history.filter((p) => p.timestampMs >= cutoff);
			break;
		}
	}
	return window.length >= 2 ? window : history;
}

/**
 * Momentum spike detector.
 *
 * A move of the last price away from the window's reference beyond the
 * threshold buys the instrument on an up-move, or its pair on a down-move.
 * Each instrument then stays quiet for `minTriggerIntervalMs`, and a target
 * bought within `cooldownMs` is not bought again.
 */
export class SpikeDetector implements Strategy {
	readonly kind: StrategyKind = StrategyKind.Spike;
	readonly trigger: StrategyTrigger = { mode: "updates" };

	private readonly config: SpikeConfig;
	private readonly spikeThreshold: Decimal;
	private readonly volatilityK: Decimal;
	private readonly spreadBuffer: Decimal;
	private readonly minPrice: Decimal;
	private readonly maxPrice: Decimal;
	private readonly lastSignalAt = new Map<InstrumentId, number>();

	constructor(config: SpikeConfig) {
		this.config = config;
		this.spikeThreshold = Decimal.from(config.spikeThreshold);
		this.volatilityK = Decimal.from(config.volatilityK);
		this.spreadBuffer = Decimal.from(config.spreadBuffer);
		this.minPrice = Decimal.from(config.minPrice);
		this.maxPrice = Decimal.from(config.maxPrice);
	}

	async evaluate(ctx: StrategyContext): Promise<TradeIntent[]> {
		const intents: TradeIntent[] = [];
		for (const instrument of ctx.state.instruments()) {
			const intent = this.check(instrument, ctx);
			if (intent) intents.push(intent);
		}
		return intents;
	}

	/** Reads the spike state of one instrument without side effects. */
	read(instrument: InstrumentId, ctx: StrategyContext): SpikeReading | null {
		const history = ctx.state.getPriceHistory(instrument);
		const newest = history[history.length - 1];
		if (history.length < 2 || !newest) return null;
		if (ctx.now - newest.timestampMs > this.config.priceFreshnessMs) {
			ctx.logger.debug({ instrument, ageMs: ctx.now - newest.timestampMs }, "price history stale, skipping");
			return null;
		}

		const window = spikeWindow(history, this.config);
		const reference = window[0]?.price;
		const last = newest.price;
		if (!reference || !reference.isPositive() || !last.isPositive()) {
			ctx.logger.debug(
				{ instrument, reference: reference?.toString(), last: last.toString() },
				"non-positive price, no spike signal",
			);
			return null;
		}

		return {
			reference,
			last,
			delta: last.sub(reference).div(reference),
			threshold: this.threshold(instrument, window, ctx),
		};
	}

	private check(instrument: InstrumentId, ctx: StrategyContext): TradeIntent | null {
		const reading = this.read(instrument, ctx);
		if (!reading || !reading.delta.abs().gt(reading.threshold)) return null;

		const log = ctx.logger.child({
			instrument,
			delta: reading.delta.toFixed(4),
			threshold: reading.threshold.toFixed(4),
			last: reading.last.toString(),
		});

		if (reading.last.lt(this.minPrice) || reading.last.gt(this.maxPrice)) {
			log.debug("spike outside the tradable price band, skipping");
			return null;
		}

		const target = reading.delta.isPositive() ? instrument : ctx.state.pairOf(instrument);
		if (!target) {
			log.info("down-spike on an unpaired instrument, skipping");
			return null;
		}

		const boughtAt = ctx.state.lastBuyAt(target);
		if (boughtAt !== undefined && ctx.now - boughtAt < this.config.cooldownMs) {
			log.info({ target }, "spike suppressed: target in cooldown");
			return null;
		}
		const signalledAt = this.lastSignalAt.get(instrument);
		if (signalledAt !== undefined && ctx.now - signalledAt < this.config.minTriggerIntervalMs) {
			log.info({ target }, "spike suppressed: trigger interval not elapsed");
			return null;
		}

		this.lastSignalAt.set(instrument, ctx.now);
		const direction = reading.delta.isPositive() ? "up" : "down";
		log.info({ target }, `spike ${direction} detected`);
		return {
			kind: "buy",
			instrument: target,
			reason: `spike ${direction} ${reading.delta.toFixed(4)} on ${instrument}`,
		};
	}

	private threshold(instrument: InstrumentId, window: readonly PricePoint[], ctx: StrategyContext): Decimal {
		if (!this.config.dynamicThreshold) return this.spikeThreshold;

		let threshold = this.spikeThreshold;
		const volatility = populationStdev(simpleReturns(window.map((p) => p.price)));
		if (volatility) threshold = Decimal.max(threshold, this.volatilityK.mul(volatility));

		const quote = ctx.state.cachedQuote(instrument);
		const quoted = quote ? spread(quote) : null;
		if (quoted) threshold = Decimal.max(threshold, quoted.add(this.spreadBuffer));

		return threshold;
	}
}
