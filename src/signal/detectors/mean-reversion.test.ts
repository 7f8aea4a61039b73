import { beforeEach, describe, expect, it } from "vitest";
import { silentLogger } from "../../lib/logger/index.js";
import { Decimal } from "../../shared/decimal.js";
import { instrumentId } from "../../shared/identifiers.js";
import { FakeClock } from "../../shared/time.js";
import { SharedState } from "../../state/shared-state.js";
import { PaperVenue } from "../../venue/paper-venue.js";
import { QuoteService } from "../../venue/quote-service.js";
import type { StrategyContext } from "../types.js";
import { MeanReversionStrategy } from "./mean-reversion.js";

const d = (v: string | number) => Decimal.from(v);
const a = instrumentId("tok-a");

describe("MeanReversionStrategy", () => {
	let clock: FakeClock;
	let state: SharedState;
	let strategy: MeanReversionStrategy;

	const ctx = (): StrategyContext => ({
		state,
		quotes: new QuoteService(
			new PaperVenue({ clock }),
			state,
			{ maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0, jitterFactor: 0 },
			silentLogger(),
		),
		now: clock.now(),
		logger: silentLogger(),
	});

	function history(...prices: string[]): void {
		prices.forEach((p, i) => state.addPrice(a, 10_000 + i * 1_000, d(p), "rain", "Yes"));
	}

	function hold(): void {
		state.addActiveTrade({
			instrument: a,
			entryPrice: d("0.5"),
			entryTimeMs: 0,
			amountUsd: d(5),
			shares: d(10),
			triggeredBySystem: true,
			reason: "test",
		});
	}

	beforeEach(() => {
		clock = new FakeClock(20_000);
		state = new SharedState({
			maxConcurrentTrades: 2,
			priceHistorySize: 20,
			quoteCacheTtlMs: 0,
			cooldownMs: 10_000,
			simStartUsdc: d(100),
			clock,
		});
		state.registerInstrument(a, { eventSlug: "rain", outcome: "Yes" });
		strategy = new MeanReversionStrategy({ mrLookback: 10, mrEntryZ: 1.5 });
	});

	it("buys a price stretched below the mean", async () => {
		history("0.5", "0.5", "0.5", "0.3");

		expect(await strategy.evaluate(ctx())).toEqual([{ kind: "buy", instrument: a, reason: "mean reversion z=-1.73" }]);
	});

	it("sells a held instrument stretched above the mean", async () => {
		history("0.5", "0.5", "0.5", "0.7");
		hold();

		expect(await strategy.evaluate(ctx())).toEqual([{ kind: "sell", instrument: a, reason: "mean reversion z=1.73" }]);
	});

	it("does not sell without an active trade", async () => {
		history("0.5", "0.5", "0.5", "0.7");

		expect(await strategy.evaluate(ctx())).toEqual([]);
	});

	it("suppresses a buy inside the recent-buy window", async () => {
		state.markBuy(a, 15_000);
		history("0.5", "0.5", "0.5", "0.3");

		expect(await strategy.evaluate(ctx())).toEqual([]);
	});

	it("suppresses a sell inside the recent-sell window", async () => {
		state.markSell(a, 15_000);
		history("0.5", "0.5", "0.5", "0.7");
		hold();

		expect(await strategy.evaluate(ctx())).toEqual([]);
	});

	it("needs three prices and a non-flat window", async () => {
		history("0.5", "0.3");
		expect(await strategy.evaluate(ctx())).toEqual([]);

		state = new SharedState({
			maxConcurrentTrades: 2,
			priceHistorySize: 20,
			quoteCacheTtlMs: 0,
			cooldownMs: 10_000,
			simStartUsdc: null,
			clock,
		});
		state.registerInstrument(a, { eventSlug: "rain", outcome: "Yes" });
		history("0.5", "0.5", "0.5");
		expect(await strategy.evaluate(ctx())).toEqual([]);
	});

	it("only looks at the last mrLookback prices", async () => {
		history("0.9", "0.5", "0.5", "0.5", "0.3");

		expect(await new MeanReversionStrategy({ mrLookback: 10, mrEntryZ: 1.5 }).evaluate(ctx())).toEqual([]);
		expect(await new MeanReversionStrategy({ mrLookback: 4, mrEntryZ: 1.5 }).evaluate(ctx())).toEqual([
			{ kind: "buy", instrument: a, reason: "mean reversion z=-1.73" },
		]);
	});
});
