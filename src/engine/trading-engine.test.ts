import { afterEach, describe, expect, it, vi } from "vitest";
import type { ExitEvent } from "../exit/exit-monitor.js";
import type { TradeEvent } from "../execution/order-executor.js";
import { silentLogger } from "../lib/logger/index.js";
import type { BookLevel } from "../market/types.js";
import { DeltaMode, StrategyKind } from "../shared/config.js";
import type { EngineConfigInput } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigError } from "../shared/errors.js";
import { instrumentId } from "../shared/identifiers.js";
import { PaperVenue } from "../venue/paper-venue.js";
import type { StatusSnapshot } from "./status-reporter.js";
import { TradingEngine } from "./trading-engine.js";

const d = (v: string | number) => Decimal.from(v);
const lvl = (price: string, size: number): BookLevel => ({ price: d(price), size: d(size) });
const yes = instrumentId("yes-1");
const no = instrumentId("no-1");

const BASE: EngineConfigInput = {
	logLevel: "silent",
	simStartUsdc: 100,
	watchlist: { kind: "pairs", pairs: ["yes-1:no-1"] },
	strategies: [StrategyKind.Spike],
	dynamicThreshold: false,
	spikeThreshold: 0.02,
	deltaMode: DeltaMode.Samples,
	lookbackSamples: 3,
	minLiquidityUsd: 1,
	quoteCacheTtlMs: 0,
	priceUpdateMinIntervalMs: 5,
	signalWaitMs: 10,
	exitIntervalMs: 5,
	retry: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 },
};

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("TradingEngine", () => {
	let venue: PaperVenue;
	let engine: TradingEngine | undefined;
	let trades: TradeEvent[];
	let exits: ExitEvent[];

	function build(overrides: EngineConfigInput = {}): TradingEngine {
		venue = new PaperVenue({ startUsdc: d(100) });
		const e = TradingEngine.create({ ...BASE, ...overrides }, { gateway: venue, logger: silentLogger() });
		trades = [];
		exits = [];
		e.events.on("trade", (t) => trades.push(t));
		e.events.on("exit", (x) => exits.push(x));
		engine = e;
		return e;
	}

	afterEach(async () => {
		await engine?.stop(2_000);
		engine = undefined;
	});

	describe("create", () => {
		it("rejects an invalid configuration", () => {
			expect(() =>
				TradingEngine.create({ minPrice: 0.9, maxPrice: 0.5 }, { gateway: new PaperVenue() }),
			).toThrow(ConfigError);
		});

		it("keeps a ledger only in simulation", () => {
			expect(build().simulated).toBe(true);
			expect(build({ simulation: false }).simulated).toBe(false);
		});
	});

	describe("start", () => {
		it("registers the watchlist and its pairs", async () => {
			const e = build({ watchlist: { kind: "pairs", pairs: ["a:b", "a:c", "bad"] } });

			const watchlist = await e.start();

			expect(watchlist.skipped).toEqual(['malformed pair "bad"']);
			expect(e.state.instruments()).toHaveLength(3);
			expect(e.state.pairOf(instrumentId("a"))).toBe(instrumentId("b"));
			expect(e.state.pairOf(instrumentId("c"))).toBeUndefined();
		});

		it("runs the simulation workers", async () => {
			const e = build({ strategies: [StrategyKind.Spike, StrategyKind.PairArbitrage] });
			await e.start();

			expect(e.tasks().tasks.map((t) => t.name)).toEqual([
				"price-ingestor",
				"signal:spike",
				"signal:pair_arbitrage",
				"exit-monitor",
				"status-reporter",
			]);
		});

		it("adds positions sync in live mode", async () => {
			const e = build({ simulation: false });
			await e.start();

			expect(e.tasks().tasks.map((t) => t.name)).toContain("positions-sync");
			expect(e.statusSnapshot().simBalance).toBeNull();
		});

		it("refuses to start twice", async () => {
			const e = build();
			await e.start();
			await expect(e.start()).rejects.toThrow("TradingEngine already started");
		});

		it("seeds simulated positions into the ledger", async () => {
			const e = build({
				watchlist: { kind: "pairs", pairs: [] },
				simInitialPositions: [{ asset: "held-1", eventSlug: "rain", outcome: "Yes", shares: 10, avgPrice: 0.3 }],
			});
			await e.start();

			expect(e.state.instruments()).toEqual([instrumentId("held-1")]);
			expect(e.state.findPosition(instrumentId("held-1"))?.shares.toString()).toBe("10");
			expect(e.statusSnapshot().simBalance?.toString()).toBe("100");
		});
	});

	describe("reporting", () => {
		it("emits a status snapshot once running", async () => {
			const e = build();
			const statuses: StatusSnapshot[] = [];
			e.events.on("status", (s) => statuses.push(s));
			await e.start();

			await vi.waitFor(() => expect(statuses.length).toBeGreaterThan(0));
			expect(statuses[0]?.trackedInstruments).toBe(2);
			expect(statuses[0]?.activeTrades).toBe(0);
			expect(statuses[0]?.simBalance?.toString()).toBe("100");
		});
	});

	describe("stop", () => {
		it("drains every worker", async () => {
			const e = build();
			await e.start();
			await sleep(20);

			const report = await e.stop(2_000);

			expect(report).toEqual({ drained: true, undrained: [] });
			expect(e.statusSnapshot().activeTasks).toBe(0);
			expect(e.state.isShutdown()).toBe(true);
		});
	});

	describe("scenarios", () => {
		it("buys an up-spike inside the price band", async () => {
			const e = build();
			venue.setBook(yes, [lvl("0.39", 100)], [lvl("0.41", 100)]);
			venue.setBook(no, [lvl("0.59", 100)], [lvl("0.61", 100)]);
			await e.start();
			await vi.waitFor(() => expect(e.state.lastPrice(yes)?.toString()).toBe("0.4"));

			venue.setBook(yes, [lvl("0.44", 100)], [lvl("0.46", 100)]);
			await vi.waitFor(() => expect(trades).toHaveLength(1));

			expect(trades[0]).toMatchObject({ side: "buy", instrument: yes, simulated: true });
			expect(trades[0]?.shares.toString()).toBe("21.73");
			expect(trades[0]?.price.toString()).toBe("0.46");
			expect(trades[0]?.reason).toBe("spike up 0.1250 on yes-1");
			expect(e.state.getActiveTrade(yes)?.shares.toString()).toBe("21.73");
			expect(e.state.ledger?.balance().toString()).toBe("90.0042");
		});

		it("ignores a spike above the price band", async () => {
			const e = build();
			venue.setBook(yes, [lvl("0.39", 100)], [lvl("0.41", 100)]);
			await e.start();
			await vi.waitFor(() => expect(e.state.lastPrice(yes)?.toString()).toBe("0.4"));

			venue.setBook(yes, [lvl("0.84", 100)], [lvl("0.86", 100)]);
			await vi.waitFor(() => expect(e.state.lastPrice(yes)?.toString()).toBe("0.85"));
			await sleep(50);

			expect(trades).toEqual([]);
			expect(e.state.activeTradeCount()).toBe(0);
		});

		it("takes profit once the cash target is met", async () => {
			const e = build({
				watchlist: { kind: "pairs", pairs: [] },
				cashProfitUsd: 5,
				simInitialPositions: [{ asset: "yes-1", eventSlug: "rain", outcome: "Yes", shares: 100, avgPrice: 0.4 }],
			});
			venue.setBook(yes, [lvl("0.50", 200)], [lvl("0.52", 200)]);
			await e.start();
			e.state.addActiveTrade({
				instrument: yes,
				entryPrice: d("0.40"),
				entryTimeMs: e.state.clock.now(),
				amountUsd: d(40),
				shares: d(100),
				triggeredBySystem: true,
				reason: "spike up",
			});

			await vi.waitFor(() => expect(exits).toHaveLength(1));

			expect(exits[0]?.decision.reason).toBe("take profit");
			expect(exits[0]?.decision.cashPnl.toString()).toBe("10");
			expect(exits[0]?.sold).toBe(true);
			expect(e.state.getActiveTrade(yes)).toBeUndefined();
			expect(e.state.ledger?.balance().toString()).toBe("150");
			expect(e.positionsSnapshot().realizedPnl.toString()).toBe("10");
			expect(e.positionsSnapshot().lines).toEqual([]);
		});

		it("lets only one of two simultaneous buys through", async () => {
			const e = build();
			venue.setBook(yes, [lvl("0.39", 100)], [lvl("0.41", 100)]);

			const results = await Promise.all([
				e.executor.dispatch({ kind: "buy", instrument: yes, reason: "worker one" }),
				e.executor.dispatch({ kind: "buy", instrument: yes, reason: "worker two" }),
			]);

			expect(results).toEqual([true, false]);
			expect(trades).toHaveLength(1);
			expect(trades[0]?.reason).toBe("worker one");
			expect(e.state.getActiveTrade(yes)?.shares.toString()).toBe("24.39");
			expect(e.state.reservedSlots()).toBe(0);
		});
	});
});
