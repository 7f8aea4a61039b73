import { describe, expect, it } from "vitest";
import {
	DEFAULT_ENGINE_CONFIG,
	DeltaMode,
	StrategyKind,
	configFromEnv,
	envName,
	parseEngineConfig,
} from "./config.js";
import { ConfigError } from "./errors.js";

describe("EngineConfig", () => {
	describe("DEFAULT_ENGINE_CONFIG", () => {
		it("starts in simulation with the spike strategy", () => {
			expect(DEFAULT_ENGINE_CONFIG.simulation).toBe(true);
			expect(DEFAULT_ENGINE_CONFIG.strategies).toEqual([StrategyKind.Spike]);
			expect(DEFAULT_ENGINE_CONFIG.deltaMode).toBe(DeltaMode.Samples);
		});

		it("uses the documented trading band and history size", () => {
			expect(DEFAULT_ENGINE_CONFIG.minPrice).toBe(0.2);
			expect(DEFAULT_ENGINE_CONFIG.maxPrice).toBe(0.8);
			expect(DEFAULT_ENGINE_CONFIG.priceHistorySize).toBe(120);
			expect(DEFAULT_ENGINE_CONFIG.cooldownMs).toBe(10_000);
		});

		it("passes its own validation", () => {
			expect(parseEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
		});
	});

	describe("parseEngineConfig", () => {
		it("merges overrides and partial retry settings", () => {
			const config = parseEngineConfig({ spikeThreshold: 0.05, retry: { maxAttempts: 5 } });
			expect(config.spikeThreshold).toBe(0.05);
			expect(config.retry).toEqual({ ...DEFAULT_ENGINE_CONFIG.retry, maxAttempts: 5 });
		});

		it("rejects an inverted price band", () => {
			expect(() => parseEngineConfig({ minPrice: 0.9, maxPrice: 0.1 })).toThrow(
				"minPrice: minPrice must be below maxPrice",
			);
		});

		it("throws ConfigError for out-of-range values", () => {
			let caught: unknown;
			try {
				parseEngineConfig({ maxConcurrentTrades: 0 });
			} catch (e) {
				caught = e;
			}
			expect(caught).toBeInstanceOf(ConfigError);
			if (!(caught instanceof ConfigError)) return;
			expect(caught.category).toBe("fatal");
			expect(caught.message).toContain("maxConcurrentTrades");
		});

		it("rejects an empty strategy list", () => {
			expect(() => parseEngineConfig({ strategies: [] })).toThrow(ConfigError);
		});
	});

	describe("envName", () => {
		it("converts camelCase to prefixed upper snake case", () => {
			expect(envName("tradeUnitUsd")).toBe("SPIKEBOT_TRADE_UNIT_USD");
			expect(envName("mrEntryZ")).toBe("SPIKEBOT_MR_ENTRY_Z");
			expect(envName("simulation")).toBe("SPIKEBOT_SIMULATION");
		});
	});

	describe("configFromEnv", () => {
		it("returns an empty object when nothing is set", () => {
			expect(configFromEnv({})).toEqual({});
		});

		it("reads numbers, booleans and lists", () => {
			const config = configFromEnv({
				SPIKEBOT_SPIKE_THRESHOLD: "0.04",
				SPIKEBOT_SIMULATION: "false",
				SPIKEBOT_STRATEGIES: "spike, pair_arbitrage",
				SPIKEBOT_DELTA_MODE: "TIME",
			});
			expect(config).toEqual({
				spikeThreshold: 0.04,
				simulation: false,
				strategies: ["spike", "pair_arbitrage"],
				deltaMode: "time",
			});
		});

		it("builds a pair watchlist from a CSV of pair strings", () => {
			const config = configFromEnv({ SPIKEBOT_WATCHLIST_PAIRS: "a:b, c:d" });
			expect(config.watchlist).toEqual({ kind: "pairs", pairs: ["a:b", "c:d"] });
		});

		it("builds a slug watchlist with a file", () => {
			const config = configFromEnv({
				SPIKEBOT_WATCHLIST_MODE: "slugs",
				SPIKEBOT_WATCHLIST_FILE: "markets.json",
			});
			expect(config.watchlist).toEqual({ kind: "slugs", slugs: [], file: "markets.json" });
		});

		it("selects position discovery", () => {
			const config = configFromEnv({ SPIKEBOT_WATCHLIST_MODE: "positions" });
			expect(config.watchlist).toEqual({ kind: "positions", attempts: 60, intervalMs: 2_000 });
		});

		it("throws ConfigError for a malformed number", () => {
			expect(() => configFromEnv({ SPIKEBOT_TRADE_UNIT_USD: "ten" })).toThrow(
				'Invalid SPIKEBOT_TRADE_UNIT_USD: "ten" must be a number',
			);
		});

		it("throws ConfigError for a malformed boolean", () => {
			expect(() => configFromEnv({ SPIKEBOT_SIMULATION: "maybe" })).toThrow(ConfigError);
		});

		it("throws ConfigError for an unknown strategy", () => {
			expect(() => configFromEnv({ SPIKEBOT_STRATEGIES: "spike,martingale" })).toThrow(
				ConfigError,
			);
		});

		it("throws ConfigError for an unknown watchlist mode", () => {
			expect(() => configFromEnv({ SPIKEBOT_WATCHLIST_MODE: "everything" })).toThrow(
				"must be pairs, slugs or positions",
			);
		});
	});
});
