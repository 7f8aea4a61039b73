/**
 * Engine configuration.
 *
 * `DEFAULT_ENGINE_CONFIG` holds every default; `parseEngineConfig` merges
 * overrides over it and validates the result. Invalid settings are fatal:
 * they throw `ConfigError` before any worker starts.
 */

import { formatIssues, validate, z } from "../lib/validation/index.js";
import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";
import { Duration } from "./time.js";

// ── Enumerations ─────────────────────────────────────────────────────

/** How the spike detector picks its reference price. */
export const DeltaMode = {
	/** Previous tick. */
	Single: "single",
	/** First of the last N samples. */
	Samples: "samples",
	/** Oldest point within a time span of the newest. */
	Time: "time",
} as const;

export type DeltaMode = (typeof DeltaMode)[keyof typeof DeltaMode];

export const StrategyKind = {
	Spike: "spike",
	MeanReversion: "mean_reversion",
	PairArbitrage: "pair_arbitrage",
	MarketMaking: "market_making",
} as const;

export type StrategyKind = (typeof StrategyKind)[keyof typeof StrategyKind];

// ── Types ────────────────────────────────────────────────────────────

export interface RetryPolicy {
	readonly maxAttempts: number;
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	/** 0 disables jitter; 0.25 spreads delays over ±25%. */
	readonly jitterFactor: number;
}

/** Where the tracked instruments come from. */
export type WatchlistSource =
	/** Explicit `idA:idB` pair strings. */
	| { readonly kind: "pairs"; readonly pairs: readonly string[] }
	/** Event slugs resolved through the venue; `file` adds slugs from a JSON file. */
	| { readonly kind: "slugs"; readonly slugs: readonly string[]; readonly file?: string | undefined }
	/** Pairs discovered from venue-reported positions. */
	| { readonly kind: "positions"; readonly attempts: number; readonly intervalMs: number };

export interface SimPositionSeed {
	readonly asset: string;
	readonly eventSlug: string;
	readonly outcome: string;
	readonly shares: number;
	readonly avgPrice: number;
}

export interface EngineConfig {
	readonly logLevel: LogLevel;

	// Mode
	readonly simulation: boolean;
	readonly simStartUsdc: number;
	readonly simInitialPositions: readonly SimPositionSeed[];
	readonly watchlist: WatchlistSource;
	readonly strategies: readonly StrategyKind[];

	// Order sizing and preconditions
	/** USD committed per buy. */
	readonly tradeUnitUsd: number;
	readonly maxConcurrentTrades: number;
	/** Best-level price × size below this is too thin to trade. */
	readonly minLiquidityUsd: number;
	/** Max absolute price drift between the last observation and the book. */
	readonly slippageTolerance: number;
	readonly minOrderShares: number;
	/** Shares left behind when selling a position. */
	readonly keepMinShares: number;
	/** Never re-enter an instrument (or its pair) once bought. */
	readonly singleEntryPerMarket: boolean;
	readonly maxDepthLevels: number;

	// Spike detection
	readonly priceHistorySize: number;
	readonly spikeThreshold: number;
	readonly deltaMode: DeltaMode;
	readonly lookbackSamples: number;
	readonly lookbackMs: number;
	readonly dynamicThreshold: boolean;
	readonly volatilityK: number;
	readonly spreadBuffer: number;
	readonly minPrice: number;
	readonly maxPrice: number;
	readonly cooldownMs: number;
	readonly minTriggerIntervalMs: number;
	readonly priceFreshnessMs: number;

	// Exits
	readonly cashProfitUsd: number;
	readonly pctProfit: number;
	/** Loss magnitude: exit once cash PnL ≤ −cashLossUsd. */
	readonly cashLossUsd: number;
	/** Loss magnitude: exit once percent PnL ≤ −pctLoss. */
	readonly pctLoss: number;
	readonly holdingTimeLimitMs: number;
	readonly exitIntervalMs: number;

	// Strategy variants
	readonly mrLookback: number;
	readonly mrEntryZ: number;
	readonly arbEntrySum: number;
	readonly arbIntervalMs: number;
	readonly mmSpreadBps: number;
	readonly mmOrderSize: number;
	readonly mmMaxInventory: number;
	readonly mmRefreshMs: number;

	// Workers and venue I/O
	readonly priceUpdateMinIntervalMs: number;
	/** Instruments per ingest cycle, round-robin; ≤ 0 means all. */
	readonly priceUpdateBatchSize: number;
	readonly fetchConcurrency: number;
	readonly detectConcurrency: number;
	readonly exitConcurrency: number;
	readonly signalWaitMs: number;
	readonly quoteCacheTtlMs: number;
	readonly venueTimeoutMs: number;
	readonly retry: RetryPolicy;

	// Supervision and reporting
	readonly restartDelayMs: number;
	readonly maxConsecutiveFailures: number;
	readonly failureBackoffMs: number;
	readonly healthyRunMs: number;
	readonly statusIntervalMs: number;
	readonly positionsLogThrottleMs: number;
	readonly positionsSyncIntervalMs: number;
	readonly watchdogWarningMs: number;
	readonly watchdogCriticalMs: number;
}

/** Overrides accepted by `parseEngineConfig`; `retry` may be partial. */
export type EngineConfigInput = Partial<Omit<EngineConfig, "retry">> & {
	readonly retry?: Partial<RetryPolicy>;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	logLevel: "info",

	simulation: true,
	simStartUsdc: 1_000,
	simInitialPositions: [],
	watchlist: { kind: "pairs", pairs: [] },
	strategies: [StrategyKind.Spike],

	tradeUnitUsd: 10,
	maxConcurrentTrades: 3,
	minLiquidityUsd: 5,
	slippageTolerance: 0.03,
	minOrderShares: 1,
	keepMinShares: 0,
	singleEntryPerMarket: false,
	maxDepthLevels: 5,

	priceHistorySize: 120,
	spikeThreshold: 0.02,
	deltaMode: DeltaMode.Samples,
	lookbackSamples: 20,
	lookbackMs: 0,
	dynamicThreshold: true,
	volatilityK: 1.2,
	spreadBuffer: 0.005,
	minPrice: 0.2,
	maxPrice: 0.8,
	cooldownMs: Duration.seconds(10),
	minTriggerIntervalMs: Duration.seconds(15),
	priceFreshnessMs: Duration.seconds(30),

	cashProfitUsd: 3,
	pctProfit: 0.1,
	cashLossUsd: 3,
	pctLoss: 0.1,
	holdingTimeLimitMs: Duration.hours(1),
	exitIntervalMs: Duration.seconds(1),

	mrLookback: 60,
	mrEntryZ: 1.5,
	arbEntrySum: 0.995,
	arbIntervalMs: Duration.seconds(1),
	mmSpreadBps: 50,
	mmOrderSize: 10,
	mmMaxInventory: 100,
	mmRefreshMs: Duration.seconds(15),

	priceUpdateMinIntervalMs: Duration.seconds(1),
	priceUpdateBatchSize: 0,
	fetchConcurrency: 4,
	detectConcurrency: 4,
	exitConcurrency: 4,
	signalWaitMs: 200,
	quoteCacheTtlMs: Duration.seconds(1),
	venueTimeoutMs: Duration.seconds(10),
	retry: { maxAttempts: 3, baseDelayMs: 200, maxDelayMs: 5_000, jitterFactor: 0.25 },

	restartDelayMs: Duration.seconds(2),
	maxConsecutiveFailures: 5,
	failureBackoffMs: Duration.seconds(30),
	healthyRunMs: Duration.minutes(1),
	statusIntervalMs: Duration.seconds(30),
	positionsLogThrottleMs: Duration.seconds(2),
	positionsSyncIntervalMs: Duration.seconds(5),
	watchdogWarningMs: Duration.seconds(15),
	watchdogCriticalMs: Duration.seconds(30),
};

// ── Schema ───────────────────────────────────────────────────────────

const probability = z.number().min(0).max(1);
const nonNegative = z.number().min(0);
const positiveInt = z.number().int().positive();
const durationMs = z.number().int().min(0);

const retrySchema = z.object({
	maxAttempts: positiveInt,
	baseDelayMs: durationMs,
	maxDelayMs: durationMs,
	jitterFactor: z.number().min(0).max(1),
});

const watchlistSchema = z.discriminatedUnion("kind", [
	z.object({ kind: z.literal("pairs"), pairs: z.array(z.string()) }),
	z.object({
		kind: z.literal("slugs"),
		slugs: z.array(z.string()),
		file: z.string().min(1).optional(),
	}),
	z.object({ kind: z.literal("positions"), attempts: positiveInt, intervalMs: durationMs }),
]);

const simPositionSchema = z.object({
	asset: z.string().min(1),
	eventSlug: z.string(),
	outcome: z.string(),
	shares: z.number().positive(),
	avgPrice: probability,
});

const engineConfigShape = z.object({
	logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]),

	simulation: z.boolean(),
	simStartUsdc: nonNegative,
	simInitialPositions: z.array(simPositionSchema),
	watchlist: watchlistSchema,
	strategies: z.array(z.nativeEnum(StrategyKind)).min(1),

	tradeUnitUsd: z.number().positive(),
	maxConcurrentTrades: positiveInt,
	minLiquidityUsd: nonNegative,
	slippageTolerance: nonNegative,
	minOrderShares: nonNegative,
	keepMinShares: nonNegative,
	singleEntryPerMarket: z.boolean(),
	maxDepthLevels: positiveInt,

	priceHistorySize: z.number().int().min(2),
	spikeThreshold: z.number().positive(),
	deltaMode: z.nativeEnum(DeltaMode),
	lookbackSamples: z.number().int().min(2),
	lookbackMs: durationMs,
	dynamicThreshold: z.boolean(),
	volatilityK: nonNegative,
	spreadBuffer: nonNegative,
	minPrice: probability,
	maxPrice: probability,
	cooldownMs: durationMs,
	minTriggerIntervalMs: durationMs,
	priceFreshnessMs: z.number().int().positive(),

	cashProfitUsd: nonNegative,
	pctProfit: nonNegative,
	cashLossUsd: nonNegative,
	pctLoss: nonNegative,
	holdingTimeLimitMs: z.number().int().positive(),
	exitIntervalMs: z.number().int().positive(),

	mrLookback: z.number().int().min(3),
	mrEntryZ: z.number().positive(),
	arbEntrySum: z.number().positive().max(2),
	arbIntervalMs: z.number().int().positive(),
	mmSpreadBps: nonNegative,
	mmOrderSize: z.number().positive(),
	mmMaxInventory: nonNegative,
	mmRefreshMs: z.number().int().positive(),

	priceUpdateMinIntervalMs: durationMs,
	priceUpdateBatchSize: z.number().int(),
	fetchConcurrency: positiveInt,
	detectConcurrency: positiveInt,
	exitConcurrency: positiveInt,
	signalWaitMs: z.number().int().positive(),
	quoteCacheTtlMs: durationMs,
	venueTimeoutMs: z.number().int().positive(),
	retry: retrySchema,

	restartDelayMs: durationMs,
	maxConsecutiveFailures: positiveInt,
	failureBackoffMs: durationMs,
	healthyRunMs: durationMs,
	statusIntervalMs: z.number().int().positive(),
	positionsLogThrottleMs: durationMs,
	positionsSyncIntervalMs: z.number().int().positive(),
	watchdogWarningMs: z.number().int().positive(),
	watchdogCriticalMs: z.number().int().positive(),
});

const engineConfigSchema = engineConfigShape
	.refine((c) => c.minPrice < c.maxPrice, {
		message: "minPrice must be below maxPrice",
		path: ["minPrice"],
	})
	.refine((c) => c.watchdogWarningMs <= c.watchdogCriticalMs, {
		message: "watchdogWarningMs must not exceed watchdogCriticalMs",
		path: ["watchdogWarningMs"],
	});

const engineConfigInputSchema = engineConfigShape
	.omit({ retry: true })
	.partial()
	.extend({ retry: retrySchema.partial().optional() });

// ── Parsing ──────────────────────────────────────────────────────────

/**
 * Merges overrides over the defaults and validates the result.
 * @throws ConfigError listing every invalid field
 */
export function parseEngineConfig(overrides: EngineConfigInput = {}): EngineConfig {
	const merged = {
		...DEFAULT_ENGINE_CONFIG,
		...overrides,
		retry: { ...DEFAULT_ENGINE_CONFIG.retry, ...overrides.retry },
	};
	const result = validate(engineConfigSchema, merged, "engine config");
	if (!result.ok) {
		throw new ConfigError(`Invalid engine config: ${formatIssues(result.error.issues).join("; ")}`, {
			issues: formatIssues(result.error.issues),
		});
	}
	return result.value;
}

// ── Environment ──────────────────────────────────────────────────────

const ENV_PREFIX = "SPIKEBOT_";

type EnvKind = "number" | "boolean" | "list";

/** Scalar settings readable from `SPIKEBOT_<NAME>`; `NAME` is the field in upper snake case. */
const ENV_FIELDS: ReadonlyArray<readonly [keyof EngineConfig, EnvKind]> = [
	["simulation", "boolean"],
	["simStartUsdc", "number"],
	["strategies", "list"],
	["tradeUnitUsd", "number"],
	["maxConcurrentTrades", "number"],
	["minLiquidityUsd", "number"],
	["slippageTolerance", "number"],
	["minOrderShares", "number"],
	["keepMinShares", "number"],
	["singleEntryPerMarket", "boolean"],
	["maxDepthLevels", "number"],
	["priceHistorySize", "number"],
	["spikeThreshold", "number"],
	["lookbackSamples", "number"],
	["lookbackMs", "number"],
	["dynamicThreshold", "boolean"],
	["volatilityK", "number"],
	["spreadBuffer", "number"],
	["minPrice", "number"],
	["maxPrice", "number"],
	["cooldownMs", "number"],
	["minTriggerIntervalMs", "number"],
	["priceFreshnessMs", "number"],
	["cashProfitUsd", "number"],
	["pctProfit", "number"],
	["cashLossUsd", "number"],
	["pctLoss", "number"],
	["holdingTimeLimitMs", "number"],
	["mrLookback", "number"],
	["mrEntryZ", "number"],
	["arbEntrySum", "number"],
	["mmSpreadBps", "number"],
	["mmOrderSize", "number"],
	["mmMaxInventory", "number"],
	["priceUpdateMinIntervalMs", "number"],
	["fetchConcurrency", "number"],
	["venueTimeoutMs", "number"],
];

/** `tradeUnitUsd` → `TRADE_UNIT_USD` */
export function envName(field: string): string {
	return ENV_PREFIX + field.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toUpperCase();
}

function strictParseNumber(envKey: string, raw: string): number {
	const trimmed = raw.trim();
	const parsed = Number(trimmed);
	if (trimmed.length === 0 || !Number.isFinite(parsed)) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be a number`);
	}
	return parsed;
}

function parseBoolean(envKey: string, raw: string): boolean {
	const normalized = raw.trim().toLowerCase();
	if (["1", "true", "yes"].includes(normalized)) return true;
	if (["0", "false", "no"].includes(normalized)) return false;
	throw new ConfigError(`Invalid ${envKey}: "${raw}" must be true or false`);
}

function splitList(raw: string): string[] {
	return raw
		.split(",")
		.map((s) => s.trim())
		.filter((s) => s.length > 0);
}

function readWatchlist(env: NodeJS.ProcessEnv): WatchlistSource | undefined {
	const mode = env[`${ENV_PREFIX}WATCHLIST_MODE`];
	const pairs = env[`${ENV_PREFIX}WATCHLIST_PAIRS`];
	const slugs = env[`${ENV_PREFIX}WATCHLIST_SLUGS`];
	const file = env[`${ENV_PREFIX}WATCHLIST_FILE`];

	switch (mode?.trim().toLowerCase()) {
		case undefined:
		case "":
			if (pairs) return { kind: "pairs", pairs: splitList(pairs) };
			if (slugs || file) return { kind: "slugs", slugs: splitList(slugs ?? ""), file };
			return undefined;
		case "pairs":
			return { kind: "pairs", pairs: splitList(pairs ?? "") };
		case "slugs":
			return { kind: "slugs", slugs: splitList(slugs ?? ""), file };
		case "positions":
			return { kind: "positions", attempts: 60, intervalMs: Duration.seconds(2) };
		default:
			throw new ConfigError(
				`Invalid ${ENV_PREFIX}WATCHLIST_MODE: "${mode}" must be pairs, slugs or positions`,
			);
	}
}

/**
 * Reads engine settings from `SPIKEBOT_*` environment variables.
 * Unset variables are left out so defaults apply.
 * @throws ConfigError if a variable holds a malformed value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfigInput {
	const raw: Record<string, unknown> = {};

	for (const [field, kind] of ENV_FIELDS) {
		const key = envName(field);
		const value = env[key];
		if (value === undefined || value.trim().length === 0) continue;
		if (kind === "number") raw[field] = strictParseNumber(key, value);
		else if (kind === "boolean") raw[field] = parseBoolean(key, value);
		else raw[field] = splitList(value);
	}

	const level = env[`${ENV_PREFIX}LOG_LEVEL`];
	if (level) raw["logLevel"] = level.trim().toLowerCase();
	const deltaMode = env[`${ENV_PREFIX}DELTA_MODE`];
	if (deltaMode) raw["deltaMode"] = deltaMode.trim().toLowerCase();

	const watchlist = readWatchlist(env);
	if (watchlist) raw["watchlist"] = watchlist;

	const result = validate(engineConfigInputSchema, raw, "environment config");
	if (!result.ok) {
		throw new ConfigError(`Invalid environment config: ${formatIssues(result.error.issues).join("; ")}`);
	}
	return result.value;
}
