/**
 * TradingEngine — the composition root.
 *
 * `create` validates the configuration and wires one SharedState into
 * every worker. `start` resolves the watchlist and hands the workers to
 * the supervisor; `stop` requests shutdown and waits for them to drain.
 *
 * @example
 * ```ts
 * const engine = TradingEngine.create({ watchlist: { kind: "pairs", pairs: ["yes-1:no-1"] } }, { gateway });
 * engine.events.on("trade", (t) => console.log(t.side, t.instrument, t.price.toString()));
 * await engine.start();
 * // ...
 * await engine.stop(10_000);
 * ```
 */

import { TypedEmitter } from "../lib/events/index.js";
import { createLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { ExitMonitor } from "../exit/exit-monitor.js";
import type { ExitEvent } from "../exit/exit-monitor.js";
import { OrderExecutor } from "../execution/order-executor.js";
import type { TradeEvent } from "../execution/order-executor.js";
import { PriceIngestor } from "../ingest/price-ingestor.js";
import { ConnectivityWatchdog } from "../lifecycle/watchdog.js";
import { WorkerSupervisor } from "../lifecycle/worker-supervisor.js";
import type {
	RestartEvent,
	StopReport,
	SupervisedTask,
	SupervisorStatus,
} from "../lifecycle/worker-supervisor.js";
import type { InstrumentMeta } from "../market/types.js";
import { StrategyKind, parseEngineConfig } from "../shared/config.js";
import type { EngineConfig, EngineConfigInput } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import type { InstrumentId } from "../shared/identifiers.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { MarketMakerStrategy } from "../signal/detectors/market-maker.js";
import { MeanReversionStrategy } from "../signal/detectors/mean-reversion.js";
import { PairArbitrageStrategy } from "../signal/detectors/pair-arbitrage.js";
import { SpikeDetector } from "../signal/detectors/spike-detector.js";
import { SignalWorker } from "../signal/signal-worker.js";
import type { Strategy } from "../signal/types.js";
import { SharedState } from "../state/shared-state.js";
import { QuoteService } from "../venue/quote-service.js";
import type { VenueGateway } from "../venue/types.js";
import { WatchlistResolver, simSeedWatchlist } from "../venue/watchlist.js";
import type { InstrumentPair, ResolvedWatchlist } from "../venue/watchlist.js";
import { PositionsSync } from "./positions-sync.js";
import { StatusReporter, positionsSnapshot } from "./status-reporter.js";
import type { PositionsSnapshot, StatusSnapshot } from "./status-reporter.js";

export type EngineEvents = {
	trade: (event: TradeEvent) => void;
	exit: (event: ExitEvent) => void;
	taskRestart: (event: RestartEvent) => void;
	status: (snapshot: StatusSnapshot) => void;
};

export interface TradingEngineDeps {
	readonly gateway: VenueGateway;
	/** Defaults to a pino logger at the configured level. */
	readonly logger?: Logger | undefined;
	readonly clock?: Clock | undefined;
}

/** Builds the strategy for one configured kind. */
export function buildStrategy(kind: StrategyKind, config: EngineConfig): Strategy {
	switch (kind) {
		case StrategyKind.Spike:
			return new SpikeDetector(config);
		case StrategyKind.MeanReversion:
			return new MeanReversionStrategy(config);
		case StrategyKind.PairArbitrage:
			return new PairArbitrageStrategy(config);
		case StrategyKind.MarketMaking:
			return new MarketMakerStrategy(config);
	}
}

export class TradingEngine {
	readonly config: EngineConfig;
	readonly state: SharedState;
	readonly quotes: QuoteService;
	readonly executor: OrderExecutor;
	readonly exitMonitor: ExitMonitor;
	readonly watchdog: ConnectivityWatchdog;
	readonly events = new TypedEmitter<EngineEvents>();

	private readonly gateway: VenueGateway;
	private readonly logger: Logger;
	private readonly supervisor: WorkerSupervisor;
	private readonly ingestor: PriceIngestor;
	private readonly signalWorkers: readonly SignalWorker[];
	private readonly reporter: StatusReporter;
	private started = false;

	private constructor(config: EngineConfig, deps: TradingEngineDeps) {
		const clock = deps.clock ?? SystemClock;
		this.config = config;
		this.gateway = deps.gateway;
		this.logger = (deps.logger ?? createLogger({ level: config.logLevel, name: "spikebot" })).child({
			mode: config.simulation ? "simulation" : "live",
		});

		this.state = new SharedState({
			maxConcurrentTrades: config.maxConcurrentTrades,
			priceHistorySize: config.priceHistorySize,
			quoteCacheTtlMs: config.quoteCacheTtlMs,
			cooldownMs: config.cooldownMs,
			simStartUsdc: config.simulation ? Decimal.from(config.simStartUsdc) : null,
			clock,
		});
		this.quotes = new QuoteService(deps.gateway, this.state, config.retry, this.logger);
		this.watchdog = new ConnectivityWatchdog(
			{ warningMs: config.watchdogWarningMs, criticalMs: config.watchdogCriticalMs },
			clock,
		);

		this.executor = new OrderExecutor({
			state: this.state,
			quotes: this.quotes,
			gateway: deps.gateway,
			config,
			logger: this.logger,
		});
		this.exitMonitor = new ExitMonitor({
			state: this.state,
			quotes: this.quotes,
			seller: this.executor,
			config,
			logger: this.logger,
		});
		this.ingestor = new PriceIngestor({
			state: this.state,
			quotes: this.quotes,
			watchdog: this.watchdog,
			config,
			logger: this.logger,
		});

		const drainTimeoutMs = config.venueTimeoutMs * config.retry.maxAttempts;
		this.signalWorkers = [...new Set(config.strategies)].map(
			(kind) =>
				new SignalWorker({
					strategy: buildStrategy(kind, config),
					state: this.state,
					quotes: this.quotes,
					sink: this.executor,
					config: {
						signalWaitMs: config.signalWaitMs,
						detectConcurrency: config.detectConcurrency,
						drainTimeoutMs,
					},
					logger: this.logger,
				}),
		);

		this.reporter = new StatusReporter({
			status: () => this.statusSnapshot(),
			positions: () => this.positionsSnapshot(),
			onStatus: (s) => this.events.emit("status", s),
			config,
			clock,
			logger: this.logger,
		});

		this.supervisor = new WorkerSupervisor({
			config,
			lifecycle: this.state,
			logger: this.logger,
			clock,
			onRestart: (e) => this.events.emit("taskRestart", e),
		});

		this.executor.events.on("trade", (t) => {
			this.reporter.positionsChanged();
			this.events.emit("trade", t);
		});
		this.exitMonitor.events.on("exit", (e) => this.events.emit("exit", e));
	}

	/**
	 * Validates `input` over the defaults and builds an engine.
	 * @throws ConfigError when the merged configuration is invalid
	 */
	static create(input: EngineConfigInput, deps: TradingEngineDeps): TradingEngine {
		return new TradingEngine(parseEngineConfig(input), deps);
	}

	get simulated(): boolean {
		return this.state.ledger !== null;
	}

	/**
	 * Resolves the watchlist, seeds simulated positions and starts every
	 * worker. Resolves once the workers are running.
	 */
	async start(): Promise<ResolvedWatchlist> {
		if (this.started) throw new Error("TradingEngine already started");
		this.started = true;

		const resolver = new WatchlistResolver({
			gateway: this.gateway,
			logger: this.logger,
			pause: (ms) => this.state.pause(ms),
		});
		const watchlist = this.seedSimulation(await resolver.resolve(this.config.watchlist));
		this.track(watchlist);

		const tasks: SupervisedTask[] = [this.ingestor, ...this.signalWorkers, this.exitMonitor];
		if (!this.simulated) {
			tasks.push(
				new PositionsSync({
					state: this.state,
					gateway: this.gateway,
					intervalMs: this.config.positionsSyncIntervalMs,
					logger: this.logger,
					onSynced: () => this.reporter.positionsChanged(),
				}),
			);
		}
		tasks.push(this.reporter);

		this.supervisor.start(tasks);
		this.logger.info(
			{
				instruments: this.state.instruments().length,
				pairs: this.state.pairs().length,
				strategies: this.signalWorkers.map((w) => w.name),
			},
			"engine started",
		);
		return watchlist;
	}

	/** Requests shutdown and waits up to `timeoutMs` for the workers to return. */
	async stop(timeoutMs: number): Promise<StopReport> {
		this.logger.info({ timeoutMs }, "engine stopping");
		const report = await this.supervisor.stop(timeoutMs);
		this.logger.info(
			{ drained: report.drained, undrained: report.undrained, activeTrades: this.state.activeTradeCount() },
			"engine stopped",
		);
		return report;
	}

	statusSnapshot(): StatusSnapshot {
		return {
			activeTasks: this.supervisor.activeTasks(),
			trackedInstruments: this.state.instruments().length,
			activeTrades: this.state.activeTradeCount(),
			simBalance: this.state.ledger?.balance() ?? null,
			watchdog: this.watchdog.snapshot(),
		};
	}

	positionsSnapshot(): PositionsSnapshot {
		return positionsSnapshot(this.state.getPositions(), this.state.ledger?.realizedPnl());
	}

	tasks(): SupervisorStatus {
		return this.supervisor.status();
	}

	// ── Startup ─────────────────────────────────────────────────────

	private seedSimulation(resolved: ResolvedWatchlist): ResolvedWatchlist {
		const seeds = this.config.simInitialPositions;
		if (seeds.length === 0) return resolved;
		if (!this.state.ledger) {
			this.logger.warn({ seeds: seeds.length }, "simulated positions ignored in live mode");
			return resolved;
		}

		const seeded = simSeedWatchlist(seeds);
		this.state.ledger.seed(seeded.ledgerSeeds);
		this.logger.info({ positions: seeded.ledgerSeeds.length }, "simulated positions seeded");

		const instruments = new Map<InstrumentId, InstrumentMeta>(resolved.instruments);
		for (const [id, meta] of seeded.instruments) {
			if (!instruments.has(id)) instruments.set(id, meta);
		}
		const pairs: InstrumentPair[] = [...resolved.pairs, ...seeded.pairs];
		return { pairs, instruments, skipped: [...resolved.skipped, ...seeded.skipped] };
	}

	private track(watchlist: ResolvedWatchlist): void {
		for (const [id, meta] of watchlist.instruments) {
			this.state.registerInstrument(id, meta);
		}
		for (const [a, b] of watchlist.pairs) {
			const linked = this.state.setPair(a, b);
			if (!linked.ok) {
				this.logger.warn({ a, b, error: linked.error.message }, "pair rejected");
			}
		}
		if (watchlist.instruments.size === 0) {
			this.logger.warn("watchlist is empty, nothing will be traded");
		}
	}
}
