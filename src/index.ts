// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type InstrumentId,
	type VenueOrderId,
	instrumentId,
	venueOrderId,
	idToString,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	tryCatchAsync,
	Decimal,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	sleep,
	TradingError,
	ErrorCategory,
	NetworkError,
	TimeoutError,
	RateLimitError,
	AuthError,
	OrderRejectedError,
	InsufficientBalanceError,
	ConfigError,
	SystemError,
	classifyError,
	DeltaMode,
	StrategyKind,
	type EngineConfig,
	type EngineConfigInput,
	type RetryPolicy,
	type SimPositionSeed,
	type WatchlistSource,
	DEFAULT_ENGINE_CONFIG,
	parseEngineConfig,
	configFromEnv,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { createLogger, silentLogger, type Logger, type LogLevel } from "./lib/logger/index.js";
export { TypedEmitter } from "./lib/events/index.js";
export { ValidationError } from "./lib/validation/index.js";

// ── Market data ──────────────────────────────────────────────────────
export {
	type BookLevel,
	type BookSide,
	type InstrumentMeta,
	type Quote,
	buildQuote,
	effectivePrice,
	midPrice,
	observedPrice,
	spread,
} from "./market/index.js";

// ── State ────────────────────────────────────────────────────────────
export {
	SharedState,
	SimLedger,
	type ActiveTrade,
	type GroupedPositions,
	type PositionInfo,
	type PricePoint,
} from "./state/index.js";

// ── Venue ────────────────────────────────────────────────────────────
export {
	PaperVenue,
	QuoteService,
	VenueClient,
	WatchlistResolver,
	OrderType,
	type OrderAck,
	type OrderRequest,
	type QuoteError,
	type RawOrderRequest,
	type ResolvedMarket,
	type VenueGateway,
	type VenueProviders,
} from "./venue/index.js";

// ── Workers ──────────────────────────────────────────────────────────
export { PriceIngestor } from "./ingest/index.js";
export {
	SignalWorker,
	SpikeDetector,
	MeanReversionStrategy,
	PairArbitrageStrategy,
	MarketMakerStrategy,
	type IntentSink,
	type Strategy,
	type StrategyContext,
	type StrategyTrigger,
	type TradeIntent,
} from "./signal/index.js";
export { OrderExecutor, type TradeEvent, type QuotePostedEvent } from "./execution/index.js";
export {
	ExitMonitor,
	ExitReason,
	evaluateExit,
	type ExitDecision,
	type ExitEvent,
} from "./exit/index.js";

// ── Lifecycle ────────────────────────────────────────────────────────
export {
	ConnectivityWatchdog,
	WatchdogStatus,
	WorkerSupervisor,
	TaskState,
	type StopReport,
	type SupervisedTask,
	type SupervisorStatus,
} from "./lifecycle/index.js";

// ── Engine ───────────────────────────────────────────────────────────
export {
	TradingEngine,
	type EngineEvents,
	type PositionsSnapshot,
	type StatusSnapshot,
} from "./engine/index.js";
