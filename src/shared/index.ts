export {
	type InstrumentId,
	type VenueOrderId,
	instrumentId,
	venueOrderId,
	idToString,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	isOk,
	isErr,
	tryCatchAsync,
} from "./result.js";

export {
	ErrorCategory,
	TradingError,
	NetworkError,
	TimeoutError,
	RateLimitError,
	AuthError,
	OrderRejectedError,
	InsufficientBalanceError,
	ConfigError,
	SystemError,
	type ErrorContext,
	classifyError,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export { type Clock, SystemClock, FakeClock, Duration, sleep } from "./time.js";
export {
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
	envName,
} from "./config.js";
