export { OrderExecutor } from "./order-executor.js";
export type {
	ExecutorEvents,
	OrderExecutorConfig,
	OrderExecutorDeps,
	QuotePostedEvent,
	TradeEvent,
} from "./order-executor.js";
export { computeDelay, isRetryableOrderError, rateLimitHint, withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
