/**
 * TradingError hierarchy.
 *
 * The category decides what the engine does with a failed venue call:
 * retry it, skip the operation, or abort startup.
 */

export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Structured context attached to an error; `cause` is lifted onto `Error.cause`. */
export type ErrorContext = Record<string, unknown> & { readonly cause?: unknown };

export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(message: string, code: string, category: ErrorCategory, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}
}

// ── Retryable ────────────────────────────────────────────────────────

export class NetworkError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, context);
		this.name = "NetworkError";
	}
}

/**
 * A venue call that did not answer in time. Quote reads retry it; order
 * submission treats it as "outcome unknown" and never retries.
 */
export class TimeoutError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, context);
		this.name = "TimeoutError";
	}
}

export class RateLimitError extends TradingError {
	/** Minimum wait the venue asked for. */
	readonly retryAfterMs: number;

	constructor(message: string, retryAfterMs: number, context: ErrorContext = {}) {
		super(message, "RATE_LIMIT_ERROR", ErrorCategory.Retryable, context);
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
	}
}

// ── Non-retryable ────────────────────────────────────────────────────

export class AuthError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "AUTH_ERROR", ErrorCategory.NonRetryable, context);
		this.name = "AuthError";
	}
}

/** The venue refused the order, or answered without a success flag. */
export class OrderRejectedError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "ORDER_REJECTED", ErrorCategory.NonRetryable, context);
		this.name = "OrderRejectedError";
	}
}

export class InsufficientBalanceError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INSUFFICIENT_BALANCE", ErrorCategory.NonRetryable, context);
		this.name = "InsufficientBalanceError";
	}
}

// ── Fatal ────────────────────────────────────────────────────────────

/** Invalid engine settings or watchlist input. Thrown before any worker starts. */
export class ConfigError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

export class SystemError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, context);
		this.name = "SystemError";
	}
}

// ── Classification ───────────────────────────────────────────────────

const DEFAULT_RETRY_AFTER_MS = 1_000;

function field(value: unknown, key: string): unknown {
	if (typeof value !== "object" || value === null || !(key in value)) return undefined;
	return Object.getOwnPropertyDescriptor(value, key)?.value;
}

/** HTTP status from `status`, `context.status` or `response.status`, on the error or its cause. */
function httpStatus(error: Error): number | undefined {
	for (const source of [error, error.cause]) {
		for (const candidate of [
			field(source, "status"),
			field(field(source, "context"), "status"),
			field(field(source, "response"), "status"),
		]) {
			if (typeof candidate === "number" && candidate >= 400) return candidate;
		}
	}
	return undefined;
}

/** `Retry-After` in seconds, when the provider passed one along. */
function retryAfter(error: Error): number {
	const raw = field(error, "retryAfter") ?? field(field(error, "context"), "retryAfter");
	const seconds = typeof raw === "string" ? Number(raw) : raw;
	return typeof seconds === "number" && Number.isFinite(seconds) && seconds > 0
		? seconds * 1_000
		: DEFAULT_RETRY_AFTER_MS;
}

function errorCode(error: Error): string | undefined {
	const code = field(error, "code");
	if (typeof code === "string") return code;
	if (typeof code === "number") return String(code);
	return undefined;
}

/**
 * Maps whatever a venue provider threw onto the hierarchy, by HTTP status
 * first, then Node error code, then message text. Unknown failures are
 * `SystemError`.
 */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (!(error instanceof Error)) return new SystemError(String(error), { cause: error });

	const status = httpStatus(error);
	const code = errorCode(error);
	const msg = error.message.toLowerCase();
	const ctx = { cause: error, ...(status !== undefined && { status }) };

	if (status === 429 || msg.includes("rate limit") || msg.includes("too many requests")) {
		return new RateLimitError(error.message, retryAfter(error), ctx);
	}
	if (status === 401 || status === 403) return new AuthError(error.message, ctx);
	if (msg.includes("insufficient") || msg.includes("not enough balance")) {
		return new InsufficientBalanceError(error.message, ctx);
	}
	if (status === 400 || status === 422) return new OrderRejectedError(error.message, ctx);
	if (status === 502 || status === 503 || status === 504) return new NetworkError(error.message, ctx);
	if (status !== undefined && status >= 500) return new SystemError(error.message, ctx);

	if (code === "ETIMEDOUT" || msg.includes("timeout") || msg.includes("timed out")) {
		return new TimeoutError(error.message, ctx);
	}
	if (
		code === "ECONNREFUSED" ||
		code === "ECONNRESET" ||
		code === "ENOTFOUND" ||
		code === "EAI_AGAIN" ||
		msg.includes("fetch failed") ||
		msg.includes("socket hang up")
	) {
		return new NetworkError(error.message, ctx);
	}
	return new SystemError(error.message, ctx);
}
