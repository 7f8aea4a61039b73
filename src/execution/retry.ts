/**
 * Retry for Result-returning venue calls — exponential backoff with jitter.
 *
 * The caller decides which errors are worth another attempt. A rate-limit
 * hint from the venue stretches the delay; it never shortens it.
 */

import type { RetryPolicy } from "../shared/config.js";
import { NetworkError, RateLimitError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { sleep as wallSleep } from "../shared/time.js";

export interface RetryOptions<E> {
	readonly policy: RetryPolicy;
	readonly shouldRetry: (error: E) => boolean;
	/** Minimum wait the venue asked for, if the error carries one. */
	readonly retryAfterMs?: ((error: E) => number | undefined) | undefined;
	/** Defaults to a wall-clock sleep; workers pass a shutdown-aware one. */
	readonly sleep?: ((ms: number) => Promise<void>) | undefined;
	readonly onRetry?: ((error: E, attempt: number, delayMs: number) => void) | undefined;
}

/** @internal Exported for testing only. */
export function computeDelay(attempt: number, policy: RetryPolicy, retryAfterMs?: number): number {
	const exponential = policy.baseDelayMs * 2 ** attempt;
	let delay = Math.min(exponential, policy.maxDelayMs);

	if (retryAfterMs !== undefined) {
		delay = Math.max(delay, retryAfterMs);
	}

	const jitter = 1 + (Math.random() - 0.5) * 2 * policy.jitterFactor;
	return delay * jitter;
}

/**
 * Runs `fn` until it succeeds, returns an error `shouldRetry` rejects, or
 * `policy.maxAttempts` calls have been made. Returns the last result.
 *
 * @example
 * ```ts
 * const ack = await withRetry(() => gateway.submitOrder(order), {
 *   policy: config.retry,
 *   shouldRetry: isRetryableOrderError,
 *   retryAfterMs: rateLimitHint,
 * });
 * ```
 */
export async function withRetry<T, E>(
	fn: () => Promise<Result<T, E>>,
	options: RetryOptions<E>,
): Promise<Result<T, E>> {
	const pause = options.sleep ?? wallSleep;
	let last = await fn();

	for (let attempt = 1; attempt < options.policy.maxAttempts; attempt++) {
		if (last.ok || !options.shouldRetry(last.error)) return last;

		const delay = computeDelay(attempt - 1, options.policy, options.retryAfterMs?.(last.error));
		options.onRetry?.(last.error, attempt, delay);
		await pause(delay);

		last = await fn();
	}

	return last;
}

/**
 * Order submission retries only on errors where the order certainly did not
 * reach the book. A timeout has an unknown outcome and is never retried.
 */
export function isRetryableOrderError(error: TradingError): boolean {
	return error instanceof NetworkError || error instanceof RateLimitError;
}

export function rateLimitHint(error: TradingError): number | undefined {
	return error instanceof RateLimitError ? error.retryAfterMs : undefined;
}
