/**
 * QuoteService — cached quote source shared by every worker.
 *
 * Reads go to the SharedState quote cache first; a miss (or a `fresh` read)
 * asks the gateway, retrying only transient failures, and caches the result.
 */

import { rateLimitHint, withRetry } from "../execution/retry.js";
import type { Logger } from "../lib/logger/index.js";
import type { Quote } from "../market/types.js";
import type { RetryPolicy } from "../shared/config.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { type Result, ok } from "../shared/result.js";
import type { SharedState } from "../state/shared-state.js";
import type { QuoteError, VenueGateway } from "./types.js";

export interface QuoteReadOptions {
	/** Bypass the cache; used right before placing an order. */
	readonly fresh?: boolean;
}

export class QuoteService {
	private readonly gateway: VenueGateway;
	private readonly state: SharedState;
	private readonly policy: RetryPolicy;
	private readonly logger: Logger;

	constructor(gateway: VenueGateway, state: SharedState, policy: RetryPolicy, logger: Logger) {
		this.gateway = gateway;
		this.state = state;
		this.policy = policy;
		this.logger = logger.child({ component: "quote-service" });
	}

	async get(instrument: InstrumentId, options: QuoteReadOptions = {}): Promise<Result<Quote, QuoteError>> {
		if (!options.fresh) {
			const cached = this.state.cachedQuote(instrument);
			if (cached) return ok(cached);
		}

		const result = await withRetry(() => this.gateway.getQuote(instrument), {
			policy: this.policy,
			shouldRetry: (e) => e.kind === "transient" && !this.state.isShutdown(),
			retryAfterMs: (e) => (e.kind === "transient" ? rateLimitHint(e.error) : undefined),
			sleep: async (ms) => {
				await this.state.pause(ms);
			},
			onRetry: (e, attempt, delayMs) => {
				if (e.kind !== "transient") return;
				this.logger.debug(
					{ instrument, attempt, delayMs: Math.round(delayMs), error: e.error.message },
					"quote fetch failed, retrying",
				);
			},
		});

		if (result.ok) this.state.cacheQuote(result.value);
		return result;
	}
}

/** One-line description of a quote failure for log context. */
export function describeQuoteError(error: QuoteError): string {
	switch (error.kind) {
		case "no_liquidity":
			return "no liquidity";
		case "transient":
			return `transient: ${error.error.message}`;
		case "validation":
			return `validation: ${error.error.message}`;
	}
}
