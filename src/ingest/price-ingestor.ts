/**
 * PriceIngestor — the single writer of price history.
 *
 * Each cycle reads a quote for every tracked instrument (or a round-robin
 * batch of them), records the observed price and raises the update signal
 * once if anything was written.
 */

import { mapConcurrent } from "../lib/concurrency/index.js";
import type { ConnectivityWatchdog } from "../lifecycle/watchdog.js";
import type { ShutdownSignal, SupervisedTask } from "../lifecycle/worker-supervisor.js";
import type { Logger } from "../lib/logger/index.js";
import { observedPrice } from "../market/orderbook.js";
import { Decimal } from "../shared/decimal.js";
import type { InstrumentId } from "../shared/identifiers.js";
import type { SharedState } from "../state/shared-state.js";
import type { QuoteService } from "../venue/quote-service.js";
import { describeQuoteError } from "../venue/quote-service.js";

export interface PriceIngestorConfig {
	readonly priceUpdateMinIntervalMs: number;
	/** Instruments per cycle; ≤ 0 means all of them. */
	readonly priceUpdateBatchSize: number;
	readonly fetchConcurrency: number;
}

export interface PriceIngestorDeps {
	readonly state: SharedState;
	readonly quotes: QuoteService;
	readonly watchdog: ConnectivityWatchdog;
	readonly config: PriceIngestorConfig;
	readonly logger: Logger;
}

export class PriceIngestor implements SupervisedTask {
	readonly name = "price-ingestor";

	private readonly state: SharedState;
	private readonly quotes: QuoteService;
	private readonly watchdog: ConnectivityWatchdog;
	private readonly config: PriceIngestorConfig;
	private readonly logger: Logger;
	private cursor = 0;

	constructor(deps: PriceIngestorDeps) {
		this.state = deps.state;
		this.quotes = deps.quotes;
		this.watchdog = deps.watchdog;
		this.config = deps.config;
		this.logger = deps.logger.child({ component: "price-ingestor" });
	}

	async run(signal: ShutdownSignal): Promise<void> {
		while (!signal.isShutdown()) {
			const startedAt = this.state.clock.now();
			try {
				await this.cycle();
			} catch (e: unknown) {
				this.logger.error({ error: e instanceof Error ? e.message : String(e) }, "ingest cycle failed");
			}
			const elapsed = this.state.clock.now() - startedAt;
			if (await signal.pause(Math.max(0, this.config.priceUpdateMinIntervalMs - elapsed))) break;
		}
	}

	/** One pass over the current batch. Returns how many prices were written. */
	async cycle(): Promise<number> {
		const batch = this.nextBatch();
		const results = await mapConcurrent(batch, this.config.fetchConcurrency, (id) => this.ingest(id));

		let written = 0;
		for (const [i, r] of results.entries()) {
			if (r.status === "fulfilled") {
				if (r.value) written++;
			} else {
				this.logger.error(
					{ instrument: batch[i], error: r.reason instanceof Error ? r.reason.message : String(r.reason) },
					"price update failed",
				);
			}
		}
		if (written > 0) this.state.updates.notify();
		return written;
	}

	private nextBatch(): InstrumentId[] {
		const all = this.state.instruments();
		const size = this.config.priceUpdateBatchSize;
		if (size <= 0 || size >= all.length) return all;

		const start = this.cursor % all.length;
		const batch = [...all.slice(start, start + size)];
		if (batch.length < size) batch.push(...all.slice(0, size - batch.length));
		this.cursor = (start + size) % all.length;
		return batch;
	}

	private async ingest(id: InstrumentId): Promise<boolean> {
		const result = await this.quotes.get(id);
		if (!result.ok) {
			this.logger.warn({ instrument: id, reason: describeQuoteError(result.error) }, "no quote, price skipped");
			return false;
		}

		const price = observedPrice(result.value);
		if (price === null) {
			this.logger.warn({ instrument: id, reason: "empty book" }, "no price, skipped");
			return false;
		}
		if (price.isNegative() || price.gt(Decimal.one())) {
			this.logger.warn({ instrument: id, price: price.toString() }, "price outside [0, 1], skipped");
			return false;
		}

		const meta = this.state.instrumentMeta(id);
		this.state.addPrice(id, this.state.clock.now(), price, meta?.eventSlug ?? "", meta?.outcome ?? "");
		this.state.ledger?.markPrice(id, price);
		this.watchdog.touch();
		return true;
	}
}
