/**
 * ExitMonitor — periodically prices every active trade at what its shares
 * would fetch on the bid side and sells those that hit an exit rule.
 *
 * A failed sell leaves the trade in place for the next pass.
 */

import { mapConcurrent } from "../lib/concurrency/index.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { ShutdownSignal, SupervisedTask } from "../lifecycle/worker-supervisor.js";
import { effectivePrice } from "../market/orderbook.js";
import type { EngineConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import type { InstrumentId } from "../shared/identifiers.js";
import type { SharedState } from "../state/shared-state.js";
import type { ActiveTrade } from "../state/types.js";
import type { QuoteService } from "../venue/quote-service.js";
import { describeQuoteError } from "../venue/quote-service.js";
import { evaluateExit, exitThresholds } from "./exit-policy.js";
import type { ExitDecision, ExitThresholds } from "./exit-policy.js";

export type ExitMonitorConfig = Pick<
	EngineConfig,
	| "cashProfitUsd"
	| "pctProfit"
	| "cashLossUsd"
	| "pctLoss"
	| "holdingTimeLimitMs"
	| "exitIntervalMs"
	| "exitConcurrency"
	| "minOrderShares"
>;

/** The part of the executor the monitor sells through. */
export interface ExitSeller {
	placeSell(instrument: InstrumentId, reason: string): Promise<boolean>;
}

export interface ExitEvent {
	readonly instrument: InstrumentId;
	readonly decision: ExitDecision;
	readonly sold: boolean;
}

export type ExitMonitorEvents = {
	exit: (event: ExitEvent) => void;
};

export interface ExitMonitorDeps {
	readonly state: SharedState;
	readonly quotes: QuoteService;
	readonly seller: ExitSeller;
	readonly config: ExitMonitorConfig;
	readonly logger: Logger;
}

export class ExitMonitor implements SupervisedTask {
	readonly name = "exit-monitor";
	readonly events = new TypedEmitter<ExitMonitorEvents>();

	private readonly state: SharedState;
	private readonly quotes: QuoteService;
	private readonly seller: ExitSeller;
	private readonly config: ExitMonitorConfig;
	private readonly thresholds: ExitThresholds;
	private readonly minOrderShares: Decimal;
	private readonly logger: Logger;

	constructor(deps: ExitMonitorDeps) {
		this.state = deps.state;
		this.quotes = deps.quotes;
		this.seller = deps.seller;
		this.config = deps.config;
		this.thresholds = exitThresholds(deps.config);
		this.minOrderShares = Decimal.from(deps.config.minOrderShares);
		this.logger = deps.logger.child({ component: "exit-monitor" });
	}

	async run(signal: ShutdownSignal): Promise<void> {
		while (!signal.isShutdown()) {
			try {
				await this.cycle();
			} catch (e: unknown) {
				this.logger.error({ error: e instanceof Error ? e.message : String(e) }, "exit cycle failed");
			}
			if (await signal.pause(this.config.exitIntervalMs)) break;
		}
	}

	/** One pass over the active trades. Returns how many were sold. */
	async cycle(): Promise<number> {
		const trades = [...this.state.getActiveTrades().values()];
		const results = await mapConcurrent(trades, this.config.exitConcurrency, (t) => this.check(t));

		let sold = 0;
		for (const [i, r] of results.entries()) {
			if (r.status === "fulfilled") {
				if (r.value) sold++;
			} else {
				this.logger.error(
					{
						instrument: trades[i]?.instrument,
						error: r.reason instanceof Error ? r.reason.message : String(r.reason),
					},
					"exit check failed",
				);
			}
		}
		return sold;
	}

	private async check(trade: ActiveTrade): Promise<boolean> {
		const { instrument } = trade;
		const quote = await this.quotes.get(instrument);
		if (!quote.ok) {
			this.logger.debug({ instrument, error: describeQuoteError(quote.error) }, "no quote, exit check skipped");
			return false;
		}

		const exitPrice = effectivePrice(quote.value, trade.shares, "sell") ?? quote.value.bestBid;
		if (!exitPrice?.isPositive()) return false;

		const decision = evaluateExit(trade, exitPrice, this.state.clock.now(), this.thresholds);
		if (!decision) return false;

		const log = this.logger.child({
			instrument,
			reason: decision.reason,
			exitPrice: exitPrice.toString(),
			cashPnl: decision.cashPnl.toFixed(2),
			pctPnl: decision.pctPnl.toFixed(4),
		});
		log.info("exit triggered");

		const sold = await this.seller.placeSell(instrument, decision.reason);
		if (sold) {
			const remainder = this.state.getActiveTrade(instrument);
			if (remainder && remainder.shares.lt(this.minOrderShares)) {
				this.state.removeActiveTrade(instrument);
				log.info({ remainder: remainder.shares.toString() }, "dust remainder dropped");
			}
			this.state.markTradeClosed(this.state.clock.now());
		} else {
			log.warn("exit sell failed, retrying next cycle");
		}

		this.events.emit("exit", { instrument, decision, sold });
		return sold;
	}
}
