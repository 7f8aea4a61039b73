/**
 * Strategy contracts.
 *
 * A strategy reads SharedState and quotes and answers with intents; it never
 * touches the venue. The SignalWorker hands intents to the OrderExecutor.
 */

import type { Logger } from "../lib/logger/index.js";
import type { Decimal } from "../shared/decimal.js";
import type { StrategyKind } from "../shared/config.js";
import type { InstrumentId } from "../shared/identifiers.js";
import type { SharedState } from "../state/shared-state.js";
import type { QuoteService } from "../venue/quote-service.js";

// ── Intents ─────────────────────────────────────────────────────────

/** Discriminated union of what a strategy can ask the executor to do. */
export type TradeIntent =
	| { readonly kind: "buy"; readonly instrument: InstrumentId; readonly reason: string }
	| { readonly kind: "sell"; readonly instrument: InstrumentId; readonly reason: string }
	| {
			readonly kind: "quote";
			readonly instrument: InstrumentId;
			readonly bidPrice: Decimal;
			readonly askPrice: Decimal;
			readonly size: Decimal;
			readonly reason: string;
	  };

export type TradeIntentKind = TradeIntent["kind"];

// ── Strategy interface ──────────────────────────────────────────────

export interface StrategyContext {
	readonly state: SharedState;
	readonly quotes: QuoteService;
	readonly now: number;
	readonly logger: Logger;
}

/**
 * When a strategy runs: after each price update, or on a fixed interval for
 * strategies that read quotes rather than the price history.
 */
export type StrategyTrigger =
	| { readonly mode: "updates" }
	| { readonly mode: "interval"; readonly intervalMs: number };

export interface Strategy {
	readonly kind: StrategyKind;
	readonly trigger: StrategyTrigger;
	evaluate(ctx: StrategyContext): Promise<TradeIntent[]>;
}

/** Where the SignalWorker sends intents; implemented by the OrderExecutor. */
export interface IntentSink {
	dispatch(intent: TradeIntent): Promise<boolean>;
}
