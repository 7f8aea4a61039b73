/**
 * Exit rules for an active trade, as a pure function of the trade, the
 * price it could be sold at and the time.
 */

import type { EngineConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import type { ActiveTrade } from "../state/types.js";

/** Why a trade is being closed; the value is the reason handed to the sell. */
export const ExitReason = {
	HoldingTime: "holding time limit",
	TakeProfit: "take profit",
	StopLoss: "stop loss",
} as const;

export type ExitReason = (typeof ExitReason)[keyof typeof ExitReason];

/** Loss limits are magnitudes: a stop triggers at PnL ≤ −limit. */
export interface ExitThresholds {
	readonly cashProfitUsd: Decimal;
	readonly pctProfit: Decimal;
	readonly cashLossUsd: Decimal;
	readonly pctLoss: Decimal;
	readonly holdingTimeLimitMs: number;
}

export interface ExitDecision {
	readonly reason: ExitReason;
	readonly exitPrice: Decimal;
	readonly cashPnl: Decimal;
	readonly pctPnl: Decimal;
	readonly heldMs: number;
}

export function exitThresholds(
	config: Pick<EngineConfig, "cashProfitUsd" | "pctProfit" | "cashLossUsd" | "pctLoss" | "holdingTimeLimitMs">,
): ExitThresholds {
	return {
		cashProfitUsd: Decimal.from(config.cashProfitUsd),
		pctProfit: Decimal.from(config.pctProfit),
		cashLossUsd: Decimal.from(config.cashLossUsd),
		pctLoss: Decimal.from(config.pctLoss),
		holdingTimeLimitMs: config.holdingTimeLimitMs,
	};
}

/**
 * First matching rule wins: holding time, then take profit, then stop loss.
 * Returns null while none applies or the entry price is not positive.
 *
 * @example
 * const decision = evaluateExit(trade, Decimal.from("0.56"), clock.now(), thresholds);
 * if (decision) await executor.placeSell(trade.instrument, decision.reason);
 */
export function evaluateExit(
	trade: ActiveTrade,
	exitPrice: Decimal,
	nowMs: number,
	thresholds: ExitThresholds,
): ExitDecision | null {
	if (!trade.entryPrice.isPositive()) return null;

	const cashPnl = exitPrice.sub(trade.entryPrice).mul(trade.shares);
	const pctPnl = exitPrice.sub(trade.entryPrice).div(trade.entryPrice);
	const heldMs = nowMs - trade.entryTimeMs;
	const decide = (reason: ExitReason): ExitDecision => ({ reason, exitPrice, cashPnl, pctPnl, heldMs });

	if (heldMs > thresholds.holdingTimeLimitMs) return decide(ExitReason.HoldingTime);
	if (cashPnl.gte(thresholds.cashProfitUsd) || pctPnl.gte(thresholds.pctProfit)) {
		return decide(ExitReason.TakeProfit);
	}
	if (cashPnl.lte(thresholds.cashLossUsd.neg()) || pctPnl.lte(thresholds.pctLoss.neg())) {
		return decide(ExitReason.StopLoss);
	}
	return null;
}
