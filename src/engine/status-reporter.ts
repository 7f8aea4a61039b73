/**
 * Status reporting — the periodic engine summary and the positions table.
 *
 * The summary is logged every `statusIntervalMs`. The positions table is
 * logged when positions changed, at most once per `positionsLogThrottleMs`.
 */

import type { Logger } from "../lib/logger/index.js";
import type { WatchdogSnapshot } from "../lifecycle/watchdog.js";
import type { ShutdownSignal, SupervisedTask } from "../lifecycle/worker-supervisor.js";
import type { EngineConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import type { InstrumentId } from "../shared/identifiers.js";
import type { Clock } from "../shared/time.js";
import type { GroupedPositions } from "../state/types.js";

// ── Snapshots ───────────────────────────────────────────────────────

export interface StatusSnapshot {
	readonly activeTasks: number;
	readonly trackedInstruments: number;
	readonly activeTrades: number;
	/** Simulation only. */
	readonly simBalance: Decimal | null;
	readonly watchdog: WatchdogSnapshot;
}

export interface PositionLine {
	readonly eventSlug: string;
	readonly outcome: string;
	readonly asset: InstrumentId;
	readonly shares: Decimal;
	readonly avgPrice: Decimal;
	readonly currentPrice: Decimal;
	readonly value: Decimal;
	readonly pnl: Decimal;
	readonly pctPnl: Decimal;
	readonly realizedPnl: Decimal;
}

export interface PositionsSnapshot {
	readonly lines: readonly PositionLine[];
	readonly totalValue: Decimal;
	readonly unrealizedPnl: Decimal;
	readonly realizedPnl: Decimal;
}

/**
 * Flattens grouped positions into table lines, ordered by event then outcome.
 * `realized` replaces the per-line sum when the caller tracks positions that
 * already closed.
 */
export function positionsSnapshot(grouped: GroupedPositions, realized?: Decimal): PositionsSnapshot {
	const lines: PositionLine[] = [];
	for (const list of grouped.values()) {
		for (const p of list) {
			lines.push({
				eventSlug: p.eventSlug,
				outcome: p.outcome,
				asset: p.asset,
				shares: p.shares,
				avgPrice: p.avgPrice,
				currentPrice: p.currentPrice,
				value: p.currentValue,
				pnl: p.pnl,
				pctPnl: p.percentPnl,
				realizedPnl: p.realizedPnl,
			});
		}
	}
	lines.sort((x, y) => x.eventSlug.localeCompare(y.eventSlug) || x.outcome.localeCompare(y.outcome));

	return {
		lines,
		totalValue: Decimal.sum(lines.map((l) => l.value)),
		unrealizedPnl: Decimal.sum(lines.map((l) => l.pnl)),
		realizedPnl: realized ?? Decimal.sum(lines.map((l) => l.realizedPnl)),
	};
}

// ── Reporter task ───────────────────────────────────────────────────

export type StatusReporterConfig = Pick<EngineConfig, "statusIntervalMs" | "positionsLogThrottleMs">;

export interface StatusReporterDeps {
	readonly status: () => StatusSnapshot;
	readonly positions: () => PositionsSnapshot;
	readonly onStatus: (snapshot: StatusSnapshot) => void;
	readonly config: StatusReporterConfig;
	readonly clock: Clock;
	readonly logger: Logger;
}

export interface ReportTick {
	readonly status: boolean;
	readonly positions: boolean;
}

export class StatusReporter implements SupervisedTask {
	readonly name = "status-reporter";

	private readonly deps: StatusReporterDeps;
	private readonly logger: Logger;
	private lastStatusAt: number | undefined;
	private lastPositionsAt: number | undefined;
	private positionsDirty = true;

	constructor(deps: StatusReporterDeps) {
		this.deps = deps;
		this.logger = deps.logger.child({ component: "status" });
	}

	async run(signal: ShutdownSignal): Promise<void> {
		const { statusIntervalMs, positionsLogThrottleMs } = this.deps.config;
		const tickMs =
			positionsLogThrottleMs > 0 ? Math.min(statusIntervalMs, positionsLogThrottleMs) : statusIntervalMs;
		while (!signal.isShutdown()) {
			this.tick();
			if (await signal.pause(tickMs)) break;
		}
	}

	/** Marks the positions table for logging on the next eligible tick. */
	positionsChanged(): void {
		this.positionsDirty = true;
	}

	/** Reports whatever is due. */
	tick(): ReportTick {
		const now = this.deps.clock.now();
		const { statusIntervalMs, positionsLogThrottleMs } = this.deps.config;

		const statusDue = this.lastStatusAt === undefined || now - this.lastStatusAt >= statusIntervalMs;
		if (statusDue) {
			this.lastStatusAt = now;
			const snapshot = this.deps.status();
			this.logger.info(
				{
					activeTasks: snapshot.activeTasks,
					trackedInstruments: snapshot.trackedInstruments,
					activeTrades: snapshot.activeTrades,
					simBalance: snapshot.simBalance?.toFixed(2) ?? null,
					feed: snapshot.watchdog.status,
					feedSilenceMs: snapshot.watchdog.silenceMs,
				},
				"engine status",
			);
			this.deps.onStatus(snapshot);
		}

		const positionsDue =
			this.positionsDirty &&
			(this.lastPositionsAt === undefined || now - this.lastPositionsAt >= positionsLogThrottleMs);
		if (positionsDue) {
			this.lastPositionsAt = now;
			this.positionsDirty = false;
			this.logPositions(this.deps.positions());
		}

		return { status: statusDue, positions: positionsDue };
	}

	private logPositions(snapshot: PositionsSnapshot): void {
		for (const l of snapshot.lines) {
			this.logger.info(
				{
					slug: l.eventSlug,
					outcome: l.outcome,
					asset: l.asset,
					shares: l.shares.toFixed(2),
					avg: l.avgPrice.toFixed(4),
					current: l.currentPrice.toFixed(4),
					value: l.value.toFixed(2),
					pnl: l.pnl.toFixed(2),
					pct: l.pctPnl.mul(Decimal.from(100)).toFixed(2),
					realized: l.realizedPnl.toFixed(2),
				},
				"position",
			);
		}
		this.logger.info(
			{
				positions: snapshot.lines.length,
				totalValue: snapshot.totalValue.toFixed(2),
				unrealized: snapshot.unrealizedPnl.toFixed(2),
				realized: snapshot.realizedPnl.toFixed(2),
			},
			"positions summary",
		);
	}
}
