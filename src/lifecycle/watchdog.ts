/**
 * ConnectivityWatchdog — flags a price feed that has gone quiet.
 *
 * The ingestor touches it after every cycle that wrote a price. Silence is
 * counted from the last touch, or from construction before the first one.
 */

import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";

export const WatchdogStatus = {
	Healthy: "healthy",
	Degraded: "degraded",
	Critical: "critical",
} as const;

export type WatchdogStatus = (typeof WatchdogStatus)[keyof typeof WatchdogStatus];

export interface WatchdogConfig {
	readonly warningMs: number;
	readonly criticalMs: number;
}

export interface WatchdogSnapshot {
	readonly status: WatchdogStatus;
	readonly silenceMs: number;
	/** Null until the first price write. */
	readonly lastPriceAt: number | null;
}

export function silenceStatus(silenceMs: number, config: WatchdogConfig): WatchdogStatus {
	if (silenceMs >= config.criticalMs) return WatchdogStatus.Critical;
	if (silenceMs >= config.warningMs) return WatchdogStatus.Degraded;
	return WatchdogStatus.Healthy;
}

export class ConnectivityWatchdog {
	private readonly startedAt: number;
	private lastPriceAt: number | null = null;

	constructor(
		private readonly config: WatchdogConfig,
		private readonly clock: Clock = SystemClock,
	) {
		if (config.warningMs > config.criticalMs) {
			throw new Error(`warningMs (${config.warningMs}) must not exceed criticalMs (${config.criticalMs})`);
		}
		this.startedAt = clock.now();
	}

	touch(): void {
		this.lastPriceAt = this.clock.now();
	}

	status(): WatchdogStatus {
		return silenceStatus(this.silence(), this.config);
	}

	snapshot(): WatchdogSnapshot {
		const silenceMs = this.silence();
		return { status: silenceStatus(silenceMs, this.config), silenceMs, lastPriceAt: this.lastPriceAt };
	}

	private silence(): number {
		return this.clock.now() - (this.lastPriceAt ?? this.startedAt);
	}
}
