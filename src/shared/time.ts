/**
 * Clocks and durations. Every timestamp the engine records comes from an
 * injected Clock.
 */

export interface Clock {
	/** Epoch milliseconds. */
	now(): number;
}

export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Manually driven clock for tests. Only moves when told to. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		if (ms < 0) {
			throw new Error(`FakeClock.advance expects non-negative ms, got ${ms}`);
		}
		this.time += ms;
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

export const Duration = {
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
} as const;

/** Resolves after `ms` of wall time; non-positive values resolve immediately. */
export function sleep(ms: number): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise((resolve) => {
		setTimeout(resolve, ms);
	});
}
