import { beforeEach, describe, expect, it } from "vitest";
import { Duration, FakeClock } from "../shared/time.js";
import { ConnectivityWatchdog, WatchdogStatus, silenceStatus } from "./watchdog.js";

describe("ConnectivityWatchdog", () => {
	let clock: FakeClock;
	let feed: ConnectivityWatchdog;

	beforeEach(() => {
		clock = new FakeClock(50_000);
		feed = new ConnectivityWatchdog({ warningMs: Duration.seconds(5), criticalMs: Duration.seconds(20) }, clock);
	});

	it("counts silence from construction", () => {
		clock.advance(4_999);
		expect(feed.snapshot()).toEqual({ status: WatchdogStatus.Healthy, silenceMs: 4_999, lastPriceAt: null });
	});

	it("degrades once prices stop for the warning span", () => {
		clock.advance(5_000);
		expect(feed.status()).toBe(WatchdogStatus.Degraded);
	});

	it("goes critical after the critical span", () => {
		clock.advance(19_999);
		expect(feed.status()).toBe(WatchdogStatus.Degraded);
		clock.advance(1);
		expect(feed.status()).toBe(WatchdogStatus.Critical);
	});

	it("resets the silence on each price write", () => {
		clock.advance(25_000);
		feed.touch();
		clock.advance(1_000);
		expect(feed.snapshot()).toEqual({ status: WatchdogStatus.Healthy, silenceMs: 1_000, lastPriceAt: 75_000 });
	});

	it("refuses inverted thresholds", () => {
		expect(() => new ConnectivityWatchdog({ warningMs: 30, criticalMs: 10 }, clock)).toThrow(
			"warningMs (30) must not exceed criticalMs (10)",
		);
	});
});

describe("silenceStatus", () => {
	it("uses inclusive thresholds", () => {
		const config = { warningMs: 10, criticalMs: 20 };
		expect(silenceStatus(9, config)).toBe(WatchdogStatus.Healthy);
		expect(silenceStatus(10, config)).toBe(WatchdogStatus.Degraded);
		expect(silenceStatus(20, config)).toBe(WatchdogStatus.Critical);
	});
});
