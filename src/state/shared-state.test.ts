import * as fc from "fast-check";
import { beforeEach, describe, expect, it } from "vitest";
import { buildQuote } from "../market/orderbook.js";
import { Decimal } from "../shared/decimal.js";
import { instrumentId } from "../shared/identifiers.js";
import { FakeClock } from "../shared/time.js";
import { SharedState } from "./shared-state.js";
import { SimLedger } from "./sim-ledger.js";
import type { ActiveTrade } from "./types.js";

const d = (v: string | number) => Decimal.from(v);
const yes = instrumentId("tok-yes");
const no = instrumentId("tok-no");

function trade(overrides: Partial<ActiveTrade> = {}): ActiveTrade {
	return {
		instrument: yes,
		entryPrice: d("0.5"),
		entryTimeMs: 1_000,
		amountUsd: d(5),
		shares: d(10),
		triggeredBySystem: true,
		reason: "spike",
		...overrides,
	};
}

describe("SharedState", () => {
	let clock: FakeClock;
	let state: SharedState;

	beforeEach(() => {
		clock = new FakeClock(0);
		state = new SharedState({
			maxConcurrentTrades: 2,
			priceHistorySize: 3,
			quoteCacheTtlMs: 1_000,
			cooldownMs: 10_000,
			simStartUsdc: d(100),
			clock,
		});
	});

	describe("price history", () => {
		it("is empty for unknown instruments", () => {
			expect(state.getPriceHistory(yes)).toEqual([]);
			expect(state.lastPrice(yes)).toBeUndefined();
		});

		it("keeps the newest priceHistorySize points", () => {
			for (let i = 1; i <= 5; i++) state.addPrice(yes, i, d(i / 10), "slug", "Yes");
			const history = state.getPriceHistory(yes);
			expect(history.map((p) => p.timestampMs)).toEqual([3, 4, 5]);
			expect(state.lastPrice(yes)?.toString()).toBe("0.5");
		});

		it("returns a frozen copy", () => {
			state.addPrice(yes, 1, d("0.4"), "slug", "Yes");
			const history = state.getPriceHistory(yes);
			expect(Object.isFrozen(history)).toBe(true);
			state.addPrice(yes, 2, d("0.5"), "slug", "Yes");
			expect(history).toHaveLength(1);
		});
	});

	describe("active trades", () => {
		it("merges a second buy with a weighted entry price", () => {
			state.addActiveTrade(trade());
			const merged = state.addActiveTrade(
				trade({ entryPrice: d("0.7"), entryTimeMs: 5_000, amountUsd: d(7), shares: d(10) }),
			);

			expect(merged.shares.toString()).toBe("20");
			expect(merged.amountUsd.toString()).toBe("12");
			expect(merged.entryPrice.toString()).toBe("0.6");
			expect(merged.entryTimeMs).toBe(1_000);
			expect(state.activeTradeCount()).toBe(1);
		});

		it("reduces on partial sells and removes at zero", () => {
			state.addActiveTrade(trade());
			const rest = state.reduceActiveTrade(yes, d(4));
			expect(rest?.shares.toString()).toBe("6");
			expect(rest?.amountUsd.toString()).toBe("3");

			expect(state.reduceActiveTrade(yes, d(6))).toBeUndefined();
			expect(state.getActiveTrade(yes)).toBeUndefined();
		});

		it("hands out a copy of the trade table", () => {
			state.addActiveTrade(trade());
			const copy = state.getActiveTrades();
			copy.delete(yes);
			expect(state.getActiveTrade(yes)).toBeDefined();
		});
	});

	describe("trade slots", () => {
		it("refuses reservations beyond the maximum", () => {
			const x = instrumentId("tok-x");
			const y = instrumentId("tok-y");
			const z = instrumentId("tok-z");
			expect(state.tryReserveTradeSlot(x)).toBe(true);
			expect(state.tryReserveTradeSlot(y)).toBe(true);
			expect(state.tryReserveTradeSlot(z)).toBe(false);
			state.releaseTradeSlot(x);
			expect(state.tryReserveTradeSlot(z)).toBe(true);
		});

		it("counts open trades against the limit", () => {
			state.addActiveTrade(trade());
			state.addActiveTrade(trade({ instrument: no }));

			expect(state.occupiedSlots()).toBe(2);
			expect(state.tryReserveTradeSlot(instrumentId("tok-x"))).toBe(false);
		});

		it("lets a buy merge into an open trade at the limit", () => {
			state.addActiveTrade(trade());
			state.addActiveTrade(trade({ instrument: no }));

			expect(state.tryReserveTradeSlot(yes)).toBe(true);
			expect(state.occupiedSlots()).toBe(2);
		});

		it("holds one reservation per instrument", () => {
			expect(state.tryReserveTradeSlot(yes)).toBe(true);
			expect(state.tryReserveTradeSlot(yes)).toBe(false);
		});

		it("ignores extra releases", () => {
			state.tryReserveTradeSlot(yes);
			state.releaseTradeSlot(yes);
			state.releaseTradeSlot(yes);
			expect(state.reservedSlots()).toBe(0);
		});

		it("never exceeds the maximum under any interleaving", () => {
			const ids = ["t0", "t1", "t2", "t3", "t4"].map(instrumentId);
			fc.assert(
				fc.property(
					fc.array(fc.tuple(fc.constantFrom("reserve", "release", "open"), fc.integer({ min: 0, max: 4 })), {
						maxLength: 200,
					}),
					(ops) => {
						const s = new SharedState({
							maxConcurrentTrades: 3,
							priceHistorySize: 1,
							quoteCacheTtlMs: 1,
							cooldownMs: 0,
							simStartUsdc: null,
						});
						const reserved = new Set<number>();
						for (const [op, i] of ops) {
							const id = ids[i] ?? yes;
							if (op === "reserve") {
								if (s.tryReserveTradeSlot(id)) reserved.add(i);
							} else if (op === "release") {
								s.releaseTradeSlot(id);
								reserved.delete(i);
							} else if (reserved.has(i)) {
								s.addActiveTrade(trade({ instrument: id }));
								s.releaseTradeSlot(id);
								reserved.delete(i);
							}
							expect(s.activeTradeCount()).toBeLessThanOrEqual(3);
							expect(s.occupiedSlots()).toBeLessThanOrEqual(3);
						}
					},
				),
			);
		});
	});

	describe("asset order locks", () => {
		it("admits one holder per instrument", () => {
			expect(state.tryAcquireAssetOrder(yes)).toBe(true);
			expect(state.tryAcquireAssetOrder(yes)).toBe(false);
			expect(state.tryAcquireAssetOrder(no)).toBe(true);
		});

		it("treats a double release as a no-op", () => {
			state.tryAcquireAssetOrder(yes);
			state.releaseAssetOrder(yes);
			state.releaseAssetOrder(yes);
			expect(state.tryAcquireAssetOrder(yes)).toBe(true);
			expect(state.tryAcquireAssetOrder(yes)).toBe(false);
		});
	});

	describe("pairs", () => {
		it("is symmetric and listed once", () => {
			expect(state.setPair(yes, no).ok).toBe(true);
			expect(state.pairOf(yes)).toBe(no);
			expect(state.pairOf(no)).toBe(yes);
			expect(state.pairs()).toEqual([[yes, no]]);
		});

		it("accepts the same pair again in either order", () => {
			state.setPair(yes, no);
			expect(state.setPair(no, yes).ok).toBe(true);
			expect(state.pairs()).toHaveLength(1);
		});

		it("rejects a conflicting pair and leaves the table unchanged", () => {
			const other = instrumentId("tok-other");
			state.setPair(yes, no);
			const result = state.setPair(yes, other);

			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.message).toBe("Invalid pair");
			expect(state.pairOf(yes)).toBe(no);
			expect(state.pairOf(other)).toBeUndefined();
		});

		it("rejects pairing an instrument with itself", () => {
			expect(state.setPair(yes, yes).ok).toBe(false);
		});
	});

	describe("marks", () => {
		it("reports recent buys inside the cooldown window", () => {
			state.markBuy(yes, 1_000);
			expect(state.lastBuyAt(yes)).toBe(1_000);
			expect(state.isRecentlyBought(yes, 10_999)).toBe(true);
			expect(state.isRecentlyBought(yes, 11_000)).toBe(false);
			expect(state.isRecentlyBought(no, 1_000)).toBe(false);
		});

		it("tracks sells, one-shot buys and closes separately", () => {
			state.markSell(yes, 2_000);
			state.markBoughtOnce(no);
			state.markTradeClosed(3_000);

			expect(state.isRecentlySold(yes, 2_500)).toBe(true);
			expect(state.lastBuyAt(yes)).toBeUndefined();
			expect(state.hasBoughtOnce(no)).toBe(true);
			expect(state.hasBoughtOnce(yes)).toBe(false);
			expect(state.lastTradeClosedAt()).toBe(3_000);
		});
	});

	describe("positions", () => {
		it("reads from the ledger in simulation", () => {
			state.ledger?.applyBuy(yes, { eventSlug: "slug", outcome: "Yes" }, d(2), d("0.5"));
			expect(state.findPosition(yes)?.shares.toString()).toBe("2");
			expect([...state.getPositions().keys()]).toEqual(["slug"]);
		});

		it("uses the replaced snapshot in live mode", () => {
			const live = new SharedState({
				maxConcurrentTrades: 1,
				priceHistorySize: 1,
				quoteCacheTtlMs: 1,
				cooldownMs: 0,
				simStartUsdc: null,
			});
			const ledger = new SimLedger(d(1));
			ledger.applyBuy(no, { eventSlug: "slug", outcome: "No" }, d(3), d("0.2"));

			live.replacePositions(ledger.grouped());
			expect(live.ledger).toBeNull();
			expect(live.findPosition(no)?.shares.toString()).toBe("3");
			expect(live.findPosition(yes)).toBeUndefined();
		});
	});

	describe("quote cache", () => {
		it("expires quotes after the TTL", () => {
			const quote = buildQuote(yes, [{ price: d("0.4"), size: d(10) }], [], 0);
			state.cacheQuote(quote);
			expect(state.cachedQuote(yes)).toBe(quote);
			clock.advance(1_000);
			expect(state.cachedQuote(yes)).toBeUndefined();
		});
	});

	describe("shutdown", () => {
		it("sets the flag and wakes update waiters", async () => {
			const woke = state.updates.wait(5_000);
			state.requestShutdown();
			expect(state.isShutdown()).toBe(true);
			await expect(woke).resolves.toBe(true);
			await expect(state.shutdownSignal.wait(0)).resolves.toBe(true);
		});

		it("reports cleanup completion", async () => {
			await expect(state.waitForCleanup(0)).resolves.toBe(false);
			state.markCleanupComplete();
			await expect(state.waitForCleanup(0)).resolves.toBe(true);
		});
	});
});
