import { describe, expect, it, vi } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { NetworkError, RateLimitError, TimeoutError } from "../shared/errors.js";
import { instrumentId } from "../shared/identifiers.js";
import { FakeClock } from "../shared/time.js";
import { VenueClient } from "./venue-client.js";
import type { VenueProviders } from "./venue-client.js";

const tok = instrumentId("tok-1");

function providers(overrides: Partial<VenueProviders> = {}): VenueProviders {
	return {
		getOrderBook: vi.fn().mockResolvedValue({ bids: [], asks: [] }),
		postOrder: vi.fn().mockResolvedValue({ success: true }),
		getBalance: vi.fn().mockResolvedValue({ balance: "0" }),
		getPositions: vi.fn().mockResolvedValue([]),
		getEvent: vi.fn().mockResolvedValue({ slug: "x", markets: [] }),
		...overrides,
	};
}

function client(p: VenueProviders, timeoutMs = 1_000): VenueClient {
	return new VenueClient(p, { timeoutMs, clock: new FakeClock(42) });
}

describe("VenueClient", () => {
	describe("getQuote", () => {
		it("sorts levels best-first and stamps the clock time", async () => {
			const p = providers({
				getOrderBook: vi.fn().mockResolvedValue({
					bids: [
						{ price: "0.40", size: "10" },
						{ price: "0.45", size: "5" },
					],
					asks: [
						{ price: 0.6, size: 3 },
						{ price: "0.55", size: "8" },
					],
				}),
			});
			const result = await client(p).getQuote(tok);

			expect(result.ok).toBe(true);
			if (!result.ok) return;
			expect(result.value.bestBid?.toString()).toBe("0.45");
			expect(result.value.bestAsk?.toString()).toBe("0.55");
			expect(result.value.asks.map((l) => l.price.toString())).toEqual(["0.55", "0.6"]);
			expect(result.value.timestampMs).toBe(42);
			expect(p.getOrderBook).toHaveBeenCalledWith("tok-1");
		});

		it("reports an empty book as no liquidity", async () => {
			const result = await client(providers()).getQuote(tok);
			expect(result).toEqual({ ok: false, error: { kind: "no_liquidity" } });
		});

		it("reports a malformed book as a validation error", async () => {
			const p = providers({
				getOrderBook: vi.fn().mockResolvedValue({ bids: [{ price: "abc", size: "1" }] }),
			});
			const result = await client(p).getQuote(tok);

			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.kind).toBe("validation");
			if (result.error.kind !== "validation") return;
			expect(result.error.error.message).toBe("Invalid order book");
		});

		it("classifies a thrown provider error as transient", async () => {
			const p = providers({
				getOrderBook: vi.fn().mockRejectedValue(new Error("fetch failed")),
			});
			const result = await client(p).getQuote(tok);

			expect(result.ok).toBe(false);
			if (result.ok || result.error.kind !== "transient") return;
			expect(result.error.error).toBeInstanceOf(NetworkError);
		});

		it("turns a hung provider into a TimeoutError", async () => {
			vi.useFakeTimers();
			try {
				const p = providers({ getOrderBook: () => new Promise<unknown>(() => {}) });
				const pending = client(p, 500).getQuote(tok);
				await vi.advanceTimersByTimeAsync(500);
				const result = await pending;

				expect(result.ok).toBe(false);
				if (result.ok || result.error.kind !== "transient") return;
				expect(result.error.error).toBeInstanceOf(TimeoutError);
				expect(result.error.error.message).toBe("getOrderBook timed out after 500ms");
			} finally {
				vi.useRealTimers();
			}
		});
	});

	describe("submitOrder", () => {
		it("sends decimals as strings and maps the acknowledgment", async () => {
			const postOrder = vi.fn().mockResolvedValue({
				success: true,
				orderID: "ord-9",
				filledShares: "20",
				avgPrice: "0.5",
			});
			const result = await client(providers({ postOrder })).submitOrder({
				instrument: tok,
				side: "buy",
				amount: Decimal.from(10),
				limitPrice: Decimal.from("0.5"),
				type: "FOK",
			});

			expect(postOrder).toHaveBeenCalledWith({
				tokenId: "tok-1",
				side: "BUY",
				amount: "10",
				price: "0.5",
				orderType: "FOK",
			});
			expect(result.ok).toBe(true);
			if (!result.ok) return;
			expect(result.value.success).toBe(true);
			expect(result.value.orderId).toBe("ord-9");
			expect(result.value.filledShares.toString()).toBe("20");
			expect(result.value.averagePrice?.toString()).toBe("0.5");
		});

		it("falls back to the requested shares when the fill size is missing", async () => {
			const result = await client(providers()).submitOrder({
				instrument: tok,
				side: "buy",
				amount: Decimal.from(10),
				limitPrice: Decimal.from("0.4"),
				type: "FOK",
			});

			expect(result.ok).toBe(true);
			if (!result.ok) return;
			expect(result.value.filledShares.toString()).toBe("25");
			expect(result.value.averagePrice).toBeNull();
			expect(result.value.orderId).toBeNull();
		});

		it("rejects an acknowledgment without a success flag", async () => {
			const p = providers({ postOrder: vi.fn().mockResolvedValue({ orderID: "x" }) });
			const result = await client(p).submitOrder({
				instrument: tok,
				side: "sell",
				amount: Decimal.from(5),
				limitPrice: Decimal.from("0.5"),
				type: "FOK",
			});

			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.message).toBe("Invalid order acknowledgment");
			expect(result.error.isRetryable).toBe(false);
		});

		it("classifies a 429 as a rate limit", async () => {
			const limited = Object.assign(new Error("too many requests"), { context: { status: 429 } });
			const p = providers({ postOrder: vi.fn().mockRejectedValue(limited) });
			const result = await client(p).submitOrder({
				instrument: tok,
				side: "sell",
				amount: Decimal.from(5),
				limitPrice: Decimal.from("0.5"),
				type: "GTC",
			});

			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error).toBeInstanceOf(RateLimitError);
		});
	});

	describe("account reads", () => {
		it("parses the balance", async () => {
			const p = providers({ getBalance: vi.fn().mockResolvedValue({ balance: "123.45" }) });
			const result = await client(p).getBalance();
			expect(result.ok && result.value.toString()).toBe("123.45");
		});

		it("maps venue positions", async () => {
			const p = providers({
				getPositions: vi.fn().mockResolvedValue([
					{
						asset: "tok-1",
						eventSlug: "election",
						outcome: "Yes",
						avgPrice: 0.4,
						size: 10,
						curPrice: 0.5,
						initialValue: 4,
						currentValue: 5,
						cashPnl: 1,
						percentPnl: 0.25,
					},
				]),
			});
			const result = await client(p).getPositions();

			expect(result.ok).toBe(true);
			if (!result.ok) return;
			const [pos] = result.value;
			expect(pos?.asset).toBe("tok-1");
			expect(pos?.shares.toString()).toBe("10");
			expect(pos?.pnl.toString()).toBe("1");
			expect(pos?.realizedPnl.toString()).toBe("0");
		});

		it("resolves markets with JSON-encoded token lists", async () => {
			const p = providers({
				getEvent: vi.fn().mockResolvedValue({
					slug: "election",
					markets: [
						{ clobTokenIds: '["tok-a","tok-b"]', outcomes: '["Yes","No"]' },
						{ clobTokenIds: ["tok-c", "tok-d"] },
					],
				}),
			});
			const result = await client(p).resolveMarket("election");

			expect(result.ok).toBe(true);
			if (!result.ok) return;
			expect(result.value).toEqual([
				{
					eventSlug: "election",
					outcomes: [
						{ instrument: "tok-a", label: "Yes" },
						{ instrument: "tok-b", label: "No" },
					],
				},
				{
					eventSlug: "election",
					outcomes: [
						{ instrument: "tok-c", label: "YES" },
						{ instrument: "tok-d", label: "NO" },
					],
				},
			]);
		});
	});
});
