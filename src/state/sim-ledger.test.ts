import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { instrumentId } from "../shared/identifiers.js";
import { SimLedger } from "./sim-ledger.js";

const d = (v: string | number) => Decimal.from(v);
const yes = instrumentId("tok-yes");
const meta = { eventSlug: "will-it-rain", outcome: "Yes" };

describe("SimLedger", () => {
	it("debits the balance and opens a position on buy", () => {
		const ledger = new SimLedger(d(100));
		ledger.applyBuy(yes, meta, d(10), d("0.4"));

		expect(ledger.balance().toString()).toBe("96");
		const pos = ledger.position(yes);
		expect(pos?.shares.toString()).toBe("10");
		expect(pos?.avgPrice.toString()).toBe("0.4");
		expect(pos?.eventSlug).toBe("will-it-rain");
	});

	it("averages the entry price across buys", () => {
		const ledger = new SimLedger(d(100));
		ledger.applyBuy(yes, meta, d(10), d("0.4"));
		ledger.applyBuy(yes, meta, d(10), d("0.6"));

		const pos = ledger.position(yes);
		expect(pos?.shares.toString()).toBe("20");
		expect(pos?.avgPrice.toString()).toBe("0.5");
		expect(ledger.balance().toString()).toBe("90");
	});

	it("clamps the balance at zero", () => {
		const ledger = new SimLedger(d(1));
		ledger.applyBuy(yes, meta, d(10), d("0.5"));
		expect(ledger.balance().toString()).toBe("0");
	});

	it("books realized PnL and removes the position once sold out", () => {
		const ledger = new SimLedger(d(100));
		ledger.applyBuy(yes, meta, d(10), d("0.4"));
		const fill = ledger.applySell(yes, d(25), d("0.5"));

		expect(fill?.shares.toString()).toBe("10");
		expect(fill?.proceeds.toString()).toBe("5");
		expect(fill?.realizedPnl.toString()).toBe("1");
		expect(fill?.closed).toBe(true);
		expect(ledger.position(yes)).toBeUndefined();
		expect(ledger.realizedPnl().toString()).toBe("1");
		expect(ledger.balance().toString()).toBe("101");
	});

	it("keeps a partially sold position with its realized PnL", () => {
		const ledger = new SimLedger(d(100));
		ledger.applyBuy(yes, meta, d(10), d("0.4"));
		ledger.applySell(yes, d(4), d("0.3"));

		const pos = ledger.position(yes);
		expect(pos?.shares.toString()).toBe("6");
		expect(pos?.realizedPnl.toString()).toBe("-0.4");
	});

	it("ignores sells of unknown instruments", () => {
		const ledger = new SimLedger(d(100));
		expect(ledger.applySell(yes, d(1), d("0.5"))).toBeNull();
		expect(ledger.balance().toString()).toBe("100");
	});

	it("revalues a position on markPrice", () => {
		const ledger = new SimLedger(d(100));
		ledger.applyBuy(yes, meta, d(10), d("0.4"));
		ledger.markPrice(yes, d("0.5"));

		const pos = ledger.position(yes);
		expect(pos?.currentValue.toString()).toBe("5");
		expect(pos?.pnl.toString()).toBe("1");
		expect(pos?.percentPnl.toString()).toBe("0.25");
	});

	it("seeds positions without spending balance and groups them by slug", () => {
		const no = instrumentId("tok-no");
		const ledger = new SimLedger(d(50));
		ledger.seed([
			{ instrument: yes, meta, shares: d(5), avgPrice: d("0.3") },
			{ instrument: no, meta: { eventSlug: "will-it-rain", outcome: "No" }, shares: d(5), avgPrice: d("0.7") },
		]);

		expect(ledger.balance().toString()).toBe("50");
		expect(ledger.grouped().get("will-it-rain")?.map((p) => p.outcome)).toEqual(["Yes", "No"]);
	});

	it("round-trips a buy and sell to initial + (sell - buy) × shares", () => {
		fc.assert(
			fc.property(
				fc.integer({ min: 1, max: 99 }),
				fc.integer({ min: 1, max: 99 }),
				fc.integer({ min: 1, max: 50 }),
				(buyCents, sellCents, shares) => {
					const ledger = new SimLedger(d(1_000));
					const buy = d(buyCents).div(d(100));
					const sell = d(sellCents).div(d(100));
					ledger.applyBuy(yes, meta, d(shares), buy);
					ledger.applySell(yes, d(shares), sell);
					const expected = d(1_000).add(sell.sub(buy).mul(d(shares)));
					expect(ledger.balance().eq(expected)).toBe(true);
				},
			),
		);
	});
});
