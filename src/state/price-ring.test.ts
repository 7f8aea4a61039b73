import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { PriceRing } from "./price-ring.js";

describe("PriceRing", () => {
	it("starts empty", () => {
		const ring = new PriceRing<number>(3);
		expect(ring.size).toBe(0);
		expect(ring.last()).toBeUndefined();
		expect(ring.toArray()).toEqual([]);
	});

	it("keeps insertion order below capacity", () => {
		const ring = new PriceRing<number>(3);
		ring.push(1);
		ring.push(2);
		expect(ring.toArray()).toEqual([1, 2]);
		expect(ring.last()).toBe(2);
	});

	it("evicts the oldest value at capacity", () => {
		const ring = new PriceRing<number>(3);
		for (const v of [1, 2, 3, 4, 5]) ring.push(v);
		expect(ring.size).toBe(3);
		expect(ring.toArray()).toEqual([3, 4, 5]);
		expect(ring.last()).toBe(5);
	});

	it("rejects a non-positive capacity", () => {
		expect(() => new PriceRing<number>(0)).toThrow(
			"PriceRing capacity must be a positive integer, got 0",
		);
	});

	it("always holds the last min(n, capacity) values", () => {
		fc.assert(
			fc.property(
				fc.integer({ min: 1, max: 16 }),
				fc.array(fc.integer(), { maxLength: 64 }),
				(capacity, values) => {
					const ring = new PriceRing<number>(capacity);
					for (const v of values) ring.push(v);
					expect(ring.toArray()).toEqual(values.slice(-capacity));
					expect(ring.size).toBe(Math.min(values.length, capacity));
				},
			),
		);
	});
});
