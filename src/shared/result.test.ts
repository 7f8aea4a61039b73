import { describe, expect, it } from "vitest";
import { NetworkError, SystemError, classifyError } from "./errors.js";
import { err, isErr, isOk, ok, tryCatchAsync } from "./result.js";

describe("Result", () => {
	it("narrows on the discriminant", () => {
		const quoted = ok({ bid: "0.41" });
		const empty = err("no_liquidity");

		expect(isOk(quoted)).toBe(true);
		expect(isErr(quoted)).toBe(false);
		expect(isErr(empty)).toBe(true);
		if (empty.ok) return;
		expect(empty.error).toBe("no_liquidity");
	});

	describe("tryCatchAsync", () => {
		it("wraps a resolved value", async () => {
			await expect(tryCatchAsync(async () => 42, classifyError)).resolves.toEqual({ ok: true, value: 42 });
		});

		it("classifies a rejection", async () => {
			const r = await tryCatchAsync(async () => {
				throw new Error("fetch failed");
			}, classifyError);

			expect(r.ok).toBe(false);
			if (r.ok) return;
			expect(r.error).toBeInstanceOf(NetworkError);
		});

		it("hands non-Error throws to the mapper", async () => {
			const r = await tryCatchAsync(async () => {
				throw "socket closed";
			}, classifyError);

			expect(!r.ok && r.error).toBeInstanceOf(SystemError);
			expect(!r.ok && r.error.message).toBe("socket closed");
		});
	});
});
