/**
 * LibDecimal — immutable decimal numbers over decimal.js-light.
 *
 * Domain code imports it as `Decimal` through shared/decimal; nothing else
 * touches decimal.js-light.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	private static wrap(raw: DecimalLight): LibDecimal {
		return new LibDecimal(raw);
	}

	// ── Construction ────────────────────────────────────────────────

	/**
	 * Parses a venue string ("0.455") or a config number.
	 * @throws Error for non-finite numbers and blank or malformed strings
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) throw new Error(`LibDecimal.from: invalid number ${value}`);
			return LibDecimal.wrap(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) throw new Error("LibDecimal.from: empty string");
		try {
			return LibDecimal.wrap(new DecimalLight(trimmed));
		} catch (cause: unknown) {
			throw new Error(`LibDecimal.from: invalid decimal "${trimmed}"`, { cause });
		}
	}

	static zero(): LibDecimal {
		return LibDecimal.from(0);
	}

	static one(): LibDecimal {
		return LibDecimal.from(1);
	}

	static min(a: LibDecimal, b: LibDecimal): LibDecimal {
		return a.cmp(b) <= 0 ? a : b;
	}

	static max(a: LibDecimal, b: LibDecimal): LibDecimal {
		return a.cmp(b) >= 0 ? a : b;
	}

	static sum(values: readonly LibDecimal[]): LibDecimal {
		return values.reduce((total, v) => total.add(v), LibDecimal.zero());
	}

	// ── Arithmetic ──────────────────────────────────────────────────

	add(other: LibDecimal): LibDecimal {
		return LibDecimal.wrap(this.raw.plus(other.raw));
	}

	sub(other: LibDecimal): LibDecimal {
		return LibDecimal.wrap(this.raw.minus(other.raw));
	}

	mul(other: LibDecimal): LibDecimal {
		return LibDecimal.wrap(this.raw.times(other.raw));
	}

	/** @throws Error on a zero divisor */
	div(other: LibDecimal): LibDecimal {
		if (other.isZero()) throw new Error("LibDecimal.div: division by zero");
		return LibDecimal.wrap(this.raw.dividedBy(other.raw));
	}

	neg(): LibDecimal {
		return LibDecimal.wrap(this.raw.negated());
	}

	abs(): LibDecimal {
		return this.isNegative() ? this.neg() : this;
	}

	/** Truncates toward zero: share counts never round up past what was paid for. */
	roundDown(places: number): LibDecimal {
		return LibDecimal.wrap(this.raw.toDecimalPlaces(places, DecimalLight.ROUND_DOWN));
	}

	/** Bounds the value to `[lo, hi]`. */
	clamp(lo: LibDecimal, hi: LibDecimal): LibDecimal {
		return LibDecimal.min(hi, LibDecimal.max(lo, this));
	}

	/**
	 * Square root through Math.sqrt; precise enough for return volatilities.
	 * @throws Error on a negative value
	 */
	sqrt(): LibDecimal {
		if (this.isNegative()) throw new Error("LibDecimal.sqrt: sqrt of negative");
		return LibDecimal.from(Math.sqrt(this.raw.toNumber()));
	}

	// ── Comparison ──────────────────────────────────────────────────

	cmp(other: LibDecimal): -1 | 0 | 1 {
		const c = this.raw.comparedTo(other.raw);
		return c < 0 ? -1 : c > 0 ? 1 : 0;
	}

	eq(other: LibDecimal): boolean {
		return this.cmp(other) === 0;
	}

	gt(other: LibDecimal): boolean {
		return this.cmp(other) > 0;
	}

	gte(other: LibDecimal): boolean {
		return this.cmp(other) >= 0;
	}

	lt(other: LibDecimal): boolean {
		return this.cmp(other) < 0;
	}

	lte(other: LibDecimal): boolean {
		return this.cmp(other) <= 0;
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.gt(0);
	}

	isNegative(): boolean {
		return this.raw.lt(0);
	}

	// ── Output ──────────────────────────────────────────────────────

	/** Plain notation without trailing zeros: "1.500" prints as "1.5". */
	toString(): string {
		const fixed = this.raw.toFixed();
		return fixed.includes(".") ? fixed.replace(/\.?0+$/, "") : fixed;
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	/** Lets pino and JSON.stringify print the value instead of the wrapper. */
	toJSON(): string {
		return this.toString();
	}
}
