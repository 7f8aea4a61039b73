import { Decimal } from "../shared/decimal.js";

/** Arithmetic mean; null for an empty list. */
export function mean(values: readonly Decimal[]): Decimal | null {
	if (values.length === 0) return null;
	return Decimal.sum(values).div(Decimal.from(values.length));
}

/** Population standard deviation (divides by n); null for an empty list. */
export function populationStdev(values: readonly Decimal[]): Decimal | null {
	const mu = mean(values);
	if (mu === null) return null;
	const squares = values.map((v) => {
		const d = v.sub(mu);
		return d.mul(d);
	});
	return Decimal.sum(squares).div(Decimal.from(values.length)).sqrt();
}

/**
 * Simple returns between consecutive prices: (p[i] − p[i−1]) / p[i−1].
 * Steps from a non-positive price are skipped.
 */
export function simpleReturns(prices: readonly Decimal[]): Decimal[] {
	const out: Decimal[] = [];
	for (let i = 1; i < prices.length; i++) {
		const prev = prices[i - 1];
		const cur = prices[i];
		if (!prev || !cur || !prev.isPositive()) continue;
		out.push(cur.sub(prev).div(prev));
	}
	return out;
}

export interface ZScore {
	readonly mean: Decimal;
	readonly stdev: Decimal;
	readonly z: Decimal;
}

/** z-score of `value` against `sample`; null when the sample is empty or flat. */
export function zScore(value: Decimal, sample: readonly Decimal[]): ZScore | null {
	const mu = mean(sample);
	const sigma = populationStdev(sample);
	if (mu === null || sigma === null || sigma.isZero()) return null;
	return { mean: mu, stdev: sigma, z: value.sub(mu).div(sigma) };
}
