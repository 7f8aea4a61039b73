/**
 * Domain primitive identifiers — branded types for compile-time safety.
 *
 * Each identifier wraps a string with a unique brand, preventing accidental
 * mixing (e.g., passing a venue order id where an instrument is expected).
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Tradable outcome token (one side of a binary market). */
export type InstrumentId = Brand<string, "InstrumentId">;
/** Venue-assigned order identifier returned after submission. */
export type VenueOrderId = Brand<string, "VenueOrderId">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated InstrumentId from a raw token id. Throws if empty. */
export function instrumentId(value: string): InstrumentId {
	return createBrandedId(value, "InstrumentId");
}

/** Create a validated VenueOrderId from a raw string. Throws if empty. */
export function venueOrderId(value: string): VenueOrderId {
	return createBrandedId(value, "VenueOrderId");
}

/** Extract the raw string from any branded identifier type. */
export function idToString(id: InstrumentId | VenueOrderId): string {
	return id;
}
