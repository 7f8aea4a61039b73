/**
 * Result<T, E> — success or failure as a value.
 *
 * Quote reads, order submission and validation return a Result; the only
 * code that turns a throw into one sits at the venue boundary.
 */

export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { readonly ok: true; readonly value: T } {
	return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is { readonly ok: false; readonly error: E } {
	return !result.ok;
}

/** Awaits `fn`; a rejection becomes `err(onError(thrown))`. */
export async function tryCatchAsync<T, E>(
	fn: () => Promise<T>,
	onError: (thrown: unknown) => E,
): Promise<Result<T, E>> {
	try {
		return ok(await fn());
	} catch (thrown: unknown) {
		return err(onError(thrown));
	}
}
