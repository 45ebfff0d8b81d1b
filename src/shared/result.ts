/**
 * Fallible calls return a Result; only programmer errors throw.
 *
 * Check `.ok` before touching `.value` or `.error`:
 *
 * ```ts
 * const placed = await gateway.placeOrder(request);
 * if (!placed.ok) return placed; // forwards the error unchanged
 * ```
 */

export type Result<T, E = Error> = Ok<T> | Err<E>;

export interface Ok<T> {
	readonly ok: true;
	readonly value: T;
}

export interface Err<E> {
	readonly ok: false;
	readonly error: E;
}

export function ok<T>(value: T): Ok<T> {
	return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
	return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
	return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
	return !result.ok;
}
