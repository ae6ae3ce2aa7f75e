/**
 * Result type for operations whose failures are expected outcomes
 * rather than exceptions.
 */

export interface Ok<T> {
	readonly ok: true;
	readonly value: T;
}

export interface Err<E> {
	readonly ok: false;
	readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
	return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
	return { ok: false, error };
}

/** Collapse a result to its value, or `undefined` on failure. */
export function unwrapOr<T, E>(result: Result<T, E>): T | undefined;
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T;
export function unwrapOr<T, E>(result: Result<T, E>, fallback?: T): T | undefined {
	return result.ok ? result.value : fallback;
}
