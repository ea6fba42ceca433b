/**
 * @module Result
 * @description Extended utilities for working with Result types.
 *
 * - Pattern matching with `match`
 * - Safe unwrapping with `unwrap_or`, `unwrap`, `unwrap_err`
 * - Exception-to-Result conversion with `try_catch`, `try_catch_async`
 * - Fetch wrapper with `fetch_result`
 * - Collecting many Results with `collect`
 */

import { ok, err, type Result } from "./types";

/**
 * Pattern match on a Result, extracting the value with appropriate handler.
 *
 * @example
 * ```ts
 * const message = match(
 *   await client.ref_tables.exists('Prices'),
 *   found => (found ? 'present' : 'absent'),
 *   error => `failed: ${error.kind}`
 * )
 * ```
 */
export const match = <T, E, R>(result: Result<T, E>, on_ok: (value: T) => R, on_err: (error: E) => R): R => {
	if (result.ok) return on_ok(result.value);
	return on_err(result.error);
};

/**
 * Extract value from Result, returning default if error.
 */
export const unwrap_or = <T, E>(result: Result<T, E>, default_value: T): T => (result.ok ? result.value : default_value);

/**
 * Extract value from Result, throwing if error.
 * Use only when you're certain the Result is Ok, or in tests.
 *
 * @example
 * ```ts
 * const rows = unwrap(await client.ref_tables.read('Prices'))
 * expect(rows).toHaveLength(5)
 * ```
 */
export const unwrap = <T, E>(result: Result<T, E>): T => {
	if (!result.ok) throw new Error(`unwrap called on error result: ${JSON.stringify(result.error)}`);
	return result.value;
};

/**
 * Extract error from Result, throwing if Ok.
 * Use only when you're certain the Result is Err, or in tests.
 */
export const unwrap_err = <T, E>(result: Result<T, E>): E => {
	if (result.ok) throw new Error(`unwrap_err called on ok result: ${JSON.stringify(result.value)}`);
	return result.error;
};

/**
 * Execute a function and convert exceptions to Result.
 *
 * @example
 * ```ts
 * const parsed = try_catch(
 *   () => JSON.parse(text),
 *   e => ({ kind: 'decode_error', path, mode: 'json', cause: to_error(e) })
 * )
 * ```
 */
export const try_catch = <T, E>(fn: () => T, on_error: (e: unknown) => E): Result<T, E> => {
	try {
		return ok(fn());
	} catch (e) {
		return err(on_error(e));
	}
};

/**
 * Execute an async function and convert exceptions to Result.
 */
export const try_catch_async = async <T, E>(fn: () => Promise<T>, on_error: (e: unknown) => E): Promise<Result<T, E>> => {
	try {
		return ok(await fn());
	} catch (e) {
		return err(on_error(e));
	}
};

/**
 * Error types for fetch operations. An `http` error keeps the response body
 * text so the platform's own message reaches the caller.
 */
export type FetchError =
	| { type: "network"; cause: unknown }
	| { type: "http"; status: number; status_text: string; body: string }
	| { type: "parse"; status: number; cause: unknown };

/**
 * Fetch wrapper that returns Result instead of throwing.
 *
 * @param parse_body - Body parser applied to 2xx responses (defaults to JSON)
 *
 * @example
 * ```ts
 * const result = await fetch_result(
 *   'https://platform.example.com/API/demo/Files',
 *   { headers: { Authorization: 'Bearer test-token' } },
 *   e => (e.type === 'http' ? `HTTP ${e.status}` : 'Network error')
 * )
 * ```
 */
export const fetch_result = async <T, E>(
	input: string | URL | Request,
	init: RequestInit | undefined,
	on_error: (e: FetchError) => E,
	parse_body: (response: Response) => Promise<T> = r => r.json() as Promise<T>
): Promise<Result<T, E>> => {
	let response: Response;
	try {
		response = await fetch(input, init);
	} catch (e) {
		return err(on_error({ type: "network", cause: e }));
	}
	if (!response.ok) {
		const body = await response.text().catch(() => "");
		return err(on_error({ type: "http", status: response.status, status_text: response.statusText, body }));
	}
	try {
		return ok(await parse_body(response));
	} catch (e) {
		return err(on_error({ type: "parse", status: response.status, cause: e }));
	}
};

/**
 * Combine a list of Results into one, stopping at the first error.
 *
 * @example
 * ```ts
 * const all = collect(rows.map(parse_row)) // Result<Row[], SyncError>
 * ```
 */
export const collect = <T, E>(results: Result<T, E>[]): Result<T[], E> => {
	const values: T[] = [];
	for (const result of results) {
		if (!result.ok) return result;
		values.push(result.value);
	}
	return ok(values);
};

/**
 * Extract value from Result, returning null for any error.
 */
export const to_nullable = <T, E>(result: Result<T, E>): T | null => (result.ok ? result.value : null);

/**
 * Format an unknown error to a string message.
 */
export const format_error = (e: unknown): string => (e instanceof Error ? e.message : String(e));

/**
 * Coerce an unknown thrown value into an Error.
 */
export const to_error = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));
