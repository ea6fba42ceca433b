/**
 * @module Concurrency
 * @description Utilities for bounded concurrency and cancellable polling.
 */

import { ok, err, type Result, type SyncError } from "./types";

/**
 * Semaphore for controlling concurrent operations.
 *
 * Callers acquire a permit before proceeding; when all permits are taken,
 * subsequent acquires wait (FIFO) until a permit is released.
 *
 * @example
 * ```ts
 * const semaphore = new Semaphore(3)
 * await semaphore.acquire()
 * try {
 *   await client.blobs.upload(path, bytes)
 * } finally {
 *   semaphore.release()
 * }
 * ```
 */
export class Semaphore {
	private permits: number;
	private waiting: Array<() => void> = [];

	constructor(permits: number) {
		this.permits = permits;
	}

	async acquire(): Promise<void> {
		if (this.permits > 0) {
			this.permits--;
			return;
		}
		return new Promise<void>(resolve => {
			this.waiting.push(resolve);
		});
	}

	release(): void {
		const next = this.waiting.shift();
		if (next) {
			next();
		} else {
			this.permits++;
		}
	}
}

/**
 * Map over array with controlled concurrency. Results keep input order.
 *
 * @example
 * ```ts
 * const uploaded = await parallel_map(files, f => client.blobs.upload(f.path, f.bytes), 4)
 * ```
 */
export const parallel_map = async <T, R>(items: T[], mapper: (item: T, index: number) => Promise<R>, concurrency: number): Promise<R[]> => {
	const semaphore = new Semaphore(Math.max(1, concurrency));
	const results: R[] = new Array(items.length);

	await Promise.all(
		items.map(async (item, index) => {
			await semaphore.acquire();
			try {
				results[index] = await mapper(item, index);
			} finally {
				semaphore.release();
			}
		})
	);

	return results;
};

/**
 * Wait for `ms` milliseconds. Resolves `false` as soon as `signal` aborts
 * (or immediately when it already has), `true` otherwise.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<boolean> => {
	if (signal?.aborted) return Promise.resolve(false);
	return new Promise<boolean>(resolve => {
		const on_abort = () => {
			clearTimeout(timer);
			resolve(false);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", on_abort);
			resolve(true);
		}, ms);
		signal?.addEventListener("abort", on_abort, { once: true });
	});
};

export type PollOpts<T> = {
	/** Delay between checks */
	interval_ms: number;
	/** Overall budget; unbounded when omitted */
	timeout_ms?: number;
	signal?: AbortSignal;
	/** Operation name and target id reported in `timeout` / `cancelled` errors */
	operation: string;
	id: string;
	/** Describes the last observed value in a `timeout` error */
	status_of?: (value: T) => string;
};

/**
 * Re-run `check` until `done` accepts its value, the budget runs out, or the
 * signal aborts. The first check runs immediately. Errors from `check` end the
 * loop unchanged; nothing is retried.
 *
 * @example
 * ```ts
 * // wait until a dropped reference table is gone
 * const gone = await poll_until(
 *   () => client.ref_tables.exists('Prices'),
 *   exists => !exists,
 *   { interval_ms: 500, timeout_ms: 10_000, operation: 'ref_table_delete', id: 'Prices' }
 * )
 * ```
 */
export const poll_until = async <T>(check: () => Promise<Result<T>>, done: (value: T) => boolean, opts: PollOpts<T>): Promise<Result<T>> => {
	const started = Date.now();
	const cancelled: SyncError = { kind: "cancelled", operation: opts.operation, id: opts.id };
	if (opts.signal?.aborted) return err(cancelled);

	while (true) {
		const result = await check();
		if (!result.ok) return result;
		if (done(result.value)) return ok(result.value);

		const elapsed_ms = Date.now() - started;
		let wait_ms = opts.interval_ms;
		if (opts.timeout_ms !== undefined) {
			if (elapsed_ms >= opts.timeout_ms) {
				return err({
					kind: "timeout",
					operation: opts.operation,
					id: opts.id,
					elapsed_ms,
					last_status: opts.status_of?.(result.value),
				});
			}
			wait_ms = Math.min(wait_ms, opts.timeout_ms - elapsed_ms);
		}

		const slept = await sleep(wait_ms, opts.signal);
		if (!slept) return err(cancelled);
	}
};
