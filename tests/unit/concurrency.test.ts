import { describe, test, expect } from "vitest";
import { Semaphore, parallel_map, sleep, poll_until } from "../../concurrency";
import { ok, err, type Result } from "../../types";

const wait = (ms: number) => new Promise(r => setTimeout(r, ms));

describe("Concurrency Utilities", () => {
	describe("Semaphore", () => {
		test("blocks when no permits available", async () => {
			const semaphore = new Semaphore(1);
			await semaphore.acquire();

			let acquired = false;
			const pending = semaphore.acquire().then(() => {
				acquired = true;
			});

			await wait(10);
			expect(acquired).toBe(false);

			semaphore.release();
			await pending;
			expect(acquired).toBe(true);
		});

		test("multiple waiters are processed in order", async () => {
			const semaphore = new Semaphore(1);
			await semaphore.acquire();

			const order: number[] = [];
			const pending = [1, 2, 3].map(n =>
				semaphore.acquire().then(() => {
					order.push(n);
					semaphore.release();
				})
			);

			semaphore.release();
			await Promise.all(pending);

			expect(order).toEqual([1, 2, 3]);
		});

		test("works with zero initial permits", async () => {
			const semaphore = new Semaphore(0);

			let acquired = false;
			const pending = semaphore.acquire().then(() => {
				acquired = true;
			});

			await wait(10);
			expect(acquired).toBe(false);

			semaphore.release();
			await pending;
			expect(acquired).toBe(true);
		});
	});

	describe("parallel_map", () => {
		test("respects concurrency limit", async () => {
			const concurrent: number[] = [];
			let max_concurrent = 0;

			const items = Array.from({ length: 10 }, (_, i) => i);
			await parallel_map(
				items,
				async (x, index) => {
					concurrent.push(index);
					max_concurrent = Math.max(max_concurrent, concurrent.length);
					await wait(10);
					concurrent.splice(concurrent.indexOf(index), 1);
					return x * 2;
				},
				3
			);

			expect(max_concurrent).toBe(3);
		});

		test("returns results in original order", async () => {
			const items = [5, 1, 3, 2, 4];
			const results = await parallel_map(
				items,
				async x => {
					await wait(x * 5);
					return x * 10;
				},
				2
			);
			expect(results).toEqual([50, 10, 30, 20, 40]);
		});

		test("handles errors in individual mappers", async () => {
			await expect(
				parallel_map(
					[1, 2, 3],
					async x => {
						if (x === 2) throw new Error("failed on 2");
						return x;
					},
					2
				)
			).rejects.toThrow("failed on 2");
		});

		test("works with empty array", async () => {
			const results = await parallel_map([] as number[], async x => x * 2, 3);
			expect(results).toEqual([]);
		});

		test("treats concurrency below one as sequential", async () => {
			const order: string[] = [];
			await parallel_map(
				[1, 2],
				async x => {
					order.push(`start ${x}`);
					await wait(5);
					order.push(`end ${x}`);
					return x;
				},
				0
			);
			expect(order).toEqual(["start 1", "end 1", "start 2", "end 2"]);
		});

		test("passes index to mapper function", async () => {
			const results = await parallel_map(["a", "b", "c"], async (item, index) => `${item}-${index}`, 2);
			expect(results).toEqual(["a-0", "b-1", "c-2"]);
		});
	});

	describe("sleep", () => {
		test("resolves true after the delay", async () => {
			expect(await sleep(5)).toBe(true);
		});

		test("resolves false when the signal aborts", async () => {
			const controller = new AbortController();
			const pending = sleep(10_000, controller.signal);
			controller.abort();
			expect(await pending).toBe(false);
		});

		test("resolves false immediately for an aborted signal", async () => {
			expect(await sleep(10_000, AbortSignal.abort())).toBe(false);
		});
	});

	describe("poll_until", () => {
		const counter = (values: string[]) => {
			let calls = 0;
			const check = async (): Promise<Result<string>> => {
				const value = values[Math.min(calls, values.length - 1)] ?? "";
				calls++;
				return ok(value);
			};
			return { check, calls: () => calls };
		};

		test("returns the first accepted value", async () => {
			const { check, calls } = counter(["a", "b", "done", "later"]);
			const result = await poll_until(check, v => v === "done", { interval_ms: 1, operation: "probe", id: "x" });
			expect(result).toEqual({ ok: true, value: "done" });
			expect(calls()).toBe(3);
		});

		test("checks once before waiting", async () => {
			const { check, calls } = counter(["done"]);
			const result = await poll_until(check, v => v === "done", { interval_ms: 60_000, operation: "probe", id: "x" });
			expect(result.ok).toBe(true);
			expect(calls()).toBe(1);
		});

		test("times out with the last observed status", async () => {
			const { check } = counter(["pending"]);
			const result = await poll_until(check, v => v === "done", {
				interval_ms: 5,
				timeout_ms: 20,
				operation: "await_completion",
				id: "execution-1",
				status_of: v => v.toUpperCase(),
			});

			expect(result.ok).toBe(false);
			if (!result.ok && result.error.kind === "timeout") {
				expect(result.error.operation).toBe("await_completion");
				expect(result.error.id).toBe("execution-1");
				expect(result.error.last_status).toBe("PENDING");
				expect(result.error.elapsed_ms).toBeGreaterThanOrEqual(20);
			} else {
				throw new Error("expected a timeout error");
			}
		});

		test("returns cancelled when the signal aborts between checks", async () => {
			const controller = new AbortController();
			const { check } = counter(["pending"]);
			setTimeout(() => controller.abort(), 10);

			const result = await poll_until(check, v => v === "done", {
				interval_ms: 1_000,
				signal: controller.signal,
				operation: "await_completion",
				id: "execution-2",
			});

			expect(result).toEqual({ ok: false, error: { kind: "cancelled", operation: "await_completion", id: "execution-2" } });
		});

		test("returns cancelled without checking when already aborted", async () => {
			const { check, calls } = counter(["done"]);
			const result = await poll_until(check, () => true, {
				interval_ms: 1,
				signal: AbortSignal.abort(),
				operation: "probe",
				id: "x",
			});
			expect(result.ok).toBe(false);
			expect(calls()).toBe(0);
		});

		test("passes check errors through unchanged", async () => {
			const failure: Result<string> = err({ kind: "remote_failure", method: "GET", path: "WorkflowExecution/execution-9", status: 500, message: "busy" });
			let calls = 0;
			const result = await poll_until(
				async () => {
					calls++;
					return failure;
				},
				() => true,
				{ interval_ms: 1, operation: "probe", id: "x" }
			);
			expect(result).toEqual(failure);
			expect(calls).toBe(1);
		});
	});
});
