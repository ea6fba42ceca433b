import { describe, test, expect, vi, afterEach } from "vitest";
import {
	match,
	unwrap_or,
	unwrap,
	unwrap_err,
	try_catch,
	try_catch_async,
	fetch_result,
	collect,
	to_nullable,
	format_error,
	to_error,
	type FetchError,
} from "../../result";
import { ok, err, type Result } from "../../types";

const mock_fetch = (fn: (input: string | URL | Request, init?: RequestInit) => Promise<Response>) => {
	const spy = vi.fn(fn);
	vi.stubGlobal("fetch", spy);
	return spy;
};

describe("Result Utilities", () => {
	describe("match", () => {
		test("calls on_ok for success result", () => {
			const output = match(
				ok(42),
				value => `success: ${value}`,
				error => `error: ${error}`
			);
			expect(output).toBe("success: 42");
		});

		test("calls on_err for error result", () => {
			const output = match(
				err("something went wrong"),
				value => `success: ${value}`,
				error => `error: ${error}`
			);
			expect(output).toBe("error: something went wrong");
		});

		test("transforms error value to different type", () => {
			const output = match(
				err({ code: 404, message: "Not found" }),
				() => null,
				error => error.code
			);
			expect(output).toBe(404);
		});
	});

	describe("unwrap_or", () => {
		test("returns value for ok result", () => {
			expect(unwrap_or(ok(42), 0)).toBe(42);
		});

		test("returns default for error result", () => {
			const result: Result<number, string> = err("error");
			expect(unwrap_or(result, 100)).toBe(100);
		});
	});

	describe("unwrap", () => {
		test("returns value for ok result", () => {
			expect(unwrap(ok({ id: 1 }))).toEqual({ id: 1 });
		});

		test("includes error in thrown message", () => {
			expect(() => unwrap(err({ kind: "invalid_config", message: "bad" }))).toThrow(
				'unwrap called on error result: {"kind":"invalid_config","message":"bad"}'
			);
		});
	});

	describe("unwrap_err", () => {
		test("returns error for error result", () => {
			expect(unwrap_err(err("failure"))).toBe("failure");
		});

		test("includes value in thrown message", () => {
			expect(() => unwrap_err(ok(7))).toThrow("unwrap_err called on ok result: 7");
		});
	});

	describe("try_catch", () => {
		test("returns ok for successful function", () => {
			const result = try_catch(
				() => JSON.parse('{"a":1}'),
				() => "parse failed"
			);
			expect(result).toEqual({ ok: true, value: { a: 1 } });
		});

		test("maps thrown exception through on_error", () => {
			const result = try_catch(
				() => JSON.parse("not json"),
				e => (e instanceof SyntaxError ? "syntax" : "other")
			);
			expect(result).toEqual({ ok: false, error: "syntax" });
		});
	});

	describe("try_catch_async", () => {
		test("returns ok for resolved promise", async () => {
			const result = await try_catch_async(
				async () => "done",
				() => "failed"
			);
			expect(result).toEqual({ ok: true, value: "done" });
		});

		test("returns error for rejected promise", async () => {
			const result = await try_catch_async(
				() => Promise.reject(new Error("boom")),
				e => format_error(e)
			);
			expect(result).toEqual({ ok: false, error: "boom" });
		});
	});

	describe("fetch_result", () => {
		afterEach(() => {
			vi.unstubAllGlobals();
		});

		test("returns ok for successful fetch with JSON", async () => {
			mock_fetch(() => Promise.resolve(new Response(JSON.stringify({ data: "test" }), { status: 200 })));

			const result = await fetch_result("https://platform.example.com/data", undefined, e => e);

			expect(result).toEqual({ ok: true, value: { data: "test" } });
		});

		test("returns HTTP error with the response body", async () => {
			mock_fetch(() => Promise.resolve(new Response("Signal not found", { status: 404, statusText: "Not Found" })));

			const result = await fetch_result<unknown, FetchError>("https://platform.example.com/missing", undefined, e => e);

			expect(result).toEqual({ ok: false, error: { type: "http", status: 404, status_text: "Not Found", body: "Signal not found" } });
		});

		test("returns network error for fetch failure", async () => {
			mock_fetch(() => Promise.reject(new Error("Network failure")));

			const result = await fetch_result<unknown, FetchError>("https://platform.example.com/data", undefined, e => e);

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.type).toBe("network");
			}
		});

		test("returns parse error when JSON parsing fails", async () => {
			mock_fetch(() => Promise.resolve(new Response("not json", { status: 200 })));

			const result = await fetch_result<unknown, string>("https://platform.example.com/data", undefined, e => e.type);

			expect(result).toEqual({ ok: false, error: "parse" });
		});

		test("uses custom body parser", async () => {
			mock_fetch(() => Promise.resolve(new Response("plain text response", { status: 200 })));

			const result = await fetch_result<string, FetchError>(
				"https://platform.example.com/text",
				undefined,
				e => e,
				response => response.text()
			);

			expect(result).toEqual({ ok: true, value: "plain text response" });
		});

		test("passes request init options", async () => {
			const spy = mock_fetch(() => Promise.resolve(new Response("{}", { status: 200 })));

			await fetch_result(
				"https://platform.example.com/data",
				{
					method: "POST",
					headers: { "Content-Type": "application/json" },
					body: JSON.stringify({ key: "value" }),
				},
				e => e
			);

			const init = spy.mock.calls[0]?.[1];
			expect(init?.method).toBe("POST");
			expect(init?.headers).toEqual({ "Content-Type": "application/json" });
		});
	});

	describe("collect", () => {
		test("gathers values of ok results in order", () => {
			expect(collect([ok(1), ok(2), ok(3)])).toEqual({ ok: true, value: [1, 2, 3] });
		});

		test("returns the first error", () => {
			const results: Result<number, string>[] = [ok(1), err("second"), err("third")];
			expect(collect(results)).toEqual({ ok: false, error: "second" });
		});

		test("collects an empty list to an empty array", () => {
			expect(collect([])).toEqual({ ok: true, value: [] });
		});
	});

	describe("to_nullable", () => {
		test("returns value or null", () => {
			expect(to_nullable(ok("x"))).toBe("x");
			expect(to_nullable(err("e"))).toBeNull();
		});
	});

	describe("format_error and to_error", () => {
		test("format_error reads Error messages and stringifies the rest", () => {
			expect(format_error(new Error("disk full"))).toBe("disk full");
			expect(format_error(404)).toBe("404");
		});

		test("to_error keeps Errors and wraps other values", () => {
			const original = new TypeError("bad");
			expect(to_error(original)).toBe(original);
			expect(to_error("text").message).toBe("text");
		});
	});
});
