import { describe, test, expect, vi, afterEach } from "vitest";
import { build_url, create_http_transport } from "../../transport/http";
import { create_blob_store } from "../../blobs";

type FetchCall = { url: string; init: RequestInit | undefined };

const stub_fetch = (respond: () => Promise<Response>) => {
	const calls: FetchCall[] = [];
	vi.stubGlobal("fetch", async (input: string | URL | Request, init?: RequestInit) => {
		calls.push({ url: String(input), init });
		return respond();
	});
	return calls;
};

const base = { base_url: "https://platform.example.com/", workspace: "Demo Space" };

describe("build_url", () => {
	test("joins base, route, workspace, path and query", () => {
		expect(build_url(base, "RefTables/T/Data", { name: "a/b.txt", skip: undefined })).toBe(
			"https://platform.example.com/API/Demo%20Space/RefTables/T/Data?name=a%2Fb.txt"
		);
	});

	test("an empty route is left out", () => {
		expect(build_url({ ...base, route: "" }, "Files")).toBe("https://platform.example.com/Demo%20Space/Files");
	});
});

describe("HTTP transport", () => {
	afterEach(() => {
		vi.unstubAllGlobals();
	});

	test("sends JSON with a bearer token", async () => {
		const calls = stub_fetch(async () => new Response(JSON.stringify({ Id: "run-1" }), { status: 200 }));
		const transport = create_http_transport({ ...base, token: "test-token" });

		const result = await transport.post("/WorkflowExecution/AddRequest", { WorkflowName: "Nightly" });

		expect(result).toEqual({ ok: true, value: { Id: "run-1" } });
		expect(calls).toEqual([
			{
				url: "https://platform.example.com/API/Demo%20Space/WorkflowExecution/AddRequest",
				init: {
					method: "POST",
					headers: { Accept: "application/json", Authorization: "Bearer test-token", "Content-Type": "application/json" },
					body: '{"WorkflowName":"Nightly"}',
				},
			},
		]);
	});

	test("sends bytes as octet-stream and reads bytes back", async () => {
		const calls = stub_fetch(async () => new Response(new Uint8Array([7, 8]), { status: 200 }));
		const transport = create_http_transport(base);
		const payload = new Uint8Array([1, 2, 3]);

		const result = await transport.post("Exports/Raw", payload, { query: { name: "a.bin" }, format: "bytes" });

		expect(result).toEqual({ ok: true, value: new Uint8Array([7, 8]) });
		expect(calls[0]?.init?.headers).toEqual({ Accept: "*/*", "Content-Type": "application/octet-stream" });
		expect(calls[0]?.init?.body).toBe(payload);
	});

	test("sends files as multipart form data", async () => {
		const calls = stub_fetch(async () => new Response("", { status: 200 }));
		const transport = create_http_transport({ ...base, token: "test-token" });

		await transport.post("Files/Upload", undefined, { files: { file: { filename: "reports/q1.csv", content: new TextEncoder().encode("a,b") } } });

		expect(calls[0]?.url).toBe("https://platform.example.com/API/Demo%20Space/Files/Upload");
		expect(calls[0]?.init?.headers).toEqual({ Accept: "application/json", Authorization: "Bearer test-token" });
		const body = calls[0]?.init?.body;
		if (!(body instanceof FormData)) throw new Error("expected a multipart body");
		const part = body.get("file");
		expect(part).toHaveProperty("name", "reports/q1.csv");
		if (!(part instanceof Blob)) throw new Error("expected a file part");
		expect(await part.text()).toBe("a,b");
	});

	test("an empty JSON body is null", async () => {
		stub_fetch(async () => new Response("", { status: 200 }));
		expect(await create_http_transport(base).delete("Files/a.txt")).toEqual({ ok: true, value: null });
	});

	test("non-2xx responses become remote failures with the body text", async () => {
		stub_fetch(async () => new Response("Signal 'Gas rate' not found", { status: 404, statusText: "Not Found" }));
		const result = await create_http_transport(base).get("Signals/Gas%20rate");
		expect(result).toEqual({
			ok: false,
			error: { kind: "remote_failure", method: "GET", path: "Signals/Gas%20rate", status: 404, message: "Signal 'Gas rate' not found" },
		});
	});

	test("falls back to the status text when the body is empty", async () => {
		stub_fetch(async () => new Response("", { status: 503, statusText: "Service Unavailable" }));
		const result = await create_http_transport(base).get("Files");
		expect(result.ok).toBe(false);
		if (!result.ok && result.error.kind === "remote_failure") expect(result.error.message).toBe("Service Unavailable");
	});

	test("network errors carry the cause message", async () => {
		stub_fetch(() => Promise.reject(new Error("connect ECONNREFUSED")));
		const result = await create_http_transport(base).get("Files");
		expect(result).toEqual({ ok: false, error: { kind: "remote_failure", method: "GET", path: "Files", status: undefined, message: "connect ECONNREFUSED" } });
	});

	test("asks a token provider on every request", async () => {
		const calls = stub_fetch(async () => new Response("[]", { status: 200 }));
		let issued = 0;
		const transport = create_http_transport({ ...base, token: async () => `test-token-${++issued}` });

		await transport.get("Files");
		await transport.get("Files");

		expect(calls.map(call => call.init?.headers)).toEqual([
			{ Accept: "application/json", Authorization: "Bearer test-token-1" },
			{ Accept: "application/json", Authorization: "Bearer test-token-2" },
		]);
	});

	test("a failing token provider stops the request", async () => {
		const calls = stub_fetch(async () => new Response("[]", { status: 200 }));
		const transport = create_http_transport({ ...base, token: () => Promise.reject(new Error("expired")) });

		const result = await transport.get("Files");

		expect(result.ok).toBe(false);
		if (!result.ok && result.error.kind === "remote_failure") expect(result.error.message).toBe("token provider failed: expired");
		expect(calls).toEqual([]);
	});

	test("reports requests and responses through on_event", async () => {
		stub_fetch(async () => new Response("[]", { status: 200 }));
		const seen: string[] = [];
		const transport = create_http_transport({ ...base, on_event: e => seen.push(e.type) });
		await transport.get("Files");
		expect(seen).toEqual(["request", "response"]);
	});
});

describe("Blob store over HTTP", () => {
	afterEach(() => {
		vi.unstubAllGlobals();
	});

	test("keeps folder separators in file paths", async () => {
		const bodies = ["hello", ""];
		const calls = stub_fetch(async () => new Response(bodies.shift() ?? "", { status: 200 }));
		const blobs = create_blob_store(create_http_transport(base));

		expect(await blobs.download("a/b c.txt", "text")).toEqual({ ok: true, value: "hello" });
		expect(await blobs.delete("\\reports\\q1.csv")).toEqual({ ok: true, value: undefined });

		expect(calls.map(call => call.url)).toEqual([
			"https://platform.example.com/API/Demo%20Space/Files/a/b%20c.txt",
			"https://platform.example.com/API/Demo%20Space/Files/reports/q1.csv",
		]);
	});

	test("uploads the path as the file name of a multipart part", async () => {
		const calls = stub_fetch(async () => new Response("", { status: 200 }));
		const blobs = create_blob_store(create_http_transport(base));

		expect(await blobs.upload("reports/q1.csv", "a,b")).toEqual({ ok: true, value: { path: "reports/q1.csv", size_bytes: 3, last_modified: null } });

		expect(calls[0]?.url).toBe("https://platform.example.com/API/Demo%20Space/Files/Upload");
		const body = calls[0]?.init?.body;
		if (!(body instanceof FormData)) throw new Error("expected a multipart body");
		expect(body.get("file")).toHaveProperty("name", "reports/q1.csv");
	});
});
