import { describe, test, expect, vi, afterEach } from "vitest";
import { create_client, create_http_client } from "../../client";
import { create_memory_transport } from "../../transport/memory";
import { parse_config } from "../../config";
import { unwrap } from "../../result";

describe("create_client", () => {
	test("build without a transport throws", () => {
		expect(() => create_client().with_options({ workspace: "Demo" }).build()).toThrow("Transport is required. Call with_transport() first.");
	});

	test("build without options throws", () => {
		expect(() => create_client().with_transport(create_memory_transport()).build()).toThrow("Options are required. Call with_options() first.");
	});

	test("components share one transport", async () => {
		const transport = create_memory_transport({
			signals: [{ name: "Oil rate", kind: "TimeDependent", unit: "bbl/d", measurement: "Liquid rate" }],
			workflows: { Nightly: ["Completed"] },
		});
		const client = create_client().with_transport(transport).with_options({ workspace: "Demo", chunk_size: 100, poll_interval_ms: 1 }).build();

		expect(client.transport).toBe(transport);
		expect(unwrap(await client.signals.write("Oil rate", [{ Entity: "Well-1", Date: "2022-08-01", "Oil rate": 1 }]))).toEqual({ written: 1, skipped: 0 });
		expect(unwrap(await client.ref_tables.write("T", [{ Key: "0", A: 1 }])).created).toBe(true);
		expect(unwrap(await client.blobs.upload("a.txt", "x")).path).toBe("a.txt");
		expect(unwrap(await client.workflows.run("Nightly")).status).toBe("Completed");
	});
});

describe("create_http_client", () => {
	afterEach(() => {
		vi.unstubAllGlobals();
	});

	test("builds an HTTP client from configuration", async () => {
		const urls: string[] = [];
		vi.stubGlobal("fetch", async (input: string | URL | Request) => {
			urls.push(String(input));
			return new Response('["a.txt"]', { status: 200 });
		});
		const config = unwrap(parse_config({ base_url: "https://platform.example.com", workspace: "Demo", token: "test-token" }));

		const client = create_http_client(config);

		expect(await client.blobs.list()).toEqual({ ok: true, value: [{ path: "a.txt", size_bytes: null, last_modified: null }] });
		expect(urls).toEqual(["https://platform.example.com/API/Demo/Files"]);
	});
});
