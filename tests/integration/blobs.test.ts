import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { create_memory_transport } from "../../transport/memory";
import { create_blob_store, type BlobStore } from "../../blobs";
import { json_codec } from "../../codec";
import type { SyncEvent } from "../../types";
import { unwrap } from "../../result";

describe("Blob store over the memory transport", () => {
	let blobs: BlobStore;
	let events: SyncEvent[];

	beforeEach(() => {
		events = [];
		blobs = create_blob_store(create_memory_transport({ on_event: e => events.push(e) }), { upload_concurrency: 2 });
	});

	test("upload reports the stored entry", async () => {
		expect(await blobs.upload("\\reports\\q1.csv", "a,b")).toEqual({
			ok: true,
			value: { path: "reports/q1.csv", size_bytes: 3, last_modified: null },
		});
		expect(events).toContainEqual({ type: "blob_upload", path: "reports/q1.csv", size_bytes: 3 });
	});

	test("list filters by folder prefix", async () => {
		await blobs.upload("a/b.txt", "hello");
		await blobs.upload("a/c/d.txt", "deep");
		await blobs.upload("ab.txt", "x");

		expect(unwrap(await blobs.list("a")).map(entry => entry.path)).toEqual(["a/b.txt", "a/c/d.txt"]);
		expect(unwrap(await blobs.list())).toEqual([
			{ path: "a/b.txt", size_bytes: null, last_modified: null },
			{ path: "a/c/d.txt", size_bytes: null, last_modified: null },
			{ path: "ab.txt", size_bytes: null, last_modified: null },
		]);
	});

	test("delete_by_prefix removes the folder and nothing beside it", async () => {
		await blobs.upload("a/b.txt", "hello");
		await blobs.upload("a/c/d.txt", "deep");
		await blobs.upload("ab.txt", "x");

		expect(await blobs.delete_by_prefix("a")).toEqual({ ok: true, value: 2 });
		expect(unwrap(await blobs.list()).map(entry => entry.path)).toEqual(["ab.txt"]);
		expect(await blobs.delete_by_prefix("missing")).toEqual({ ok: true, value: 0 });
		expect(await blobs.delete_by_prefix("")).toEqual({ ok: true, value: 0 });
	});

	test("uploading to an existing path overwrites it", async () => {
		await blobs.upload("notes.txt", "first");
		await blobs.upload("notes.txt", "second");
		expect(await blobs.download("notes.txt", "text")).toEqual({ ok: true, value: "second" });
	});

	test("download decodes by mode", async () => {
		await blobs.upload("data.json", '{"wells":["Well-1"]}');
		expect(await blobs.download("data.json", "json")).toEqual({ ok: true, value: { wells: ["Well-1"] } });
		expect(await blobs.download("data.json", "text")).toEqual({ ok: true, value: '{"wells":["Well-1"]}' });
		expect(await blobs.download("data.json")).toEqual({ ok: true, value: new TextEncoder().encode('{"wells":["Well-1"]}') });
	});

	test("objects round trip", async () => {
		const value = { at: new Date(Date.UTC(2022, 7, 1)), rates: new Map([["Well-1", 120]]) };
		await blobs.upload_object("state.bin", value);
		expect(await blobs.download("state.bin", "object")).toEqual({ ok: true, value });
	});

	test("content that does not match the mode is a decode_error", async () => {
		await blobs.upload("notes.txt", "not json");
		await blobs.upload("raw.bin", new Uint8Array([0xc3, 0x28]));

		const json = await blobs.download("notes.txt", "json");
		expect(json.ok).toBe(false);
		if (!json.ok) expect(json.error).toMatchObject({ kind: "decode_error", path: "notes.txt", mode: "json" });

		const text = await blobs.download("raw.bin", "text");
		expect(text.ok).toBe(false);
		if (!text.ok) expect(text.error).toMatchObject({ kind: "decode_error", mode: "text" });

		const object = await blobs.download("notes.txt", "object");
		expect(object.ok).toBe(false);
		if (!object.ok) expect(object.error).toMatchObject({ kind: "decode_error", mode: "object" });
	});

	test("download_as validates through the codec", async () => {
		const codec = json_codec(z.object({ wells: z.array(z.string()) }));
		await blobs.upload("good.json", '{"wells":["Well-1"]}');
		await blobs.upload("bad.json", '{"wells":[1]}');

		expect(await blobs.download_as("good.json", codec)).toEqual({ ok: true, value: { wells: ["Well-1"] } });
		const bad = await blobs.download_as("bad.json", codec);
		expect(bad.ok).toBe(false);
		if (!bad.ok) expect(bad.error).toMatchObject({ kind: "decode_error", path: "bad.json", mode: "application/json" });
	});

	test("missing blobs are a remote failure", async () => {
		const result = await blobs.download("nope.txt");
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toMatchObject({ kind: "remote_failure", status: 404 });
		expect((await blobs.delete("nope.txt")).ok).toBe(false);
	});

	test("delete removes one blob", async () => {
		await blobs.upload("a/b.txt", "hello");
		expect(await blobs.delete("a/b.txt")).toEqual({ ok: true, value: undefined });
		expect(await blobs.list()).toEqual({ ok: true, value: [] });
		expect(events).toContainEqual({ type: "blob_delete", path: "a/b.txt" });
	});

	describe("upload_tree", () => {
		let root: string;

		beforeEach(async () => {
			root = await mkdtemp(join(tmpdir(), "signal-sync-"));
			await mkdir(join(root, "sub"));
			await writeFile(join(root, "q1.csv"), "a,b\n1");
			await writeFile(join(root, "sub", "q2.csv"), "x");
		});

		afterEach(async () => {
			await rm(root, { recursive: true, force: true });
		});

		test("mirrors the local tree under the destination prefix", async () => {
			expect(await blobs.upload_tree(root, "reports/2022")).toEqual({
				ok: true,
				value: [
					{ path: "reports/2022/q1.csv", size_bytes: 5, last_modified: null },
					{ path: "reports/2022/sub/q2.csv", size_bytes: 1, last_modified: null },
				],
			});
			expect(await blobs.download("reports/2022/sub/q2.csv", "text")).toEqual({ ok: true, value: "x" });
		});

		test("uploads to the root without a prefix", async () => {
			expect(unwrap(await blobs.upload_tree(root)).map(entry => entry.path)).toEqual(["q1.csv", "sub/q2.csv"]);
		});

		test("a missing local folder is an io_error", async () => {
			const missing = join(root, "absent");
			const result = await blobs.upload_tree(missing);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error).toMatchObject({ kind: "io_error", path: missing });
		});
	});
});
