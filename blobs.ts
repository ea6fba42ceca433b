/**
 * @module Blobs
 * @description Path-addressed file store with folder semantics derived from path prefixes.
 */

import { readdir, readFile } from "node:fs/promises";
import { join, relative, sep } from "node:path";
import { z } from "zod";
import { object_codec } from "./codec";
import { parallel_map } from "./concurrency";
import { collect, to_error, try_catch, try_catch_async } from "./result";
import { ok, err, type Codec, type Result, type SyncError, type Transport } from "./types";
import { create_emitter, encode_segment, in_folder, normalize_blob_path, parse_timestamp } from "./utils";

/**
 * A stored blob. Folders are not stored; they are the shared prefixes of paths.
 * @category Types
 * @group Blob Types
 */
export type BlobEntry = {
	path: string;
	/** Null when the listing reports names only */
	size_bytes: number | null;
	last_modified: Date | null;
};

export type DownloadMode = "raw" | "text" | "json" | "object";

export type BlobStore = {
	list: (prefix?: string) => Promise<Result<BlobEntry[]>>;
	upload: (path: string, content: Uint8Array | string) => Promise<Result<BlobEntry>>;
	upload_object: (path: string, value: unknown) => Promise<Result<BlobEntry>>;
	upload_tree: (local_root: string, dest_prefix?: string) => Promise<Result<BlobEntry[]>>;
	download: {
		(path: string, mode?: "raw"): Promise<Result<Uint8Array>>;
		(path: string, mode: "text"): Promise<Result<string>>;
		(path: string, mode: "json" | "object"): Promise<Result<unknown>>;
	};
	download_as: <T>(path: string, codec: Codec<T>) => Promise<Result<T>>;
	delete: (path: string) => Promise<Result<void>>;
	delete_by_prefix: (prefix: string) => Promise<Result<number>>;
};

export type BlobStoreOptions = {
	/** Parallel uploads in `upload_tree` */
	upload_concurrency?: number;
};

const RemoteListingSchema = z.array(
	z.union([
		z.string(),
		z.object({
			Name: z.string(),
			Size: z.number().nullish(),
			LastModified: z.string().nullish(),
		}),
	])
);

const to_entry = (raw: z.infer<typeof RemoteListingSchema>[number]): BlobEntry =>
	typeof raw === "string"
		? { path: normalize_blob_path(raw), size_bytes: null, last_modified: null }
		: { path: normalize_blob_path(raw.Name), size_bytes: raw.Size ?? null, last_modified: parse_timestamp(raw.LastModified) };

/** Every regular file under `root`, depth first, as paths relative to `root`. */
async function walk(root: string, dir = root): Promise<string[]> {
	const entries = await readdir(dir, { withFileTypes: true });
	const files: string[] = [];
	for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
		const full = join(dir, entry.name);
		if (entry.isDirectory()) files.push(...(await walk(root, full)));
		else if (entry.isFile()) files.push(relative(root, full));
	}
	return files;
}

/**
 * Creates the blob store client.
 * @category Core
 * @group Blobs
 *
 * Uploading to an existing path overwrites it. `delete_by_prefix('a')` removes
 * `a` and everything under `a/`, but not `ab.txt`; an unknown prefix is a no-op.
 *
 * @example
 * ```ts
 * const blobs = create_blob_store(transport, { upload_concurrency: 4 })
 * await blobs.upload_tree('./reports', 'reports/2022')
 * const csv = await blobs.download('reports/2022/q1.csv', 'text')
 * const removed = await blobs.delete_by_prefix('reports/2022')
 * ```
 */
export function create_blob_store(transport: Transport, options: BlobStoreOptions = {}): BlobStore {
	const emit = create_emitter(transport.on_event);
	const concurrency = options.upload_concurrency ?? 4;

	const fail = (error: SyncError): Result<never> => {
		emit({ type: "error", error });
		return err(error);
	};

	const file_path = (path: string) => `Files/${normalize_blob_path(path).split("/").map(encode_segment).join("/")}`;

	async function list(prefix?: string): Promise<Result<BlobEntry[]>> {
		const response = await transport.get("Files");
		if (!response.ok) return response;
		const parsed = RemoteListingSchema.safeParse(response.value ?? []);
		if (!parsed.success) return fail({ kind: "invalid_response", operation: "blob_list", message: parsed.error.message });
		const entries = parsed.data.map(to_entry);
		return ok(prefix === undefined ? entries : entries.filter(entry => in_folder(entry.path, prefix)));
	}

	async function upload(path: string, content: Uint8Array | string): Promise<Result<BlobEntry>> {
		const name = normalize_blob_path(path);
		const bytes = typeof content === "string" ? new TextEncoder().encode(content) : content;
		const response = await transport.post("Files/Upload", undefined, { files: { file: { filename: name, content: bytes } } });
		if (!response.ok) return response;
		emit({ type: "blob_upload", path: name, size_bytes: bytes.byteLength });
		return ok({ path: name, size_bytes: bytes.byteLength, last_modified: null });
	}

	async function fetch_bytes(path: string): Promise<Result<Uint8Array>> {
		const response = await transport.get(file_path(path), { format: "bytes" });
		if (!response.ok) return response;
		if (!(response.value instanceof Uint8Array)) {
			return fail({ kind: "invalid_response", operation: "blob_download", message: `expected bytes for '${path}'` });
		}
		return ok(response.value);
	}

	async function download_as<T>(path: string, codec: Codec<T>): Promise<Result<T>> {
		const bytes = await fetch_bytes(path);
		if (!bytes.ok) return bytes;
		const decoded = try_catch(
			() => codec.decode(bytes.value),
			(e): SyncError => ({ kind: "decode_error", path: normalize_blob_path(path), mode: codec.content_type, cause: to_error(e) })
		);
		if (!decoded.ok) return fail(decoded.error);
		return decoded;
	}

	function download(path: string, mode?: "raw"): Promise<Result<Uint8Array>>;
	function download(path: string, mode: "text"): Promise<Result<string>>;
	function download(path: string, mode: "json" | "object"): Promise<Result<unknown>>;
	async function download(path: string, mode: DownloadMode = "raw"): Promise<Result<unknown>> {
		const bytes = await fetch_bytes(path);
		if (!bytes.ok) return bytes;
		if (mode === "raw") return bytes;

		const decoded = try_catch(
			(): unknown => {
				if (mode === "object") return object_codec().decode(bytes.value);
				const text = new TextDecoder("utf-8", { fatal: true }).decode(bytes.value);
				return mode === "json" ? JSON.parse(text) : text;
			},
			(e): SyncError => ({ kind: "decode_error", path: normalize_blob_path(path), mode, cause: to_error(e) })
		);
		if (!decoded.ok) return fail(decoded.error);
		return decoded;
	}

	async function remove(path: string): Promise<Result<void>> {
		const name = normalize_blob_path(path);
		const response = await transport.delete(file_path(name));
		if (!response.ok) return response;
		emit({ type: "blob_delete", path: name });
		return ok(undefined);
	}

	return {
		list,
		upload,

		upload_object: (path, value) => upload(path, object_codec().encode(value)),

		async upload_tree(local_root, dest_prefix = "") {
			const files = await try_catch_async(
				() => walk(local_root),
				(e): SyncError => ({ kind: "io_error", path: local_root, cause: to_error(e) })
			);
			if (!files.ok) return fail(files.error);

			const uploaded = await parallel_map(
				files.value,
				async (file): Promise<Result<BlobEntry>> => {
					const bytes = await try_catch_async(
						() => readFile(join(local_root, file)),
						(e): SyncError => ({ kind: "io_error", path: join(local_root, file), cause: to_error(e) })
					);
					if (!bytes.ok) return fail(bytes.error);
					return upload(`${dest_prefix}/${file.split(sep).join("/")}`, new Uint8Array(bytes.value));
				},
				concurrency
			);
			return collect(uploaded);
		},

		download,
		download_as,
		delete: remove,

		async delete_by_prefix(prefix) {
			const folder = normalize_blob_path(prefix);
			if (!folder) return ok(0);
			const entries = await list(folder);
			if (!entries.ok) return entries;

			let removed = 0;
			for (const entry of entries.value) {
				const result = await remove(entry.path);
				if (!result.ok) return result;
				removed++;
			}
			return ok(removed);
		},
	};
}
