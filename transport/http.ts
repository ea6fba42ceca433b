/**
 * @module Transports
 * @description HTTP transport against the remote platform.
 */

import { fetch_result, format_error, try_catch_async, type FetchError } from "../result";
import type { EventHandler, FilePart, Transport } from "../types";
import { encode_segment } from "../utils";
import { create_transport, query_entries, type TransportRequest, type TransportResponse } from "./base";

/** A static bearer token, or a function that produces one per request. */
export type TokenSource = string | (() => Promise<string>);

export type HttpTransportOptions = {
	base_url: string;
	workspace: string;
	/** API route segment between the host and the workspace; defaults to `"API"` */
	route?: string;
	token?: TokenSource;
	on_event?: EventHandler;
};

/**
 * Build the absolute URL of a workspace-relative request.
 *
 * @example
 * ```ts
 * build_url({ base_url: 'https://platform.example.com/', workspace: 'Demo' }, 'Data/Time/Delete', { Start: '2022-08-01' })
 * // => 'https://platform.example.com/API/Demo/Data/Time/Delete?Start=2022-08-01'
 * ```
 */
export function build_url(options: Pick<HttpTransportOptions, "base_url" | "workspace" | "route">, path: string, query: TransportRequest["query"] = {}): string {
	const base = options.base_url.replace(/\/+$/, "");
	const route = (options.route ?? "API").replace(/^\/+|\/+$/g, "");
	const prefix = route ? `${base}/${route}` : base;
	const search = new URLSearchParams(query_entries(query)).toString();
	return `${prefix}/${encode_segment(options.workspace)}/${path}${search ? `?${search}` : ""}`;
}

const to_message = (error: FetchError): string => {
	switch (error.type) {
		case "network":
			return format_error(error.cause);
		case "http":
			return error.body || error.status_text || `HTTP ${error.status}`;
		case "parse":
			return `could not parse response: ${format_error(error.cause)}`;
	}
};

const status_of = (error: FetchError): number | undefined => (error.type === "network" ? undefined : error.status);

async function read_body(response: Response, format: TransportRequest["format"]): Promise<TransportResponse> {
	switch (format) {
		case "bytes":
			return { status: response.status, body: new Uint8Array(await response.arrayBuffer()) };
		case "text":
			return { status: response.status, body: await response.text() };
		case "json": {
			const text = await response.text();
			return { status: response.status, body: text.trim() === "" ? null : JSON.parse(text) };
		}
	}
}

// fetch sets the multipart content type with its boundary
function encode_body(body: unknown, files?: Record<string, FilePart>): { body?: Uint8Array | string | FormData; content_type?: string } {
	if (files) {
		const form = new FormData();
		for (const [field, part] of Object.entries(files)) form.append(field, new Blob([new Uint8Array(part.content)]), part.filename);
		return { body: form };
	}
	if (body === undefined) return {};
	if (body instanceof Uint8Array) return { body, content_type: "application/octet-stream" };
	return { body: JSON.stringify(body), content_type: "application/json" };
}

/**
 * Creates a transport that talks to the remote platform over `fetch`.
 * @category Transports
 * @group Transports
 *
 * Requests go to `{base_url}/{route}/{workspace}/{path}?{query}` with a bearer
 * token when one is configured. JSON bodies are serialized, `Uint8Array` bodies
 * are sent as-is and `files` go out as multipart/form-data. Non-2xx responses become `remote_failure` errors carrying the
 * status and the response text.
 *
 * @example
 * ```ts
 * const transport = create_http_transport({
 *   base_url: 'https://platform.example.com',
 *   workspace: 'Demo',
 *   token: process.env.SIGNAL_SYNC_TOKEN,
 *   on_event: e => console.log(`[${e.type}]`, e),
 * })
 * ```
 */
export function create_http_transport(options: HttpTransportOptions): Transport {
	const { token } = options;

	return create_transport(async ({ method, path, body, files, query, format }) => {
		const failure = (message: string, status?: number) => ({ kind: "remote_failure" as const, method, path, status, message });

		const bearer = await try_catch_async(
			async () => (typeof token === "function" ? token() : token),
			e => failure(`token provider failed: ${format_error(e)}`)
		);
		if (!bearer.ok) return bearer;

		const encoded = encode_body(body, files);
		const headers: Record<string, string> = { Accept: format === "json" ? "application/json" : "*/*" };
		if (bearer.value) headers.Authorization = `Bearer ${bearer.value}`;
		if (encoded.content_type) headers["Content-Type"] = encoded.content_type;

		return fetch_result(
			build_url(options, path, query),
			{ method, headers, body: encoded.body },
			e => failure(to_message(e), status_of(e)),
			response => read_body(response, format)
		);
	}, options.on_event);
}
