/**
 * @module Transport Base
 * @description Shared request plumbing for transport implementations.
 */

import type { EventHandler, FilePart, HttpMethod, QueryValue, RequestOpts, ResponseFormat, Result, Transport } from "../types";
import { ok } from "../types";
import { create_emitter } from "../utils";

export type TransportRequest = {
	method: HttpMethod;
	/** Workspace-relative path without a leading slash */
	path: string;
	body?: unknown;
	/** Multipart file fields; set only for uploads */
	files?: Record<string, FilePart>;
	query: Record<string, QueryValue>;
	format: ResponseFormat;
};

export type TransportResponse = {
	status: number;
	body: unknown;
};

/** Performs one request; implementations differ only here. */
export type RequestHandler = (request: TransportRequest) => Promise<Result<TransportResponse>>;

/**
 * Wrap a request handler into a `Transport`, emitting `request`, `response`
 * and `error` events around every call.
 */
export function create_transport(handler: RequestHandler, on_event?: EventHandler): Transport {
	const emit = create_emitter(on_event);

	async function send(method: HttpMethod, path: string, body: unknown, opts: RequestOpts = {}): Promise<Result<unknown>> {
		const request: TransportRequest = {
			method,
			path: path.replace(/^\/+/, ""),
			body,
			files: opts.files,
			query: opts.query ?? {},
			format: opts.format ?? "json",
		};
		const started = Date.now();
		emit({ type: "request", method, path: request.path });

		const result = await handler(request);
		if (!result.ok) {
			emit({ type: "error", error: result.error });
			return result;
		}
		emit({ type: "response", method, path: request.path, status: result.value.status, duration_ms: Date.now() - started });
		return ok(result.value.body);
	}

	return {
		get: (path, opts) => send("GET", path, undefined, opts),
		put: (path, data, opts) => send("PUT", path, data, opts),
		post: (path, data, opts) => send("POST", path, data, opts),
		delete: (path, opts) => send("DELETE", path, undefined, opts),
		on_event,
	};
}

/** Query pairs with a value, stringified the way they go on the wire. */
export const query_entries = (query: Record<string, QueryValue>): Array<[string, string]> =>
	Object.entries(query).flatMap(([name, value]): Array<[string, string]> => (value === undefined ? [] : [[name, String(value)]]));
