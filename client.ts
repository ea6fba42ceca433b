/**
 * @module Core
 * @description Client builder wiring every component to one transport.
 */

import { create_blob_store, type BlobStore } from "./blobs";
import type { ClientConfig } from "./config";
import { create_ref_tables, type RefTables } from "./ref-tables";
import { create_signals, type Signals } from "./signals";
import { create_http_transport, type TokenSource } from "./transport/http";
import type { EventHandler, Transport } from "./types";
import { create_workflow_runner, type WorkflowRunner } from "./workflows";

export type ClientOptions = {
	/** Workspace name sent with workflow start requests */
	workspace: string;
	/** Records or rows per write request; unlimited when omitted */
	chunk_size?: number;
	poll_interval_ms?: number;
	upload_concurrency?: number;
	/** Budget for a newly created reference table to become visible */
	visible_timeout_ms?: number;
};

export type Client = {
	signals: Signals;
	ref_tables: RefTables;
	blobs: BlobStore;
	workflows: WorkflowRunner;
	transport: Transport;
};

export type ClientBuilder = {
	with_transport: (transport: Transport) => ClientBuilder;
	with_options: (options: ClientOptions) => ClientBuilder;
	build: () => Client;
};

/**
 * Creates a new client builder.
 * @category Core
 * @group Builders
 *
 * All components share the transport and its `on_event` handler.
 *
 * @example
 * ```ts
 * const client = create_client()
 *   .with_transport(create_memory_transport({ signals }))
 *   .with_options({ workspace: 'Demo', chunk_size: 5000 })
 *   .build()
 *
 * await client.signals.write('Oil rate', rows)
 * ```
 */
export function create_client(): ClientBuilder {
	let transport: Transport | null = null;
	let options: ClientOptions | null = null;

	const builder: ClientBuilder = {
		with_transport(t) {
			transport = t;
			return builder;
		},

		with_options(o) {
			options = o;
			return builder;
		},

		build() {
			if (!transport) {
				throw new Error("Transport is required. Call with_transport() first.");
			}
			if (!options) {
				throw new Error("Options are required. Call with_options() first.");
			}

			const t = transport;
			const o = options;
			return {
				signals: create_signals(t, { chunk_size: o.chunk_size }),
				ref_tables: create_ref_tables(t, {
					chunk_size: o.chunk_size,
					poll_interval_ms: o.poll_interval_ms,
					visible_timeout_ms: o.visible_timeout_ms,
				}),
				blobs: create_blob_store(t, { upload_concurrency: o.upload_concurrency }),
				workflows: create_workflow_runner(t, { workspace: o.workspace, poll_interval_ms: o.poll_interval_ms }),
				transport: t,
			};
		},
	};

	return builder;
}

export type HttpClientOpts = {
	on_event?: EventHandler;
	/** Overrides `config.token`, e.g. with a refreshing token provider */
	token?: TokenSource;
};

/**
 * Shortcut for a client over the HTTP transport.
 *
 * @example
 * ```ts
 * const config = load_config()
 * if (!config.ok) throw new Error(JSON.stringify(config.error))
 * const client = create_http_client(config.value, { on_event: e => console.log(`[${e.type}]`, e) })
 * ```
 */
export function create_http_client(config: ClientConfig, opts: HttpClientOpts = {}): Client {
	const transport = create_http_transport({
		base_url: config.base_url,
		workspace: config.workspace,
		route: config.route,
		token: opts.token ?? config.token,
		on_event: opts.on_event,
	});
	return create_client()
		.with_transport(transport)
		.with_options({
			workspace: config.workspace,
			chunk_size: config.chunk_size,
			poll_interval_ms: config.poll_interval_ms,
			upload_concurrency: config.upload_concurrency,
		})
		.build();
}
