/**
 * @module Signals
 * @description Reading and writing signal data through a transport.
 */

import { plan_records, index_span, record_key } from "./merge";
import {
	create_range_resolver,
	RemoteRangeSchema,
	to_extent,
	type Extent,
	type QueryWindow,
	type RangeSpec,
} from "./range";
import {
	decode,
	encode_rows,
	encode_series,
	from_wire,
	to_wire,
	type EncodeOpts,
	type IndexedRecord,
	type SeriesInput,
	type Table,
	type TableRow,
} from "./records";
import { kind_info, RemoteSignalSchema, to_descriptor, type SignalDescriptor } from "./signal";
import { ok, err, type Result, type SyncError, type Transport } from "./types";
import { chunk, create_emitter, encode_segment, format_timestamp } from "./utils";

export type SignalsOptions = {
	/** Records per `Save` request; unlimited when omitted */
	chunk_size?: number;
};

export type WriteOpts = EncodeOpts & {
	/** Leave records whose (entity, signal, unit, index) is already stored untouched */
	skip_existing?: boolean;
};

export type WriteSummary = {
	written: number;
	skipped: number;
};

export type ReadOpts = RangeSpec & {
	/** Entities to read; every stored entity when omitted */
	entities?: string[];
	/** Unit to request values in; the signal's storage unit when omitted */
	unit?: string;
};

export type Signals = {
	describe: (name: string) => Promise<Result<SignalDescriptor>>;
	data_range: (name: string, entity?: string) => Promise<Result<Extent | null>>;
	write: (name: string, rows: TableRow[], opts?: WriteOpts) => Promise<Result<WriteSummary>>;
	write_series: (name: string, series: SeriesInput[], opts?: Pick<WriteOpts, "unit" | "skip_existing">) => Promise<Result<WriteSummary>>;
	read: (names: string | string[], opts?: ReadOpts) => Promise<Result<Table>>;
	delete_data: (name: string, entities: string[], range?: RangeSpec) => Promise<Result<void>>;
};

type WindowFields =
	| Record<string, never>
	| { Start: string; End: string; TimeIncrement?: string }
	| { StartDepth: number; EndDepth: number; DepthIncrement?: string };

// no increment means the server answers with stored points as they are
const window_fields = (window: QueryWindow): WindowFields => {
	switch (window.domain) {
		case "time": {
			const fields = { Start: format_timestamp(window.start), End: format_timestamp(window.end) };
			return window.increment === undefined ? fields : { ...fields, TimeIncrement: window.increment };
		}
		case "depth": {
			const fields = { StartDepth: window.start, EndDepth: window.end };
			return window.increment === undefined ? fields : { ...fields, DepthIncrement: window.increment };
		}
		default:
			return {};
	}
};

const span_window = (span: Extent | null): QueryWindow => span ?? { domain: "none" };

/** Earliest start and latest end over `extents`, so an open read covers every signal's data. */
function union_extent(extents: Array<Extent | null>): Extent | null {
	let union: Extent | null = null;
	for (const extent of extents) {
		if (!extent) continue;
		if (!union) {
			union = extent;
		} else if (union.domain === "time" && extent.domain === "time") {
			union = {
				domain: "time",
				start: extent.start < union.start ? extent.start : union.start,
				end: extent.end > union.end ? extent.end : union.end,
			};
		} else if (union.domain === "depth" && extent.domain === "depth") {
			union = { domain: "depth", start: Math.min(union.start, extent.start), end: Math.max(union.end, extent.end) };
		}
	}
	return union;
}

/**
 * Creates the signal data client.
 * @category Core
 * @group Signals
 *
 * Every call re-fetches the signal's descriptor, so a unit or kind changed on
 * the server is picked up by the next write or read. Encoding errors are raised
 * before anything is sent.
 *
 * A `read` of several signals with an open bound fills it from the union of
 * their stored extents: the earliest start and the latest end. Passing `end`
 * (or `start`) narrows it to a common span instead.
 *
 * Within one `write` call records sharing a key are applied in input order
 * (the last one wins). Concurrent writes to the same key from different callers
 * are ordered only by the server; serialize them externally when a
 * `skip_existing` write must not race an overwrite.
 *
 * @example
 * ```ts
 * const signals = create_signals(transport, { chunk_size: 5000 })
 * await signals.write('Oil rate', [
 *   { Entity: 'Well-1', Date: '2022-08-01', 'Oil rate [bbl/d]': 120 },
 * ], { skip_existing: true })
 *
 * const table = await signals.read(['Oil rate', 'Water rate'], { entities: ['Well-1'], increment: 'daily' })
 * ```
 */
export function create_signals(transport: Transport, options: SignalsOptions = {}): Signals {
	const emit = create_emitter(transport.on_event);
	const chunk_size = options.chunk_size ?? 0;

	const fail = (error: SyncError): Result<never> => {
		emit({ type: "error", error });
		return err(error);
	};

	async function describe(name: string): Promise<Result<SignalDescriptor>> {
		const response = await transport.get(`Signals/${encode_segment(name)}`);
		if (!response.ok) return response;
		const parsed = RemoteSignalSchema.safeParse(response.value);
		if (!parsed.success) return fail({ kind: "invalid_response", operation: "describe", message: parsed.error.message });
		const descriptor = to_descriptor(parsed.data);
		if (!descriptor.ok) return fail(descriptor.error);
		return descriptor;
	}

	async function fetch_range(descriptor: SignalDescriptor, entity?: string): Promise<Result<Extent | null>> {
		const info = kind_info(descriptor.kind);
		if (info.domain === "none") return ok(null);
		const suffix = entity === undefined ? "" : `/${encode_segment(entity)}`;
		const response = await transport.get(`Data/${info.route}/Range/${encode_segment(descriptor.name)}${suffix}`);
		if (!response.ok) return response;
		const parsed = RemoteRangeSchema.safeParse(response.value);
		if (!parsed.success) return fail({ kind: "invalid_response", operation: "data_range", message: parsed.error.message });
		const extent = to_extent(descriptor.kind, parsed.data);
		if (!extent.ok) return fail(extent.error);
		return extent;
	}

	async function retrieve(descriptors: SignalDescriptor[], window: QueryWindow, entities: string[] | undefined, unit?: string): Promise<Result<IndexedRecord[]>> {
		if (window.domain === "empty" || descriptors.length === 0) return ok([]);

		const by_route = new Map<string, SignalDescriptor[]>();
		for (const descriptor of descriptors) {
			const { route } = kind_info(descriptor.kind);
			by_route.set(route, [...(by_route.get(route) ?? []), descriptor]);
		}

		const records: IndexedRecord[] = [];
		for (const [route, group] of by_route) {
			const [first] = group;
			if (!first) continue;
			const body = {
				Combinations: {
					Entities: entities,
					Signals: group.map(descriptor => ({ Signal: descriptor.name, Unit: unit ?? descriptor.unit })),
				},
				...window_fields(window),
			};
			const response = await transport.post(`Data/${route}/Retrieve`, body);
			if (!response.ok) return response;
			const decoded = from_wire(first.kind, response.value);
			if (!decoded.ok) return fail(decoded.error);
			records.push(...decoded.value);
		}
		return ok(records);
	}

	async function write_records(descriptor: SignalDescriptor, records: IndexedRecord[], skip_existing: boolean): Promise<Result<WriteSummary>> {
		let existing = new Set<string>();
		if (skip_existing && records.length > 0) {
			// probe only the span being written; anything outside it counts as new
			const entities = [...new Set(records.map(record => record.entity))];
			const units = [...new Set(records.map(record => record.unit))];
			const stored: IndexedRecord[] = [];
			for (const unit of units) {
				const found = await retrieve([descriptor], span_window(index_span(records)), entities, unit);
				if (!found.ok) return found;
				stored.push(...found.value);
			}
			existing = new Set(stored.map(record_key));
		}

		const plan = plan_records(existing, records, skip_existing);
		const { route } = kind_info(descriptor.kind);
		for (const batch of chunk(plan.to_write, chunk_size)) {
			const response = await transport.post(`Data/${route}/Save`, to_wire(descriptor.kind, batch));
			if (!response.ok) return response;
		}

		emit({ type: "signal_write", signal: descriptor.name, kind: descriptor.kind, written: plan.to_write.length, skipped: plan.to_skip.length });
		return ok({ written: plan.to_write.length, skipped: plan.to_skip.length });
	}

	return {
		describe,

		async data_range(name, entity) {
			const descriptor = await describe(name);
			if (!descriptor.ok) return descriptor;
			return fetch_range(descriptor.value, entity);
		},

		async write(name, rows, opts = {}) {
			const descriptor = await describe(name);
			if (!descriptor.ok) return descriptor;
			const records = encode_rows(descriptor.value, rows, opts);
			if (!records.ok) return fail(records.error);
			return write_records(descriptor.value, records.value, opts.skip_existing ?? false);
		},

		async write_series(name, series, opts = {}) {
			const descriptor = await describe(name);
			if (!descriptor.ok) return descriptor;
			const records = encode_series(descriptor.value, series, { unit: opts.unit });
			if (!records.ok) return fail(records.error);
			return write_records(descriptor.value, records.value, opts.skip_existing ?? false);
		},

		async read(names, opts = {}) {
			const descriptors: SignalDescriptor[] = [];
			for (const name of typeof names === "string" ? [names] : names) {
				const descriptor = await describe(name);
				if (!descriptor.ok) return descriptor;
				descriptors.push(descriptor.value);
			}
			const [first] = descriptors;
			if (!first) return ok({ columns: ["Entity"], rows: [] });

			const domains = new Set(descriptors.map(descriptor => kind_info(descriptor.kind).domain));
			if (domains.size > 1) {
				return fail({ kind: "invalid_range_spec", message: `cannot read ${[...domains].join(" and ")} signals into one table` });
			}

			const entity = opts.entities?.length === 1 ? opts.entities[0] : undefined;
			const resolver = create_range_resolver(async (_descriptor, probe_entity) => {
				const extents: Array<Extent | null> = [];
				for (const descriptor of descriptors) {
					const extent = await fetch_range(descriptor, probe_entity);
					if (!extent.ok) return extent;
					extents.push(extent.value);
				}
				return ok(union_extent(extents));
			}, emit);

			const window = await resolver.resolve(first, opts, entity);
			if (!window.ok) return window;

			const records = await retrieve(descriptors, window.value, opts.entities, opts.unit);
			if (!records.ok) return records;
			for (const descriptor of descriptors) {
				const count = records.value.filter(record => record.signal === descriptor.name).length;
				emit({ type: "signal_read", signal: descriptor.name, kind: descriptor.kind, records: count });
			}

			const table = decode(descriptors, records.value, window.value, { entities: opts.entities });
			if (!table.ok) return fail(table.error);
			return table;
		},

		async delete_data(name, entities, range) {
			const descriptor = await describe(name);
			if (!descriptor.ok) return descriptor;
			const info = kind_info(descriptor.value.kind);

			const query: Record<string, string | number> = {};
			if (range && info.domain !== "none") {
				const resolver = create_range_resolver(fetch_range, emit);
				const window = await resolver.resolve(descriptor.value, range);
				if (!window.ok) return window;
				if (window.value.domain === "empty") return ok(undefined);
				if (window.value.domain === "time") {
					query.Start = format_timestamp(window.value.start);
					query.End = format_timestamp(window.value.end);
				} else if (window.value.domain === "depth") {
					query.Start = window.value.start;
					query.End = window.value.end;
				}
			}

			const body = entities.map(entity => ({ Entity: entity, Signal: descriptor.value.name, Unit: descriptor.value.unit }));
			const response = await transport.post(`Data/${info.route}/Delete`, body, { query });
			if (!response.ok) return response;
			emit({ type: "signal_delete", signal: descriptor.value.name, kind: descriptor.value.kind, entities: entities.length });
			return ok(undefined);
		},
	};
}
