/**
 * @module Transports
 * @description In-memory stand-in for the remote platform, for tests and offline work.
 */

import { z } from "zod";
import { WireRecordSchema, type WireRecord, type WireValue } from "../records";
import { RemoteRefTableSchema, type RemoteRefTable } from "../ref-tables";
import { SIGNAL_KINDS, kind_info, to_remote_signal, type KindInfo, type SignalDescriptor } from "../signal";
import { ok, err, type EventHandler, type Result, type Transport } from "../types";
import { format_timestamp, normalize_blob_path, parse_timestamp } from "../utils";
import type { WorkflowStatus } from "../workflows";
import { create_transport, type TransportRequest, type TransportResponse } from "./base";

export type MemoryTransportOptions = {
	/** Signals the workspace knows about */
	signals?: SignalDescriptor[];
	/** Status sequence per workflow name; starting yields the first, each poll advances one step */
	workflows?: Record<string, WorkflowStatus[]>;
	on_event?: EventHandler;
};

type StoredPoint = {
	entity: string;
	signal: string;
	unit: string;
	/** Wire form of the index: timestamp string or depth */
	index?: string | number;
	/** Sortable form of the index: epoch ms or depth */
	position: number;
	value: WireValue;
};

type StoredTable = {
	meta: RemoteRefTable;
	rows: Map<string, Array<string | number | null>>;
};

type Execution = {
	script: WorkflowStatus[];
	step: number;
};

const RetrieveSchema = z.object({
	Combinations: z.object({
		Entities: z.array(z.string()).nullish(),
		Signals: z.array(z.object({ Signal: z.string(), Unit: z.string().nullish() })),
	}),
	Start: z.string().optional(),
	End: z.string().optional(),
	StartDepth: z.number().optional(),
	EndDepth: z.number().optional(),
});

const DeleteSchema = z.array(z.object({ Entity: z.string(), Signal: z.string(), Unit: z.string().nullish() }));

const RowsSchema = z.array(z.array(z.union([z.string(), z.number(), z.null()])));

const RowFilterSchema = z.object({
	Entity: z.string().optional(),
	Entities: z.array(z.string()).optional(),
	StartTimestamp: z.string().optional(),
	EndTimestamp: z.string().optional(),
	WhereExpression: z.string().optional(),
});

const StartSchema = z.object({ WorkflowName: z.string() });

const clone = (value: unknown): unknown => (value === undefined ? undefined : JSON.parse(JSON.stringify(value)));

const point_key = (entity: string, signal: string, unit: string, index: string | number | undefined) =>
	[entity, signal, unit, index === undefined ? "" : String(index)].join("\u0000");

const in_range = (position: number, start: number | undefined, end: number | undefined) =>
	(start === undefined || position >= start) && (end === undefined || position <= end);

const time_position = (value: unknown): number | undefined => parse_timestamp(value)?.getTime();

const ROUTES = new Map<string, KindInfo>(SIGNAL_KINDS.map(kind => [kind_info(kind).route, kind_info(kind)]));

/**
 * Creates an in-memory transport that behaves like the remote platform.
 * @category Transports
 * @group Transports
 *
 * Bodies go through a JSON round trip, as they would over the wire. Unknown
 * resources answer with a 404 `remote_failure`. Reads return stored points
 * inside the requested window without resampling to the increment, and
 * `WhereExpression` filters on reference tables are rejected.
 *
 * @example
 * ```ts
 * const transport = create_memory_transport({
 *   signals: [{ name: 'Oil rate', kind: 'TimeDependent', unit: 'bbl/d', measurement: 'Rate' }],
 *   workflows: { 'Nightly rollup': ['Waiting', 'Executing', 'Completed'] },
 * })
 * const client = create_client().with_transport(transport).with_options({ workspace: 'Demo' }).build()
 * ```
 */
export function create_memory_transport(options: MemoryTransportOptions = {}): Transport {
	const signals = new Map((options.signals ?? []).map(descriptor => [descriptor.name, to_remote_signal(descriptor)]));
	const data = new Map<string, Map<string, StoredPoint>>();
	const tables = new Map<string, StoredTable>();
	const blobs = new Map<string, Uint8Array>();
	const executions = new Map<string, Execution>();
	let execution_counter = 0;

	return create_transport(async (request: TransportRequest): Promise<Result<TransportResponse>> => {
		const { method, path, query } = request;
		const segments = path.split("/").map(segment => decodeURIComponent(segment));
		const body = request.body instanceof Uint8Array ? request.body : clone(request.body);

		const fail = (status: number, message: string): Result<never> => err({ kind: "remote_failure", method, path, status, message });
		const respond = (value: unknown, status = 200): Result<TransportResponse> =>
			ok({ status, body: value instanceof Uint8Array ? new Uint8Array(value) : (clone(value) ?? null) });
		const bad_body = (error: z.ZodError) => fail(400, error.message);

		const [resource, ...rest] = segments;

		if (resource === "Signals" && method === "GET" && rest.length === 1) {
			const [name = ""] = rest;
			const signal = signals.get(name);
			return signal ? respond(signal) : fail(404, `signal '${name}' not found`);
		}

		if (resource === "Data") {
			const [route = "", operation = "", ...args] = rest;
			const info = ROUTES.get(route);
			if (!info) return fail(404, `unknown data route '${route}'`);
			let points = data.get(route);
			if (!points) {
				points = new Map();
				data.set(route, points);
			}

			if (operation === "Save" && method === "POST") {
				const parsed = z.array(WireRecordSchema).safeParse(body);
				if (!parsed.success) return bad_body(parsed.error);
				for (const record of parsed.data) {
					if (!signals.has(record.Signal)) return fail(404, `signal '${record.Signal}' not found`);
					const unit = record.Unit ?? "";
					if (!Array.isArray(record.Data)) {
						points.set(point_key(record.Entity, record.Signal, unit, undefined), {
							entity: record.Entity,
							signal: record.Signal,
							unit,
							position: 0,
							value: record.Data,
						});
						continue;
					}
					for (const point of record.Data) {
						const date = parse_timestamp(point.Date);
						const depth = point.Depth === undefined ? undefined : Number(point.Depth);
						const index = info.domain === "time" ? (date ? format_timestamp(date) : undefined) : depth;
						const position = info.domain === "time" ? date?.getTime() : depth;
						if (index === undefined || position === undefined || Number.isNaN(position)) return fail(400, `point of ${record.Entity}/${record.Signal} has no ${info.domain} index`);
						points.set(point_key(record.Entity, record.Signal, unit, index), {
							entity: record.Entity,
							signal: record.Signal,
							unit,
							index,
							position,
							value: point.Value,
						});
					}
				}
				return respond(null);
			}

			if (operation === "Retrieve" && method === "POST") {
				const parsed = RetrieveSchema.safeParse(body);
				if (!parsed.success) return bad_body(parsed.error);
				const { Combinations, Start, End, StartDepth, EndDepth } = parsed.data;
				const entities = Combinations.Entities?.length ? new Set(Combinations.Entities) : undefined;
				const start = info.domain === "time" ? time_position(Start) : StartDepth;
				const end = info.domain === "time" ? time_position(End) : EndDepth;

				const selected = [...points.values()]
					.filter(point => !entities || entities.has(point.entity))
					.filter(point => Combinations.Signals.some(pair => pair.Signal === point.signal && (!pair.Unit || pair.Unit === point.unit)))
					.filter(point => info.domain === "none" || in_range(point.position, start, end))
					.sort((a, b) => a.position - b.position);

				const grouped = new Map<string, WireRecord>();
				for (const point of selected) {
					const key = point_key(point.entity, point.signal, point.unit, undefined);
					const record: WireRecord = grouped.get(key) ?? { Entity: point.entity, Signal: point.signal, Unit: point.unit, Data: info.domain === "none" ? point.value : [] };
					if (Array.isArray(record.Data)) {
						record.Data.push(info.domain === "time" ? { Date: String(point.index), Value: point.value } : { Depth: point.index, Value: point.value });
					}
					grouped.set(key, record);
				}
				return respond([...grouped.values()]);
			}

			if (operation === "Range" && method === "GET") {
				const [signal = "", entity] = args;
				if (!signals.has(signal)) return fail(404, `signal '${signal}' not found`);
				const stored = [...points.values()].filter(point => point.signal === signal && (entity === undefined || point.entity === entity));
				if (info.domain === "none" || stored.length === 0) return respond(null);
				const sorted = stored.sort((a, b) => a.position - b.position);
				const [first] = sorted;
				const last = sorted[sorted.length - 1];
				if (!first || !last) return respond(null);
				return respond({ Start: first.index, End: last.index });
			}

			if (operation === "Delete" && method === "POST") {
				const parsed = DeleteSchema.safeParse(body);
				if (!parsed.success) return bad_body(parsed.error);
				const start = info.domain === "time" ? time_position(query.Start) : query.Start === undefined ? undefined : Number(query.Start);
				const end = info.domain === "time" ? time_position(query.End) : query.End === undefined ? undefined : Number(query.End);
				for (const [key, point] of points) {
					const targeted = parsed.data.some(pair => pair.Entity === point.entity && pair.Signal === point.signal && (!pair.Unit || pair.Unit === point.unit));
					if (targeted && (info.domain === "none" || in_range(point.position, start, end))) points.delete(key);
				}
				return respond(null);
			}
		}

		if (resource === "RefTables") {
			const [name = "", section, format] = rest;

			if (rest.length === 0) {
				if (method === "GET") return respond([...tables.keys()]);
				if (method === "POST") {
					const parsed = RemoteRefTableSchema.safeParse(body);
					if (!parsed.success) return bad_body(parsed.error);
					if (tables.has(parsed.data.Name)) return fail(409, `reference table '${parsed.data.Name}' already exists`);
					const now = format_timestamp(new Date());
					tables.set(parsed.data.Name, { meta: { ...parsed.data, Created: now, Modified: now }, rows: new Map() });
					return respond(null, 201);
				}
			}

			const table = tables.get(name);
			if (!table) return fail(404, `reference table '${name}' not found`);

			if (section === undefined) {
				if (method === "GET") return respond(table.meta);
				if (method === "PUT") {
					const parsed = RemoteRefTableSchema.safeParse(body);
					if (!parsed.success) return bad_body(parsed.error);
					table.meta = { ...parsed.data, Created: table.meta.Created, Modified: format_timestamp(new Date()) };
					return respond(null);
				}
				if (method === "DELETE") {
					tables.delete(name);
					return respond(null);
				}
			}

			if (section === "Data" && format === "String" && method === "PUT") {
				const parsed = RowsSchema.safeParse(body);
				if (!parsed.success) return bad_body(parsed.error);
				const skip = String(query.skipExistingData) === "true";
				for (const row of parsed.data) {
					const [entity = "", timestamp = "", key = ""] = row;
					const date = timestamp === "" || timestamp === null ? null : parse_timestamp(timestamp);
					const row_key = [entity, date ? format_timestamp(date) : "", key].join("\u0000");
					if (skip && table.rows.has(row_key)) continue;
					table.rows.set(row_key, [entity, date ? format_timestamp(date) : "", key, ...row.slice(3)]);
				}
				return respond(null);
			}

			if (section === "Data" && format === undefined && method === "POST") {
				const parsed = RowFilterSchema.safeParse(body ?? {});
				if (!parsed.success) return bad_body(parsed.error);
				const filter = parsed.data;
				if (filter.WhereExpression) return fail(400, "where expressions are not supported by the memory transport");
				const entities = filter.Entities ?? (filter.Entity === undefined ? undefined : [filter.Entity]);
				const start = time_position(filter.StartTimestamp);
				const end = time_position(filter.EndTimestamp);
				const width = 3 + table.meta.Values.length;
				const rows = [...table.rows.values()]
					.filter(([entity]) => !entities || entities.includes(String(entity)))
					.filter(([, timestamp]) => {
						if (start === undefined && end === undefined) return true;
						const position = time_position(timestamp);
						return position !== undefined && in_range(position, start, end);
					})
					.map(row => [...row, ...new Array<null>(Math.max(0, width - row.length)).fill(null)].slice(0, width));
				return respond(rows);
			}

			if (section === "Data" && method === "DELETE") {
				if (format === undefined) {
					table.rows.clear();
					return respond(null);
				}
				if (format === "Timestamp") {
					const start = time_position(query.TimestampStart);
					const end = time_position(query.TimestampEnd);
					const include_blank = String(query.IncludeWithNoTimestamp) === "true";
					for (const [key, [, timestamp]] of table.rows) {
						const position = time_position(timestamp);
						if (position === undefined ? include_blank : in_range(position, start, end)) table.rows.delete(key);
					}
					return respond(null);
				}
			}
		}

		if (resource === "Files") {
			if (rest.length === 0 && method === "GET") return respond([...blobs.keys()]);

			if (rest.length === 1 && rest[0] === "Upload" && method === "POST") {
				const part = request.files?.file;
				if (!part) return fail(400, "upload needs a 'file' part");
				const name = normalize_blob_path(part.filename);
				if (!name) return fail(400, "upload needs a file name");
				blobs.set(name, new Uint8Array(part.content));
				return respond(null);
			}

			const name = normalize_blob_path(rest.join("/"));
			const blob = blobs.get(name);
			if (!blob) return fail(404, `file '${name}' not found`);
			if (method === "GET") return respond(blob);
			if (method === "DELETE") {
				blobs.delete(name);
				return respond(null);
			}
		}

		if (resource === "WorkflowExecution") {
			const [target = ""] = rest;
			if (target === "AddRequest" && method === "POST") {
				const parsed = StartSchema.safeParse(body);
				if (!parsed.success) return bad_body(parsed.error);
				const script = options.workflows?.[parsed.data.WorkflowName];
				const [initial] = script ?? [];
				if (!script || !initial) return fail(404, `workflow '${parsed.data.WorkflowName}' not found`);
				execution_counter++;
				const id = `execution-${execution_counter}`;
				executions.set(id, { script, step: 0 });
				return respond({ Id: id, Status: initial });
			}

			const execution = executions.get(target);
			if (!execution) return fail(404, `execution '${target}' not found`);
			if (method === "GET") {
				execution.step = Math.min(execution.step + 1, execution.script.length - 1);
				return respond({ Id: target, Status: execution.script[execution.step] });
			}
		}

		return fail(404, `no route for ${method} ${path}`);
	}, options.on_event);
}
