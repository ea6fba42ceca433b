/**
 * @module RefTables
 * @description Key-addressed tabular store: schema inference, merge-writes and filtered reads.
 */

import { z } from "zod";
import { poll_until } from "./concurrency";
import { plan_merge } from "./merge";
import type { Cell, TableRow } from "./records";
import { ok, err, type Result, type SyncError, type Transport } from "./types";
import { chunk, create_emitter, encode_segment, format_timestamp, parse_column, parse_timestamp } from "./utils";

export type ColumnType = "Numeric" | "String";

export type RefColumn = {
	name: string;
	/** `" "` when dimensionless */
	unit: string;
	type: ColumnType;
};

/**
 * Server-side definition of a reference table. Value columns keep their
 * position across writes; adding one is a schema change.
 * @category Types
 * @group RefTable Types
 */
export type RefTableSchema = {
	name: string;
	description: string;
	key: RefColumn;
	values: RefColumn[];
	labels: string[];
	created: Date | null;
	modified: Date | null;
};

export type RefValue = number | string | null;

/** A stored row; identity is (entity, timestamp, key). */
export type RefRow = {
	entity: string;
	timestamp: Date | null;
	key: string;
	values: Record<string, RefValue>;
};

export type RefWriteOpts = {
	description?: string;
	/** Leave rows whose (entity, timestamp, key) is already stored untouched */
	skip_existing?: boolean;
	key_column?: string;
	entity_column?: string;
	/** Defaults to the first of `Timestamp`, `Date`, `Time` present in the rows */
	timestamp_column?: string;
};

export type RefReadFilter = {
	entities?: string[];
	start?: Date | string;
	end?: Date | string;
	/** Server-side SQL-like WHERE expression */
	where?: string;
};

export type RefRange = {
	start?: Date | string;
	end?: Date | string;
};

export type RefWriteSummary = {
	created: boolean;
	added_columns: string[];
	written: number;
	skipped: number;
};

export type RefTables = {
	list: () => Promise<Result<string[]>>;
	exists: (name: string) => Promise<Result<boolean>>;
	describe: (name: string) => Promise<Result<RefTableSchema>>;
	write: (name: string, rows: TableRow[], opts?: RefWriteOpts) => Promise<Result<RefWriteSummary>>;
	read: (name: string, filter?: RefReadFilter) => Promise<Result<RefRow[]>>;
	delete_rows: (name: string, range?: RefRange) => Promise<Result<void>>;
	delete_table: (name: string) => Promise<Result<void>>;
};

export type RefTablesOptions = {
	/** Rows per data request; unlimited when omitted */
	chunk_size?: number;
	/** Delay between visibility checks after creating a table */
	poll_interval_ms?: number;
	/** Budget for a newly created table to become visible */
	visible_timeout_ms?: number;
};

export const RESERVED_COLUMNS = ["ID", "Entity", "Timestamp"] as const;
const TIMESTAMP_COLUMNS = ["Timestamp", "Date", "Time"];
const DIMENSIONLESS = " ";

const RemoteColumnSchema = z.object({
	Name: z.string(),
	UnitName: z.string().nullish(),
	ColumnType: z.string(),
});

export const RemoteRefTableSchema = z.object({
	Name: z.string(),
	Description: z.string().nullish(),
	Key: RemoteColumnSchema,
	Values: z.array(RemoteColumnSchema),
	Labels: z.array(z.string()).nullish(),
	Created: z.string().nullish(),
	Modified: z.string().nullish(),
});

export type RemoteRefTable = z.infer<typeof RemoteRefTableSchema>;

const RemoteNamesSchema = z.array(z.union([z.string(), z.object({ Name: z.string() })]));

export const RemoteRowsSchema = z.array(z.array(z.union([z.string(), z.number(), z.null()])));

const to_column = (raw: z.infer<typeof RemoteColumnSchema>): RefColumn => ({
	name: raw.Name,
	unit: raw.UnitName ?? DIMENSIONLESS,
	type: raw.ColumnType === "Numeric" ? "Numeric" : "String",
});

const from_column = (column: RefColumn) => ({ Name: column.name, UnitName: column.unit || DIMENSIONLESS, ColumnType: column.type });

export function to_schema(raw: RemoteRefTable): RefTableSchema {
	return {
		name: raw.Name,
		description: raw.Description ?? "",
		key: to_column(raw.Key),
		values: raw.Values.map(to_column),
		labels: raw.Labels ?? [],
		created: parse_timestamp(raw.Created),
		modified: parse_timestamp(raw.Modified),
	};
}

export function to_remote_table(schema: Pick<RefTableSchema, "name" | "description" | "key" | "values" | "labels">): RemoteRefTable {
	return {
		Name: schema.name,
		Description: schema.description,
		Key: from_column(schema.key),
		Values: schema.values.map(from_column),
		Labels: schema.labels,
	};
}

/** Inferred column type; `null` when every cell is blank, which fits either type. */
type InferredType = ColumnType | null;

type InferredColumn = { header: string; name: string; unit: string; type: InferredType };

const is_blank = (value: Cell): boolean => value === null || value === undefined || value === "" || (typeof value === "number" && Number.isNaN(value));

/**
 * Infer a column type: all-numeric (ignoring blanks) is Numeric, anything else String.
 *
 * @example
 * ```ts
 * infer_column_type([1, 2.5, null]) // => 'Numeric'
 * infer_column_type([1, 'two']) // => 'String'
 * infer_column_type([null, undefined]) // => null
 * ```
 */
export function infer_column_type(values: Cell[]): InferredType {
	const present = values.filter(value => !is_blank(value));
	if (present.length === 0) return null;
	return present.every(value => typeof value === "number") ? "Numeric" : "String";
}

const cell_text = (value: Cell): string => {
	if (value === null || value === undefined || is_blank(value)) return "";
	if (value instanceof Date) return format_timestamp(value);
	return String(value);
};

type ParsedRows = {
	key: InferredColumn;
	values: InferredColumn[];
	rows: Array<{ entity: string; timestamp: string; key: string; cells: TableRow }>;
};

function first_header(rows: TableRow[], names: string[]): string | undefined {
	const headers = new Set(rows.flatMap(row => Object.keys(row)));
	for (const name of names) {
		for (const header of headers) {
			if (parse_column(header).name === name) return header;
		}
	}
	return undefined;
}

function parse_rows(table: string, rows: TableRow[], opts: RefWriteOpts): Result<ParsedRows> {
	const key_name = opts.key_column ?? "Key";
	const key_header = first_header(rows, [key_name]);
	const entity_header = first_header(rows, [opts.entity_column ?? "Entity"]);
	const timestamp_header = first_header(rows, opts.timestamp_column ? [opts.timestamp_column] : TIMESTAMP_COLUMNS);
	if (rows.length > 0 && key_header === undefined) {
		return err({ kind: "invalid_row", row: 0, table, message: `rows have no '${key_name}' column` });
	}

	const reserved = new Set<string>(RESERVED_COLUMNS);
	for (const header of [key_header, entity_header, timestamp_header]) {
		if (header !== undefined) reserved.add(header);
	}

	const value_headers: string[] = [];
	for (const row of rows) {
		for (const header of Object.keys(row)) {
			if (!reserved.has(header) && !reserved.has(parse_column(header).name) && !value_headers.includes(header)) value_headers.push(header);
		}
	}

	const infer = (header: string): InferredColumn => {
		const { name, unit } = parse_column(header);
		return { header, name, unit: unit?.trim() ? unit : DIMENSIONLESS, type: infer_column_type(rows.map(row => row[header])) };
	};

	const parsed: ParsedRows["rows"] = [];
	for (const [index, row] of rows.entries()) {
		const key = key_header === undefined ? undefined : row[key_header];
		if (key === undefined || is_blank(key)) {
			return err({ kind: "invalid_row", row: index, table, message: `row has no '${key_name}' value` });
		}
		const raw_timestamp = timestamp_header === undefined ? undefined : row[timestamp_header];
		let timestamp = "";
		if (!is_blank(raw_timestamp)) {
			const date = parse_timestamp(raw_timestamp);
			if (!date) return err({ kind: "invalid_row", row: index, table, message: `'${String(raw_timestamp)}' is not a timestamp` });
			timestamp = format_timestamp(date);
		}
		const entity = entity_header === undefined ? undefined : row[entity_header];
		parsed.push({ entity: cell_text(entity), timestamp, key: cell_text(key), cells: row });
	}

	return ok({
		key: key_header === undefined ? { header: key_name, name: key_name, unit: DIMENSIONLESS, type: "String" } : infer(key_header),
		values: value_headers.map(infer),
		rows: parsed,
	});
}

const row_key = (entity: string, timestamp: string, key: string): string => [entity, timestamp, key].join("\u0000");

const resolved = (column: InferredColumn): RefColumn => ({ name: column.name, unit: column.unit, type: column.type ?? "Numeric" });

/**
 * Check incoming columns against a stored schema. Incoming columns must cover
 * every stored column with a compatible type; extra columns are returned as
 * additions, appended after the stored ones.
 */
export function reconcile_columns(schema: RefTableSchema, key: InferredColumn | RefColumn, incoming: Array<InferredColumn | RefColumn>): Result<RefColumn[]> {
	const table = schema.name;
	if (key.name !== schema.key.name) {
		return err({ kind: "schema_mismatch", table, column: key.name, message: `key column is '${schema.key.name}', rows use '${key.name}'` });
	}
	if (key.type !== null && key.type !== schema.key.type) {
		return err({ kind: "schema_mismatch", table, column: key.name, message: `key column is ${schema.key.type}, rows hold ${key.type}` });
	}

	for (const stored of schema.values) {
		const match = incoming.find(column => column.name === stored.name);
		if (!match) {
			return err({ kind: "schema_mismatch", table, column: stored.name, message: `rows are missing column '${stored.name}'` });
		}
		if (match.type !== null && match.type !== stored.type) {
			return err({ kind: "schema_mismatch", table, column: stored.name, message: `column '${stored.name}' is ${stored.type}, rows hold ${match.type}` });
		}
	}

	const known = new Set(schema.values.map(column => column.name));
	return ok(
		incoming
			.filter(column => !known.has(column.name))
			.map(column => ({ name: column.name, unit: column.unit, type: column.type ?? "Numeric" }))
	);
}

function parse_value(type: ColumnType, raw: string | number | null | undefined): RefValue {
	if (raw === null || raw === undefined || raw === "") return null;
	if (type === "String") return String(raw);
	if (raw === "NaN") return null;
	const value = Number(raw);
	return Number.isFinite(value) ? value : String(raw);
}

/**
 * Creates the reference table client.
 * @category Core
 * @group RefTables
 *
 * `write` creates a missing table from the rows' shape, extends an existing
 * table with new columns, and refuses renamed, missing or retyped columns with
 * `schema_mismatch`. Dropping a table may take a moment to show in `exists`;
 * use `poll_until` when the caller needs to wait for it.
 *
 * @example
 * ```ts
 * const tables = create_ref_tables(transport)
 * await tables.write('Prices', [
 *   { Entity: 'Field-A', Key: 'oil', 'Price [USD/bbl]': 82.5 },
 *   { Entity: 'Field-A', Key: 'gas', 'Price [USD/bbl]': 3.1 },
 * ])
 * const rows = await tables.read('Prices', { entities: ['Field-A'] })
 * ```
 */
export function create_ref_tables(transport: Transport, options: RefTablesOptions = {}): RefTables {
	const emit = create_emitter(transport.on_event);
	const chunk_size = options.chunk_size ?? 0;

	const fail = (error: SyncError): Result<never> => {
		emit({ type: "error", error });
		return err(error);
	};

	const table_path = (name: string) => `RefTables/${encode_segment(name)}`;

	async function describe(name: string): Promise<Result<RefTableSchema>> {
		const response = await transport.get(table_path(name));
		if (!response.ok) return response;
		const parsed = RemoteRefTableSchema.safeParse(response.value);
		if (!parsed.success) return fail({ kind: "invalid_response", operation: "ref_table_describe", message: parsed.error.message });
		return ok(to_schema(parsed.data));
	}

	async function exists(name: string): Promise<Result<boolean>> {
		const response = await transport.get(table_path(name));
		if (response.ok) return ok(true);
		if (response.error.kind === "remote_failure" && response.error.status === 404) return ok(false);
		return response;
	}

	async function fetch_rows(name: string, schema: RefTableSchema, filter: RefReadFilter): Promise<Result<RefRow[]>> {
		const body: Record<string, unknown> = {};
		const entities = filter.entities ?? [];
		if (entities.length === 1) body.Entity = entities[0];
		else if (entities.length > 1) body.Entities = entities;
		for (const [field, bound] of [["StartTimestamp", filter.start], ["EndTimestamp", filter.end]] as const) {
			if (bound === undefined) continue;
			const date = parse_timestamp(bound);
			if (!date) return fail({ kind: "invalid_range_spec", message: `${field} '${String(bound)}' is not a timestamp` });
			body[field] = format_timestamp(date);
		}
		if (filter.where) body.WhereExpression = filter.where;

		const response = await transport.post(`${table_path(name)}/Data`, body);
		if (!response.ok) return response;
		const parsed = RemoteRowsSchema.safeParse(response.value ?? []);
		if (!parsed.success) return fail({ kind: "invalid_response", operation: "ref_table_read", message: parsed.error.message });

		const rows: RefRow[] = [];
		for (const [entity, timestamp, key, ...cells] of parsed.data) {
			const date = timestamp === null || timestamp === undefined || timestamp === "" ? null : parse_timestamp(timestamp);
			if (date === null && timestamp !== null && timestamp !== undefined && timestamp !== "") {
				return fail({ kind: "invalid_response", operation: "ref_table_read", message: `'${String(timestamp)}' is not a timestamp` });
			}
			const values: Record<string, RefValue> = {};
			schema.values.forEach((column, position) => {
				values[column.name] = parse_value(column.type, cells[position]);
			});
			rows.push({ entity: entity === null || entity === undefined ? "" : String(entity), timestamp: date, key: String(key ?? ""), values });
		}
		return ok(rows);
	}

	async function create(name: string, parsed: ParsedRows, description: string): Promise<Result<RefTableSchema>> {
		const schema: RefTableSchema = {
			name,
			description,
			key: resolved(parsed.key),
			values: parsed.values.map(resolved),
			labels: [],
			created: null,
			modified: null,
		};
		const response = await transport.post("RefTables", to_remote_table(schema));
		if (!response.ok) return response;
		emit({ type: "ref_table_create", table: name, columns: schema.values.length });

		const visible = await poll_until(() => exists(name), found => found, {
			interval_ms: options.poll_interval_ms ?? 1000,
			timeout_ms: options.visible_timeout_ms ?? 30_000,
			operation: "ref_table_create",
			id: name,
			status_of: found => (found ? "visible" : "not visible"),
		});
		if (!visible.ok) return fail(visible.error);
		return ok(schema);
	}

	return {
		async list() {
			const response = await transport.get("RefTables");
			if (!response.ok) return response;
			const parsed = RemoteNamesSchema.safeParse(response.value ?? []);
			if (!parsed.success) return fail({ kind: "invalid_response", operation: "ref_table_list", message: parsed.error.message });
			return ok(parsed.data.map(entry => (typeof entry === "string" ? entry : entry.Name)));
		},

		exists,
		describe,

		async write(name, rows, opts = {}) {
			const parsed = parse_rows(name, rows, opts);
			if (!parsed.ok) return fail(parsed.error);

			const found = await exists(name);
			if (!found.ok) return found;

			let schema: RefTableSchema;
			let added: RefColumn[] = [];
			if (!found.value) {
				const created = await create(name, parsed.value, opts.description ?? "");
				if (!created.ok) return created;
				schema = created.value;
			} else {
				const stored = await describe(name);
				if (!stored.ok) return stored;
				const additions = reconcile_columns(stored.value, parsed.value.key, parsed.value.values);
				if (!additions.ok) return fail(additions.error);
				added = additions.value;
				schema = { ...stored.value, values: [...stored.value.values, ...added] };
				if (added.length > 0) {
					const response = await transport.put(table_path(name), to_remote_table(schema));
					if (!response.ok) return response;
					emit({ type: "ref_table_update", table: name, added: added.map(column => column.name) });
				}
			}

			const header_of = new Map(parsed.value.values.map(column => [column.name, column.header]));
			const incoming = parsed.value.rows;
			const skip_existing = opts.skip_existing ?? false;

			let existing = new Set<string>();
			if (skip_existing && found.value && incoming.length > 0) {
				const entities = [...new Set(incoming.map(row => row.entity))];
				const stored = await fetch_rows(name, schema, { entities: entities.every(entity => entity !== "") ? entities : undefined });
				if (!stored.ok) return stored;
				existing = new Set(stored.value.map(row => row_key(row.entity, row.timestamp ? format_timestamp(row.timestamp) : "", row.key)));
			}

			const plan = plan_merge(existing, incoming, skip_existing, row => row_key(row.entity, row.timestamp, row.key));
			const payload = plan.to_write.map(row => [
				row.entity,
				row.timestamp,
				row.key,
				...schema.values.map(column => {
					const header = header_of.get(column.name);
					return header === undefined ? "" : cell_text(row.cells[header]);
				}),
			]);

			for (const batch of chunk(payload, chunk_size)) {
				const response = await transport.put(`${table_path(name)}/Data/String`, batch, { query: { skipExistingData: skip_existing } });
				if (!response.ok) return response;
			}

			emit({ type: "ref_table_write", table: name, written: plan.to_write.length, skipped: plan.to_skip.length });
			return ok({
				created: !found.value,
				added_columns: added.map(column => column.name),
				written: plan.to_write.length,
				skipped: plan.to_skip.length,
			});
		},

		async read(name, filter = {}) {
			const schema = await describe(name);
			if (!schema.ok) return schema;
			return fetch_rows(name, schema.value, filter);
		},

		async delete_rows(name, range) {
			let path = `${table_path(name)}/Data`;
			let query: Record<string, string | boolean> | undefined;
			if (range && (range.start !== undefined || range.end !== undefined)) {
				// a single bound deletes that one timestamp
				const start = parse_timestamp(range.start ?? range.end);
				const end = parse_timestamp(range.end ?? range.start);
				if (!start || !end) return fail({ kind: "invalid_range_spec", message: `'${String(range.start ?? range.end)}' is not a timestamp` });
				if (start > end) return fail({ kind: "invalid_range_spec", message: `start ${start.toISOString()} is after end ${end.toISOString()}` });
				path = `${path}/Timestamp`;
				query = { TimestampStart: format_timestamp(start), TimestampEnd: format_timestamp(end), IncludeWithNoTimestamp: false };
			}
			const response = await transport.delete(path, { query });
			if (!response.ok) return response;
			emit({ type: "ref_table_delete", table: name, rows_only: true });
			return ok(undefined);
		},

		async delete_table(name) {
			const found = await exists(name);
			if (!found.ok) return found;
			if (!found.value) return ok(undefined);
			const response = await transport.delete(table_path(name));
			if (!response.ok) return response;
			emit({ type: "ref_table_delete", table: name, rows_only: false });
			return ok(undefined);
		},
	};
}
