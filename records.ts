/**
 * @module Records
 * @description Mapping between the wide tabular view (one row per entity and
 * index, one column per signal) and the narrow per-(entity, signal, unit) wire shape.
 */

import { z } from "zod";
import { window_contains, type QueryWindow } from "./range";
import { kind_info, type KindInfo, type SignalDescriptor, type SignalKind } from "./signal";
import { ok, err, type Result } from "./types";
import { format_column, format_timestamp, parse_column, parse_timestamp } from "./utils";

export type Cell = number | string | Date | null | undefined;

/** One row of the tabular view, keyed by (possibly unit-annotated) column header. */
export type TableRow = Record<string, Cell>;

export type IndexValue = Date | number;

export type RecordValue = number | string | null;

/**
 * One value of one signal for one entity. Identity for merging is
 * (entity, signal, unit, index); Static and String records have no index.
 * @category Types
 * @group Record Types
 */
export type IndexedRecord = {
	entity: string;
	signal: string;
	unit: string;
	index?: IndexValue;
	value: RecordValue;
};

export type EncodeOpts = {
	/** Unit override; wins over a `[unit]` header annotation and the signal's unit */
	unit?: string;
	/** Header name holding the signal's values; defaults to the signal name */
	column?: string;
	entity_column?: string;
	/** Defaults to `Date` for time kinds and `Depth` for depth kinds */
	index_column?: string;
};

export const ENTITY_COLUMN = "Entity";

export const index_column_for = (info: KindInfo): string | undefined =>
	info.domain === "time" ? "Date" : info.domain === "depth" ? "Depth" : undefined;

const find_header = (row: TableRow, name: string): string | undefined => Object.keys(row).find(header => parse_column(header).name === name);

const is_blank = (value: Cell): value is null | undefined | "" => value === null || value === undefined || value === "";

function numeric(value: Cell): number | undefined {
	if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
	if (typeof value === "string" && value.trim() !== "") {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : undefined;
	}
	return undefined;
}

function encode_value(info: KindInfo, signal: string, entity: string, raw: Cell, index?: IndexValue): Result<RecordValue> {
	if (is_blank(raw)) return ok(null);
	if (info.value_type === "string") {
		if (typeof raw === "string") return ok(raw);
		if (typeof raw === "number") return ok(String(raw));
		return ok(format_timestamp(raw));
	}
	if (typeof raw === "number" && Number.isNaN(raw)) return ok(null);
	const value = numeric(raw);
	if (value !== undefined) return ok(value);
	return err({
		kind: "invalid_value",
		signal,
		entity,
		index: index === undefined ? undefined : describe_index(index),
		value: raw,
		message: `'${String(raw)}' is not numeric`,
	});
}

function encode_index(info: KindInfo, signal: string, entity: string, raw: Cell): Result<IndexValue | undefined> {
	if (info.domain === "none") return ok(undefined);
	if (info.domain === "time") {
		const date = parse_timestamp(raw);
		if (date) return ok(date);
		return err({ kind: "invalid_index_value", signal, entity, value: raw, message: `'${String(raw)}' is not a calendar timestamp` });
	}
	const depth = numeric(raw);
	if (depth !== undefined) return ok(depth);
	return err({ kind: "invalid_index_value", signal, entity, value: raw, message: `'${String(raw)}' is not a depth` });
}

export const describe_index = (index: IndexValue): string => (index instanceof Date ? index.toISOString() : String(index));

/**
 * Encode tabular rows into records of one signal. Fails on the first bad row,
 * before anything is sent.
 *
 * Unit precedence: `opts.unit`, then the value column's `[unit]` annotation,
 * then the signal's declared unit. An indexed write left with no unit at all
 * fails with `missing_unit`; the dimensionless `" "` counts as a unit.
 *
 * @example
 * ```ts
 * encode_rows(oil_rate, [
 *   { Entity: 'Well-1', Date: '2022-08-01', 'Oil rate [bbl/d]': 120 },
 *   { Entity: 'Well-1', Date: '2022-08-02', 'Oil rate [bbl/d]': 118 },
 * ])
 * ```
 */
export function encode_rows(descriptor: SignalDescriptor, rows: TableRow[], opts: EncodeOpts = {}): Result<IndexedRecord[]> {
	const info = kind_info(descriptor.kind);
	const signal = descriptor.name;
	const value_name = opts.column ?? signal;
	const entity_name = opts.entity_column ?? ENTITY_COLUMN;
	const index_name = opts.index_column ?? index_column_for(info);
	const records: IndexedRecord[] = [];

	for (const [row_number, row] of rows.entries()) {
		const entity_header = find_header(row, entity_name);
		const entity = entity_header === undefined ? undefined : row[entity_header];
		if (typeof entity !== "string" && typeof entity !== "number") {
			return err({ kind: "invalid_row", row: row_number, signal, message: `row has no '${entity_name}' value` });
		}
		const entity_id = String(entity);

		const value_header = find_header(row, value_name);
		if (value_header === undefined) {
			return err({ kind: "invalid_row", row: row_number, signal, message: `row has no '${value_name}' column` });
		}

		const annotated = parse_column(value_header).unit;
		// `Name []` carries no unit of its own
		const unit = opts.unit ?? (annotated === "" ? undefined : annotated) ?? descriptor.unit;
		if (info.domain !== "none" && unit === "") return err({ kind: "missing_unit", signal, entity: entity_id });

		let raw_index: Cell;
		if (index_name !== undefined && info.domain !== "none") {
			const index_header = find_header(row, index_name);
			raw_index = index_header === undefined ? undefined : row[index_header];
		}
		const index = encode_index(info, signal, entity_id, raw_index);
		if (!index.ok) return index;

		const value = encode_value(info, signal, entity_id, row[value_header], index.value);
		if (!value.ok) return value;

		const record: IndexedRecord = { entity: entity_id, signal, unit, value: value.value };
		if (index.value !== undefined) record.index = index.value;
		records.push(record);
	}
	return ok(records);
}

/**
 * A signal's data per entity: a single value for Static/String kinds, an
 * ordered list of points for indexed kinds.
 */
export type SeriesInput = { entity: string; value: Cell } | { entity: string; points: Array<{ index: Cell; value: Cell }> };

/**
 * Encode per-entity series of one signal. Equivalent to `encode_rows` over
 * the flattened rows.
 *
 * @example
 * ```ts
 * encode_series(gas_rate, [{ entity: 'Well-1', points: [{ index: '2022-08-01', value: 42 }] }], { unit: 'Mcf/d' })
 * ```
 */
export function encode_series(descriptor: SignalDescriptor, series: SeriesInput[], opts: Pick<EncodeOpts, "unit"> = {}): Result<IndexedRecord[]> {
	const info = kind_info(descriptor.kind);
	const index_name = index_column_for(info) ?? "Index";
	const rows: TableRow[] = series.flatMap(entry =>
		"points" in entry
			? entry.points.map(point => ({ [ENTITY_COLUMN]: entry.entity, [index_name]: point.index, [descriptor.name]: point.value }))
			: [{ [ENTITY_COLUMN]: entry.entity, [descriptor.name]: entry.value }]
	);
	return encode_rows(descriptor, rows, { unit: opts.unit });
}

/** Numeric nulls travel as the string `"NaN"`. */
export const NUMERIC_NULL = "NaN";

const WireValueSchema = z.union([z.number(), z.string(), z.null()]);

const WirePointSchema = z.object({
	Date: z.string().optional(),
	Depth: z.union([z.number(), z.string()]).optional(),
	Value: WireValueSchema,
});

export const WireRecordSchema = z.object({
	Entity: z.string(),
	Signal: z.string(),
	Unit: z.string().nullish(),
	Data: z.union([WireValueSchema, z.array(WirePointSchema)]),
});

export type WireValue = z.infer<typeof WireValueSchema>;
export type WirePoint = z.infer<typeof WirePointSchema>;
export type WireRecord = z.infer<typeof WireRecordSchema>;

const to_wire_value = (info: KindInfo, value: RecordValue): WireValue => {
	if (value !== null) return value;
	return info.value_type === "numeric" ? NUMERIC_NULL : "";
};

/** Stable string form of an index; `""` when absent. */
export const index_key = (index: IndexValue | undefined): string => (index === undefined ? "" : index instanceof Date ? index.toISOString() : String(index));

/**
 * Group records into the wire shape, one entry per (entity, signal, unit) in
 * first-seen order. Records repeating an index keep the last value, as does a
 * repeated Static/String record.
 */
export function to_wire(kind: SignalKind, records: IndexedRecord[]): WireRecord[] {
	const info = kind_info(kind);
	const groups = new Map<string, { head: IndexedRecord; points: Map<string, IndexedRecord> }>();

	for (const record of records) {
		const group_key = `${record.entity}\u0000${record.signal}\u0000${record.unit}`;
		let group = groups.get(group_key);
		if (!group) {
			group = { head: record, points: new Map() };
			groups.set(group_key, group);
		}
		group.points.set(index_key(record.index), record);
	}

	return [...groups.values()].map(({ head, points }) => {
		const base = { Entity: head.entity, Signal: head.signal, Unit: head.unit };
		const values = [...points.values()];
		if (info.domain === "none") {
			const last = values[values.length - 1] ?? head;
			return { ...base, Data: to_wire_value(info, last.value) };
		}
		return {
			...base,
			Data: values.map(record =>
				record.index instanceof Date
					? { Date: format_timestamp(record.index), Value: to_wire_value(info, record.value) }
					: { Depth: record.index, Value: to_wire_value(info, record.value) }
			),
		};
	});
}

function from_wire_value(info: KindInfo, raw: WireValue): RecordValue | undefined {
	if (raw === null) return null;
	if (info.value_type === "string") return raw === "" ? null : String(raw);
	if (raw === NUMERIC_NULL) return null;
	return numeric(raw);
}

/**
 * Validate and flatten a wire payload into records. `"NaN"` becomes a null
 * numeric value, `""` a null string value.
 */
export function from_wire(kind: SignalKind, raw: unknown): Result<IndexedRecord[]> {
	const info = kind_info(kind);
	const parsed = z.array(WireRecordSchema).safeParse(raw);
	if (!parsed.success) {
		return err({ kind: "invalid_response", operation: "read", message: parsed.error.message });
	}

	const records: IndexedRecord[] = [];
	const bad = (message: string): Result<never> => err({ kind: "invalid_response", operation: "read", message });

	for (const entry of parsed.data) {
		const base = { entity: entry.Entity, signal: entry.Signal, unit: entry.Unit ?? "" };
		if (info.domain === "none") {
			if (Array.isArray(entry.Data)) return bad(`${kind} data for ${entry.Entity}/${entry.Signal} must be a scalar`);
			const value = from_wire_value(info, entry.Data);
			if (value === undefined) return bad(`'${String(entry.Data)}' is not a ${info.value_type} value`);
			records.push({ ...base, value });
			continue;
		}

		if (!Array.isArray(entry.Data)) return bad(`${kind} data for ${entry.Entity}/${entry.Signal} must be a list of points`);
		for (const point of entry.Data) {
			const index = info.domain === "time" ? parse_timestamp(point.Date) : numeric(point.Depth);
			if (index === null || index === undefined) {
				return bad(`point of ${entry.Entity}/${entry.Signal} has no valid ${info.domain} index`);
			}
			const value = from_wire_value(info, point.Value);
			if (value === undefined) return bad(`'${String(point.Value)}' is not a ${info.value_type} value`);
			records.push({ ...base, index, value });
		}
	}
	return ok(records);
}

/**
 * Decoded tabular view: `Entity`, then `Date`/`Depth` for indexed kinds, then one
 * `"signal [unit]"` column per stored (signal, unit) pair.
 */
export type Table = {
	columns: string[];
	rows: TableRow[];
};

export type DecodeOpts = {
	/** Entities to report, in order; defaults to every entity found, first-seen order */
	entities?: string[];
};

/**
 * Pivot records back into rows over `window`. Produces one row per entity and
 * distinct index found across the requested entities and signals (outer join:
 * a missing value is a null cell, not a dropped row). Rows are ordered by
 * entity, then ascending index. An `empty` window decodes to zero rows.
 */
export function decode(descriptors: SignalDescriptor[], records: IndexedRecord[], window: QueryWindow, opts: DecodeOpts = {}): Result<Table> {
	const domains = new Set(descriptors.map(descriptor => kind_info(descriptor.kind).domain));
	if (domains.size > 1) {
		return err({ kind: "invalid_range_spec", message: `cannot decode ${[...domains].join(" and ")} signals into one table` });
	}
	const domain = [...domains][0] ?? "none";
	if ((window.domain === "time" || window.domain === "depth" || window.domain === "none") && window.domain !== domain) {
		return err({ kind: "invalid_range_spec", message: `a ${window.domain} window cannot select ${domain}-indexed signals` });
	}
	const index_name = domain === "time" ? "Date" : domain === "depth" ? "Depth" : undefined;

	const wanted = new Set(descriptors.map(descriptor => descriptor.name));
	const entity_filter = opts.entities ? new Set(opts.entities) : undefined;
	const selected = records.filter(
		record => wanted.has(record.signal) && (!entity_filter || entity_filter.has(record.entity)) && window_contains(window, record.index)
	);

	const headers = new Map<string, string>();
	for (const descriptor of descriptors) {
		const units = [...new Set(selected.filter(record => record.signal === descriptor.name).map(record => record.unit))];
		for (const unit of units.length ? units : [descriptor.unit]) {
			headers.set(`${descriptor.name}\u0000${unit}`, format_column(descriptor.name, unit));
		}
	}
	const columns = [ENTITY_COLUMN, ...(index_name ? [index_name] : []), ...new Set(headers.values())];
	if (window.domain === "empty") return ok({ columns, rows: [] });

	const entities = opts.entities ?? [...new Set(selected.map(record => record.entity))];
	const indices = new Map<string, IndexValue>();
	const cells = new Map<string, RecordValue>();
	for (const record of selected) {
		const key = index_key(record.index);
		if (record.index !== undefined) indices.set(key, record.index);
		const header = headers.get(`${record.signal}\u0000${record.unit}`);
		if (header !== undefined) cells.set(`${record.entity}\u0000${key}\u0000${header}`, record.value);
	}

	const ordered = [...indices.values()].sort((a, b) => Number(a) - Number(b));
	const value_headers = columns.slice(index_name ? 2 : 1);
	const build = (entity: string, index?: IndexValue): TableRow => {
		const row: TableRow = { [ENTITY_COLUMN]: entity };
		if (index_name && index !== undefined) row[index_name] = index;
		for (const header of value_headers) row[header] = cells.get(`${entity}\u0000${index_key(index)}\u0000${header}`) ?? null;
		return row;
	};

	const rows = index_name ? entities.flatMap(entity => ordered.map(index => build(entity, index))) : entities.map(entity => build(entity));
	return ok({ columns, rows });
}
