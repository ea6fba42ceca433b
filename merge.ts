/**
 * @module Merge
 * @description Skip-existing versus overwrite planning for colliding record keys.
 */

import { index_key, type IndexValue, type IndexedRecord } from "./records";
import type { Extent } from "./range";

/**
 * Identity of a record for merge planning: (entity, signal, unit, index).
 *
 * @example
 * ```ts
 * record_key({ entity: 'W1', signal: 'A', unit: 'bbl', index: 10, value: 1 }) // 'W1\u0000A\u0000bbl\u000010'
 * ```
 */
export const record_key = (record: Pick<IndexedRecord, "entity" | "signal" | "unit" | "index">): string =>
	[record.entity, record.signal, record.unit, index_key(record.index)].join("\u0000");

export type MergePlan<T> = {
	to_write: T[];
	to_skip: T[];
};

/**
 * Split incoming items into those to transmit and those to leave alone.
 *
 * With `skip_existing` false every item is written (last write wins on the
 * server). With `skip_existing` true an item whose key is in `existing` is
 * skipped. Keys absent from `existing`, including anything outside the span
 * that was probed to build it, count as new.
 *
 * Pure: the probe that produces `existing` is a separate step.
 */
export function plan_merge<T>(existing: ReadonlySet<string>, incoming: readonly T[], skip_existing: boolean, key_of: (item: T) => string): MergePlan<T> {
	if (!skip_existing) return { to_write: [...incoming], to_skip: [] };
	const to_write: T[] = [];
	const to_skip: T[] = [];
	for (const item of incoming) {
		(existing.has(key_of(item)) ? to_skip : to_write).push(item);
	}
	return { to_write, to_skip };
}

/** `plan_merge` over signal records keyed by `record_key`. */
export const plan_records = (existing: ReadonlySet<string>, incoming: readonly IndexedRecord[], skip_existing: boolean): MergePlan<IndexedRecord> =>
	plan_merge(existing, incoming, skip_existing, record_key);

const min_of = (values: number[]): number => values.reduce((a, b) => (b < a ? b : a));
const max_of = (values: number[]): number => values.reduce((a, b) => (b > a ? b : a));

/**
 * Smallest window covering every index in `records`, used to bound the probe
 * for existing keys. Null when the records carry no index.
 */
export function index_span(records: readonly IndexedRecord[]): Extent | null {
	const indices = records.map(record => record.index).filter((index): index is IndexValue => index !== undefined);
	if (indices.length === 0) return null;

	const dates = indices.filter((index): index is Date => index instanceof Date);
	if (dates.length === indices.length) {
		const times = dates.map(date => date.getTime());
		return { domain: "time", start: new Date(min_of(times)), end: new Date(max_of(times)) };
	}
	const depths = indices.filter((index): index is number => typeof index === "number");
	if (depths.length !== indices.length) return null;
	return { domain: "depth", start: min_of(depths), end: max_of(depths) };
}
