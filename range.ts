/**
 * @module Range
 * @description Resolution of open or partial query ranges into concrete windows.
 */

import { z } from "zod";
import { normalize_depth_increment, normalize_time_increment, type DepthIncrement, type TimeIncrement } from "./increments";
import { kind_info, type SignalDescriptor, type SignalKind } from "./signal";
import { ok, err, type Result, type SyncError, type SyncEvent } from "./types";
import { parse_timestamp } from "./utils";

/**
 * Stored min/max index of a signal, as reported by a range probe.
 * @category Types
 * @group Range Types
 */
export type Extent =
	| { domain: "time"; start: Date; end: Date }
	| { domain: "depth"; start: number; end: number };

/**
 * A concrete window to query or write.
 *
 * - `none` - the kind has no index (Static, String)
 * - `empty` - nothing is stored in the requested span; callers treat it as "nothing to do"
 * - `time` / `depth` - closed interval `[start, end]`; without an `increment` the server returns stored points as they are
 *
 * @category Types
 * @group Range Types
 */
export type QueryWindow =
	| { domain: "none" }
	| { domain: "empty" }
	| { domain: "time"; start: Date; end: Date; increment?: TimeIncrement }
	| { domain: "depth"; start: number; end: number; increment?: DepthIncrement };

/**
 * Caller-facing range request. Omitted bounds are taken from the stored extent;
 * `increment` takes a canonical name or a synonym such as `"daily"` or `"ft"`.
 */
export type RangeSpec = {
	start?: Date | number | string;
	end?: Date | number | string;
	increment?: string;
};

function invalid(message: string, signal?: string): Result<never> {
	return err({ kind: "invalid_range_spec", message, signal });
}

function time_bound(value: Date | number | string | undefined, label: string): Result<Date | undefined> {
	if (value === undefined) return ok(undefined);
	const parsed = parse_timestamp(value);
	if (!parsed) return invalid(`${label} '${String(value)}' is not a timestamp`);
	return ok(parsed);
}

function depth_bound(value: Date | number | string | undefined, label: string): Result<number | undefined> {
	if (value === undefined) return ok(undefined);
	if (typeof value !== "number" || !Number.isFinite(value)) return invalid(`${label} '${String(value)}' is not a depth`);
	return ok(value);
}

/**
 * Resolve a window for a signal kind. Pure: the stored extent is passed in.
 *
 * Explicit bounds are used verbatim once they type-check against the kind's
 * index domain and satisfy `start <= end`. An increment is only set when the
 * caller names one, so reads return stored points unresampled by default. A missing bound is taken from
 * `extent`; with no extent (nothing stored) the window is `empty`. A window
 * whose explicit start lies past the stored end (or vice versa) is also `empty`.
 *
 * @example
 * ```ts
 * resolve_window('TimeDependent', { increment: 'daily' }, {
 *   domain: 'time',
 *   start: new Date('2022-08-01T00:00:00Z'),
 *   end: new Date('2022-08-03T00:00:00Z'),
 * })
 * // => ok({ domain: 'time', start: 2022-08-01, end: 2022-08-03, increment: 'Daily' })
 * ```
 */
export function resolve_window(kind: SignalKind, spec: RangeSpec, extent: Extent | null): Result<QueryWindow> {
	const { domain } = kind_info(kind);

	if (domain === "none") {
		if (spec.start !== undefined || spec.end !== undefined) {
			return invalid(`${kind} signals have no index; start/end do not apply`);
		}
		return ok({ domain: "none" });
	}

	if (extent && extent.domain !== domain) {
		return invalid(`extent is ${extent.domain}-indexed but ${kind} signals are ${domain}-indexed`);
	}

	if (domain === "time") {
		const increment = spec.increment === undefined ? ok(undefined) : normalize_time_increment(spec.increment);
		if (!increment.ok) return increment;
		const start = time_bound(spec.start, "start");
		if (!start.ok) return start;
		const end = time_bound(spec.end, "end");
		if (!end.ok) return end;
		if (start.value && end.value && start.value > end.value) {
			return invalid(`start ${start.value.toISOString()} is after end ${end.value.toISOString()}`);
		}

		const stored = extent?.domain === "time" ? extent : null;
		const lo = start.value ?? stored?.start;
		const hi = end.value ?? stored?.end;
		if (!lo || !hi || lo > hi) return ok({ domain: "empty" });
		return ok(increment.value === undefined ? { domain: "time", start: lo, end: hi } : { domain: "time", start: lo, end: hi, increment: increment.value });
	}

	const increment = spec.increment === undefined ? ok(undefined) : normalize_depth_increment(spec.increment);
	if (!increment.ok) return increment;
	const start = depth_bound(spec.start, "start");
	if (!start.ok) return start;
	const end = depth_bound(spec.end, "end");
	if (!end.ok) return end;
	if (start.value !== undefined && end.value !== undefined && start.value > end.value) {
		return invalid(`start ${start.value} is greater than end ${end.value}`);
	}

	const stored = extent?.domain === "depth" ? extent : null;
	const lo = start.value ?? stored?.start;
	const hi = end.value ?? stored?.end;
	if (lo === undefined || hi === undefined || lo > hi) return ok({ domain: "empty" });
	return ok(increment.value === undefined ? { domain: "depth", start: lo, end: hi } : { domain: "depth", start: lo, end: hi, increment: increment.value });
}

/**
 * True when `spec` needs the stored extent to be resolved for `kind`.
 */
export function needs_extent(kind: SignalKind, spec: RangeSpec): boolean {
	return kind_info(kind).domain !== "none" && (spec.start === undefined || spec.end === undefined);
}

/**
 * Does `index` fall inside `window`? Index-less windows contain everything,
 * `empty` contains nothing.
 */
export function window_contains(window: QueryWindow, index: Date | number | undefined): boolean {
	switch (window.domain) {
		case "none":
			return true;
		case "empty":
			return false;
		case "time":
			return index instanceof Date && index >= window.start && index <= window.end;
		case "depth":
			return typeof index === "number" && index >= window.start && index <= window.end;
	}
}

/** Wire shape of `GET Data/{Kind}/Range/{signal}`. */
export const RemoteRangeSchema = z
	.object({
		Start: z.union([z.string(), z.number()]).nullish(),
		End: z.union([z.string(), z.number()]).nullish(),
	})
	.nullish();

/**
 * Convert a probed range into an `Extent`; `null` when nothing is stored.
 */
export function to_extent(kind: SignalKind, raw: z.infer<typeof RemoteRangeSchema>): Result<Extent | null> {
	const { domain } = kind_info(kind);
	if (domain === "none" || !raw) return ok(null);
	const { Start, End } = raw;
	if (Start === null || Start === undefined || Start === "" || End === null || End === undefined || End === "") return ok(null);

	const bad: SyncError = {
		kind: "invalid_response",
		operation: "data_range",
		message: `range ${String(Start)}..${String(End)} is not a ${domain} range`,
	};

	if (domain === "time") {
		const start = parse_timestamp(Start);
		const end = parse_timestamp(End);
		if (!start || !end) return err(bad);
		return ok({ domain, start, end });
	}

	const start = Number(Start);
	const end = Number(End);
	if (!Number.isFinite(start) || !Number.isFinite(end)) return err(bad);
	return ok({ domain, start, end });
}

/** Fetches the stored extent of a signal, optionally for one entity. */
export type RangeProbe = (descriptor: SignalDescriptor, entity?: string) => Promise<Result<Extent | null>>;

export type RangeResolver = {
	resolve: (descriptor: SignalDescriptor, spec: RangeSpec, entity?: string) => Promise<Result<QueryWindow>>;
};

/**
 * Bind `resolve_window` to a range probe. The probe is only called when a
 * bound is missing; fully bounded specs never leave the process.
 *
 * @example
 * ```ts
 * const resolver = create_range_resolver(async () => ok(null))
 * const window = await resolver.resolve(descriptor, {}) // ok({ domain: 'empty' })
 * ```
 */
export function create_range_resolver(probe: RangeProbe, emit?: (event: SyncEvent) => void): RangeResolver {
	return {
		async resolve(descriptor, spec, entity) {
			let extent: Extent | null = null;
			if (needs_extent(descriptor.kind, spec)) {
				const probed = await probe(descriptor, entity);
				if (!probed.ok) return probed;
				extent = probed.value;
			}
			const window = resolve_window(descriptor.kind, spec, extent);
			if (!window.ok) {
				const error: SyncError =
					window.error.kind === "invalid_range_spec" ? { ...window.error, signal: descriptor.name } : window.error;
				emit?.({ type: "error", error });
				return err(error);
			}
			emit?.({ type: "range_resolved", signal: descriptor.name, empty: window.value.domain === "empty" });
			return window;
		},
	};
}
