/**
 * @module Utilities
 * @description Helpers for events, column headers, timestamps and paths.
 */

import type { EventHandler, SyncEvent } from "./types";

/**
 * Create an event emitter function from an optional handler.
 */
export function create_emitter(handler?: EventHandler): (event: SyncEvent) => void {
	return (event: SyncEvent) => handler?.(event)
}

/**
 * Build a unit-annotated column header. A blank unit (the platform's
 * dimensionless `" "`) leaves the name bare.
 *
 * @example
 * ```ts
 * format_column('Oil rate', 'bbl/d') // => 'Oil rate [bbl/d]'
 * format_column('Status', ' ') // => 'Status'
 * ```
 */
export function format_column(name: string, unit: string): string {
	const trimmed = unit.trim()
	return trimmed ? `${name} [${trimmed}]` : name
}

/**
 * Split a column header into its name and optional `[unit]` annotation.
 *
 * @example
 * ```ts
 * parse_column('Depth [m]') // => { name: 'Depth', unit: 'm' }
 * parse_column('Entity') // => { name: 'Entity', unit: undefined }
 * ```
 */
export function parse_column(header: string): { name: string; unit: string | undefined } {
	const match = /^(.*?)\s*\[(.*)\]\s*$/.exec(header)
	if (!match) return { name: header.trim(), unit: undefined }
	return { name: match[1].trim(), unit: match[2] }
}

const TIMESTAMP_PATTERN =
	/^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/

/**
 * Parse a calendar timestamp. Accepts valid `Date` objects and ISO-like strings
 * (`2022-08-01`, `2022-08-01T06:30:00.0000000`, `2022-08-01 06:30`); strings
 * without a zone are read as UTC. Returns null for anything else, including
 * numbers.
 */
export function parse_timestamp(value: unknown): Date | null {
	if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value
	if (typeof value !== "string") return null

	const match = TIMESTAMP_PATTERN.exec(value.trim())
	if (!match) return null

	const [, y, mo, d, h = "0", mi = "0", s = "0", fraction = "0", zone] = match
	const year = Number(y)
	const month = Number(mo) - 1
	const day = Number(d)
	const ms = Number(fraction.padEnd(3, "0").slice(0, 3))
	const utc = Date.UTC(year, month, day, Number(h), Number(mi), Number(s), ms)
	const probe = new Date(utc)
	// reject overflow such as 2022-02-30 or 25:00
	if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month || probe.getUTCDate() !== day || probe.getUTCHours() !== Number(h)) {
		return null
	}

	if (!zone || zone === "Z") return probe
	const sign = zone.startsWith("-") ? -1 : 1
	const digits = zone.slice(1).replace(":", "")
	const offset_minutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4))
	return new Date(utc - sign * offset_minutes * 60_000)
}

/**
 * Wire form of a timestamp: UTC, millisecond precision, no zone suffix.
 *
 * @example
 * ```ts
 * format_timestamp(new Date(Date.UTC(2022, 7, 1))) // => '2022-08-01T00:00:00.000'
 * ```
 */
export function format_timestamp(date: Date): string {
	return date.toISOString().slice(0, 23)
}

/** Encode one path segment of a route (`Signals/${encode_segment(name)}`). */
export const encode_segment = (segment: string): string => encodeURIComponent(segment)

/**
 * Normalize a blob path: `\` becomes `/`, empty and `.` segments are dropped.
 *
 * @example
 * ```ts
 * normalize_blob_path('\\reports\\2022//q1.csv') // => 'reports/2022/q1.csv'
 * ```
 */
export function normalize_blob_path(path: string): string {
	return path
		.replace(/\\/g, "/")
		.split("/")
		.filter(segment => segment !== "" && segment !== ".")
		.join("/")
}

/**
 * True when `path` is `prefix` itself or lies in the folder `prefix`.
 * An empty prefix contains every path.
 */
export function in_folder(path: string, prefix: string): boolean {
	const folder = normalize_blob_path(prefix)
	if (!folder) return true
	return path === folder || path.startsWith(`${folder}/`)
}

/**
 * Split items into consecutive batches of at most `size`.
 */
export function chunk<T>(items: T[], size: number): T[][] {
	if (size <= 0 || items.length <= size) return items.length ? [items] : []
	const batches: T[][] = []
	for (let start = 0; start < items.length; start += size) {
		batches.push(items.slice(start, start + size))
	}
	return batches
}
