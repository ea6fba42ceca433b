/**
 * @module Increments
 * @description Time and depth step vocabularies, with the string synonyms accepted at the boundary.
 */

import synonyms from "./data/increments.json";
import { ok, err, type Result } from "./types";

export const TIME_INCREMENTS = [
	"EverySecond",
	"EveryMinute",
	"EveryFiveMinutes",
	"EveryFifteenMinutes",
	"Hourly",
	"Daily",
	"Monthly",
	"Quarterly",
	"Yearly",
] as const;

export const DEPTH_INCREMENTS = ["TenthMeter", "EighthMeter", "HalfFoot", "Foot", "HalfMeter", "Meter"] as const;

export type TimeIncrement = (typeof TIME_INCREMENTS)[number];
export type DepthIncrement = (typeof DEPTH_INCREMENTS)[number];

/**
 * Lower-case and drop whitespace, `_` and `-` so `"Every Minute"`,
 * `"every_minute"` and `"EVERYMINUTE"` compare equal.
 */
export const comparison_string = (value: string): string => value.toLowerCase().replace(/[\s_-]+/g, "");

function build_lookup<K extends string>(canonical: readonly K[], table: Record<string, string[]>): Map<string, K> {
	const lookup = new Map<string, K>();
	for (const name of canonical) {
		lookup.set(comparison_string(name), name);
		for (const alias of table[name] ?? []) lookup.set(comparison_string(alias), name);
	}
	return lookup;
}

const time_lookup = build_lookup(TIME_INCREMENTS, synonyms.time);
const depth_lookup = build_lookup(DEPTH_INCREMENTS, synonyms.depth);

function normalize<K extends string>(lookup: Map<string, K>, canonical: readonly K[], domain: string, input: string): Result<K> {
	const found = lookup.get(comparison_string(input));
	if (found) return ok(found);
	return err({
		kind: "invalid_range_spec",
		message: `unknown ${domain} increment '${input}', expected one of: ${canonical.join(", ")}`,
	});
}

/**
 * Resolve a time increment from its canonical name or a synonym (`"d"`, `"1hour"`, `"monthly"`).
 *
 * @example
 * ```ts
 * normalize_time_increment('daily') // ok('Daily')
 * normalize_time_increment('fortnightly') // err({ kind: 'invalid_range_spec', ... })
 * ```
 */
export const normalize_time_increment = (input: string): Result<TimeIncrement> => normalize(time_lookup, TIME_INCREMENTS, "time", input);

/**
 * Resolve a depth increment from its canonical name or a synonym (`"ft"`, `"0.5m"`).
 * Note that `"m"` means Meter here and Monthly for time increments.
 */
export const normalize_depth_increment = (input: string): Result<DepthIncrement> => normalize(depth_lookup, DEPTH_INCREMENTS, "depth", input);
