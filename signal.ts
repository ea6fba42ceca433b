/**
 * @module Signal
 * @description Signal kind taxonomy and signal descriptors.
 */

import { z } from "zod";
import { comparison_string } from "./increments";
import { ok, err, type Result } from "./types";

export const SIGNAL_KINDS = [
	"Static",
	"String",
	"TimeDependent",
	"DepthDependent",
	"StringTimeDependent",
	"StringDepthDependent",
] as const;

export type SignalKind = (typeof SIGNAL_KINDS)[number];

/** What a record's index is: absent, a timestamp, or a depth. */
export type IndexDomain = "none" | "time" | "depth";

export type ValueType = "numeric" | "string";

/**
 * Everything that follows from a signal kind. Resolved once, at the
 * encode/decode boundary, and carried from there on.
 */
export type KindInfo = {
	kind: SignalKind;
	domain: IndexDomain;
	value_type: ValueType;
	/** Path segment of the kind's data routes (`Data/{route}/Save`) */
	route: string;
};

export function kind_info(kind: SignalKind): KindInfo {
	switch (kind) {
		case "Static":
			return { kind, domain: "none", value_type: "numeric", route: "Static" };
		case "String":
			return { kind, domain: "none", value_type: "string", route: "String" };
		case "TimeDependent":
			return { kind, domain: "time", value_type: "numeric", route: "Time" };
		case "StringTimeDependent":
			return { kind, domain: "time", value_type: "string", route: "StringTime" };
		case "DepthDependent":
			return { kind, domain: "depth", value_type: "numeric", route: "Depth" };
		case "StringDepthDependent":
			return { kind, domain: "depth", value_type: "string", route: "StringDepth" };
	}
}

const KIND_SYNONYMS: Record<SignalKind, string[]> = {
	Static: ["static", "staticnumeric"],
	String: ["string", "staticstring"],
	TimeDependent: ["time", "timenumeric", "timedependent"],
	DepthDependent: ["depth", "depthnumeric", "depthdependent"],
	StringTimeDependent: ["stringtime", "timestring", "stringtimedependent"],
	StringDepthDependent: ["stringdepth", "depthstring", "stringdepthdependent"],
};

/**
 * Accept a canonical kind or one of its case-insensitive synonyms.
 *
 * @example
 * ```ts
 * parse_signal_kind('time') // ok('TimeDependent')
 * parse_signal_kind('Depth String') // ok('StringDepthDependent')
 * ```
 */
export function parse_signal_kind(value: string): Result<SignalKind> {
	const needle = comparison_string(value);
	for (const kind of SIGNAL_KINDS) {
		if (KIND_SYNONYMS[kind].includes(needle)) return ok(kind);
	}
	return err({ kind: "invalid_signal_kind", value });
}

/**
 * A named signal with its kind and declared storage unit.
 *
 * Fetched fresh for every synchronization call; never cached across calls.
 *
 * @category Types
 * @group Signal Types
 */
export type SignalDescriptor = {
	name: string;
	kind: SignalKind;
	/** Storage unit; `" "` is the platform's dimensionless unit */
	unit: string;
	measurement: string;
};

/** Wire shape of `GET Signals/{name}`. */
export const RemoteSignalSchema = z.object({
	Name: z.string(),
	SignalType: z.string(),
	StorageUnitName: z.string().nullish(),
	MeasurementName: z.string().nullish(),
});

export type RemoteSignal = z.infer<typeof RemoteSignalSchema>;

export function to_descriptor(raw: RemoteSignal): Result<SignalDescriptor> {
	const kind = parse_signal_kind(raw.SignalType);
	if (!kind.ok) return kind;
	return ok({
		name: raw.Name,
		kind: kind.value,
		unit: raw.StorageUnitName ?? "",
		measurement: raw.MeasurementName ?? "",
	});
}

export function to_remote_signal(descriptor: SignalDescriptor): RemoteSignal {
	return {
		Name: descriptor.name,
		SignalType: descriptor.kind,
		StorageUnitName: descriptor.unit,
		MeasurementName: descriptor.measurement,
	};
}
