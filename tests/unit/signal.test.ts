import { describe, test, expect } from "vitest";
import { kind_info, parse_signal_kind, to_descriptor, to_remote_signal, SIGNAL_KINDS } from "../../signal";

describe("kind_info", () => {
	test("maps each kind to its index domain and value type", () => {
		expect(SIGNAL_KINDS.map(kind => [kind, kind_info(kind).domain, kind_info(kind).value_type])).toEqual([
			["Static", "none", "numeric"],
			["String", "none", "string"],
			["TimeDependent", "time", "numeric"],
			["DepthDependent", "depth", "numeric"],
			["StringTimeDependent", "time", "string"],
			["StringDepthDependent", "depth", "string"],
		]);
	});

	test("names the data route of each kind", () => {
		expect(kind_info("TimeDependent").route).toBe("Time");
		expect(kind_info("StringDepthDependent").route).toBe("StringDepth");
	});
});

describe("parse_signal_kind", () => {
	test("accepts canonical names", () => {
		for (const kind of SIGNAL_KINDS) {
			expect(parse_signal_kind(kind)).toEqual({ ok: true, value: kind });
		}
	});

	test("accepts synonyms", () => {
		expect(parse_signal_kind("time")).toEqual({ ok: true, value: "TimeDependent" });
		expect(parse_signal_kind("Depth String")).toEqual({ ok: true, value: "StringDepthDependent" });
		expect(parse_signal_kind("static_string")).toEqual({ ok: true, value: "String" });
	});

	test("rejects unknown kinds", () => {
		expect(parse_signal_kind("Spatial")).toEqual({ ok: false, error: { kind: "invalid_signal_kind", value: "Spatial" } });
	});
});

describe("to_descriptor", () => {
	test("reads the remote signal shape", () => {
		const result = to_descriptor({ Name: "Oil rate", SignalType: "TimeDependent", StorageUnitName: "bbl/d", MeasurementName: "Liquid rate" });
		expect(result).toEqual({
			ok: true,
			value: { name: "Oil rate", kind: "TimeDependent", unit: "bbl/d", measurement: "Liquid rate" },
		});
	});

	test("defaults a missing unit to empty", () => {
		const result = to_descriptor({ Name: "Status", SignalType: "String", StorageUnitName: null });
		expect(result.ok && result.value.unit).toBe("");
	});

	test("fails on an unknown kind", () => {
		expect(to_descriptor({ Name: "x", SignalType: "Image" }).ok).toBe(false);
	});

	test("round trips through to_remote_signal", () => {
		const descriptor = { name: "Depth log", kind: "DepthDependent" as const, unit: "m", measurement: "Length" };
		expect(to_descriptor(to_remote_signal(descriptor))).toEqual({ ok: true, value: descriptor });
	});
});
