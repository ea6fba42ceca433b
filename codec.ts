import { deserialize, serialize } from "node:v8";
import type { Codec, Parser } from "./types";

export function json_codec<T>(schema: Parser<T>): Codec<T> {
	return {
		content_type: "application/json",
		encode: (value) => new TextEncoder().encode(JSON.stringify(value)),
		decode: (bytes) => schema.parse(JSON.parse(new TextDecoder().decode(bytes))),
	};
}

export function text_codec(): Codec<string> {
	return {
		content_type: "text/plain",
		encode: (value) => new TextEncoder().encode(value),
		decode: (bytes) => new TextDecoder().decode(bytes),
	};
}

export function binary_codec(): Codec<Uint8Array> {
	return {
		content_type: "application/octet-stream",
		encode: (value) => value,
		decode: (bytes) => bytes,
	};
}

/** First byte of every structured-clone payload (the serializer version tag). */
export const OBJECT_HEADER = 0xff;

const decode_object = (bytes: Uint8Array): unknown => {
	if (bytes[0] !== OBJECT_HEADER) throw new Error("bytes are not a structured-object payload");
	return deserialize(bytes);
};

/**
 * Structured-clone codec: Dates, Maps, Sets, typed arrays and nested objects
 * survive a round trip. Pass a schema to validate what comes back.
 */
export function object_codec(): Codec<unknown>;
export function object_codec<T>(schema: Parser<T>): Codec<T>;
export function object_codec<T>(schema?: Parser<T>): Codec<T> | Codec<unknown> {
	const encode = (value: unknown) => new Uint8Array(serialize(value));
	if (!schema) return { content_type: "application/octet-stream", encode, decode: decode_object };
	return {
		content_type: "application/octet-stream",
		encode,
		decode: (bytes) => schema.parse(decode_object(bytes)),
	};
}
