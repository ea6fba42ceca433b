/**
 * @module Config
 * @description Client configuration, validated with zod and loadable from the environment.
 */

import { z } from "zod";
import { ok, err, type Result } from "./types";

export const ClientConfigSchema = z.object({
	base_url: z.string().url(),
	workspace: z.string().min(1),
	token: z.string().min(1).optional(),
	route: z.string().default("API"),
	poll_interval_ms: z.coerce.number().int().positive().default(1000),
	chunk_size: z.coerce.number().int().positive().default(10_000),
	upload_concurrency: z.coerce.number().int().positive().default(4),
});

/** Validated configuration, defaults applied. */
export type ClientConfig = z.infer<typeof ClientConfigSchema>;

/** Configuration as a caller may write it, before defaults. */
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

/** Environment variable read for each configuration field. */
export const ENV_VARS = {
	base_url: "SIGNAL_SYNC_URL",
	workspace: "SIGNAL_SYNC_WORKSPACE",
	token: "SIGNAL_SYNC_TOKEN",
	route: "SIGNAL_SYNC_ROUTE",
	poll_interval_ms: "SIGNAL_SYNC_POLL_INTERVAL_MS",
	chunk_size: "SIGNAL_SYNC_CHUNK_SIZE",
	upload_concurrency: "SIGNAL_SYNC_UPLOAD_CONCURRENCY",
} as const satisfies Record<keyof ClientConfig, string>;

/**
 * Validate a configuration object.
 *
 * @example
 * ```ts
 * const config = parse_config({ base_url: 'https://platform.example.com', workspace: 'Demo' })
 * // => ok({ ..., route: 'API', poll_interval_ms: 1000, chunk_size: 10000, upload_concurrency: 4 })
 * ```
 */
export function parse_config(input: unknown): Result<ClientConfig> {
	const parsed = ClientConfigSchema.safeParse(input);
	if (parsed.success) return ok(parsed.data);
	const message = parsed.error.issues.map(issue => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ");
	return err({ kind: "invalid_config", message });
}

/**
 * Read configuration from environment variables (`SIGNAL_SYNC_URL`,
 * `SIGNAL_SYNC_WORKSPACE`, ...). Empty variables count as unset.
 */
export function load_config(env: Record<string, string | undefined> = process.env): Result<ClientConfig> {
	const input: Record<string, string> = {};
	for (const [field, name] of Object.entries(ENV_VARS)) {
		const value = env[name]?.trim();
		if (value) input[field] = value;
	}
	return parse_config(input);
}
