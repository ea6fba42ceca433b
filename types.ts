/**
 * @module Types
 * @description Type definitions for the signal-sync library.
 */

/**
 * Error types that can occur during synchronization calls.
 * @category Types
 * @group Error Types
 *
 * Uses discriminated unions for type-safe error handling via the `kind` field:
 * - `invalid_range_spec` - Malformed or unsupported query window or increment
 * - `missing_unit` - An indexed write with no unit from the call or the signal
 * - `invalid_index_value` - An index not representable in the signal kind's domain
 * - `invalid_value` - A cell that cannot be a value of the signal's value type
 * - `invalid_row` - A row without the entity or key it needs
 * - `invalid_signal_kind` - Unrecognised signal kind name
 * - `schema_mismatch` - Reference table column conflict
 * - `decode_error` - Blob content does not match the requested decode mode
 * - `timeout` - A polling loop exceeded its budget
 * - `cancelled` - A polling loop was aborted by the caller
 * - `remote_failure` - Opaque passthrough of a transport-level failure
 * - `invalid_response` - A remote payload failed schema validation
 * - `invalid_config` - Configuration error during setup
 * - `io_error` - A local file could not be read
 *
 * @example
 * ```ts
 * const result = await client.signals.write('Oil rate', rows)
 * if (!result.ok) {
 *   switch (result.error.kind) {
 *     case 'invalid_index_value':
 *       console.log(`Bad index for ${result.error.entity}:`, result.error.value)
 *       break
 *     case 'remote_failure':
 *       console.log(`HTTP ${result.error.status} from ${result.error.path}`)
 *       break
 *   }
 * }
 * ```
 */
export type SyncError =
  | { kind: 'invalid_range_spec'; message: string; signal?: string }
  | { kind: 'missing_unit'; signal: string; entity?: string }
  | { kind: 'invalid_index_value'; signal: string; entity: string; value: unknown; message: string }
  | { kind: 'invalid_value'; signal: string; entity: string; index?: string; value: unknown; message: string }
  | { kind: 'invalid_row'; row: number; message: string; table?: string; signal?: string }
  | { kind: 'invalid_signal_kind'; value: string }
  | { kind: 'schema_mismatch'; table: string; column: string; message: string }
  | { kind: 'decode_error'; path: string; mode: string; cause: Error }
  | { kind: 'timeout'; operation: string; id: string; elapsed_ms: number; last_status?: string }
  | { kind: 'cancelled'; operation: string; id: string }
  | { kind: 'remote_failure'; method: HttpMethod; path: string; status?: number; message: string }
  | { kind: 'invalid_response'; operation: string; message: string }
  | { kind: 'invalid_config'; message: string }
  | { kind: 'io_error'; path: string; cause: Error }

/**
 * A discriminated union representing either success or failure.
 * @category Types
 * @group Result Types
 */
export type Result<T, E = SyncError> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Creates a successful Result containing a value.
 *
 * @category Core
 * @group Result Helpers
 *
 * @example
 * ```ts
 * function divide(a: number, b: number): Result<number, string> {
 *   if (b === 0) return err('Division by zero')
 *   return ok(a / b)
 * }
 * ```
 */
export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

/**
 * Creates a failed Result containing an error.
 *
 * @category Core
 * @group Result Helpers
 */
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error })

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE'

export type SyncEvent =
  | { type: 'request'; method: HttpMethod; path: string }
  | { type: 'response'; method: HttpMethod; path: string; status: number; duration_ms: number }
  | { type: 'signal_write'; signal: string; kind: string; written: number; skipped: number }
  | { type: 'signal_read'; signal: string; kind: string; records: number }
  | { type: 'signal_delete'; signal: string; kind: string; entities: number }
  | { type: 'range_resolved'; signal: string; empty: boolean }
  | { type: 'ref_table_create'; table: string; columns: number }
  | { type: 'ref_table_update'; table: string; added: string[] }
  | { type: 'ref_table_write'; table: string; written: number; skipped: number }
  | { type: 'ref_table_delete'; table: string; rows_only: boolean }
  | { type: 'blob_upload'; path: string; size_bytes: number }
  | { type: 'blob_delete'; path: string }
  | { type: 'workflow_start'; workflow: string; execution_id: string }
  | { type: 'workflow_poll'; execution_id: string; status: string }
  | { type: 'error'; error: SyncError }

export type EventHandler = (event: SyncEvent) => void

export type QueryValue = string | number | boolean | undefined

export type ResponseFormat = 'json' | 'text' | 'bytes'

/** One named file of a multipart/form-data request body. */
export type FilePart = {
  filename: string
  content: Uint8Array
}

export type RequestOpts = {
  query?: Record<string, QueryValue>
  format?: ResponseFormat
  /** Sent as multipart/form-data, one part per field, in place of a JSON body */
  files?: Record<string, FilePart>
}

/**
 * Interface of the authenticated request collaborator every component talks to.
 *
 * Paths are relative to the workspace (`Signals/Oil%20rate`); callers encode path
 * segments themselves. A non-2xx response is returned as a `remote_failure`.
 *
 * Built-in transports:
 * - `create_http_transport()` - `fetch` against the remote platform
 * - `create_memory_transport()` - In-process stand-in for tests and offline work
 *
 * @category Types
 * @group Transport Types
 */
export type Transport = {
  get: (path: string, opts?: RequestOpts) => Promise<Result<unknown>>
  put: (path: string, data?: unknown, opts?: RequestOpts) => Promise<Result<unknown>>
  post: (path: string, data?: unknown, opts?: RequestOpts) => Promise<Result<unknown>>
  delete: (path: string, opts?: RequestOpts) => Promise<Result<unknown>>
  on_event?: EventHandler
}

/**
 * Serialization interface for typed blob decoding.
 *
 * Built-in codecs:
 * - `json_codec(schema)` - JSON with Zod validation on decode
 * - `text_codec()` - Plain UTF-8 text
 * - `binary_codec()` - Raw binary pass-through
 * - `object_codec()` - Structured-clone encoding (Dates, Maps, Sets survive)
 *
 * @category Types
 * @group Codec Types
 */
export type Codec<T> = {
  content_type: string
  encode: (value: T) => Uint8Array
  decode: (bytes: Uint8Array) => T
}

/**
 * Structural type for schema validators (Zod or custom).
 * @category Types
 * @group Codec Types
 */
export type Parser<T> = { parse: (data: unknown) => T }
