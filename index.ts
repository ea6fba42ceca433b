export { create_client, create_http_client, type Client, type ClientBuilder, type ClientOptions, type HttpClientOpts } from "./client";

export { create_memory_transport, type MemoryTransportOptions } from "./transport/memory";
export { create_http_transport, build_url, type HttpTransportOptions, type TokenSource } from "./transport/http";
export { create_transport, type RequestHandler, type TransportRequest, type TransportResponse } from "./transport/base";

export { parse_config, load_config, ClientConfigSchema, ENV_VARS, type ClientConfig, type ClientConfigInput } from "./config";

export {
	SIGNAL_KINDS,
	kind_info,
	parse_signal_kind,
	to_descriptor,
	type SignalKind,
	type SignalDescriptor,
	type IndexDomain,
	type ValueType,
	type KindInfo,
} from "./signal";

export {
	TIME_INCREMENTS,
	DEPTH_INCREMENTS,
	normalize_time_increment,
	normalize_depth_increment,
	type TimeIncrement,
	type DepthIncrement,
} from "./increments";

export {
	resolve_window,
	create_range_resolver,
	window_contains,
	type Extent,
	type QueryWindow,
	type RangeSpec,
	type RangeProbe,
	type RangeResolver,
} from "./range";

export {
	encode_rows,
	encode_series,
	to_wire,
	from_wire,
	decode,
	type Cell,
	type TableRow,
	type Table,
	type IndexedRecord,
	type IndexValue,
	type RecordValue,
	type EncodeOpts,
	type DecodeOpts,
	type SeriesInput,
	type WireRecord,
} from "./records";

export { plan_merge, plan_records, record_key, index_span, type MergePlan } from "./merge";

export { create_signals, type Signals, type SignalsOptions, type WriteOpts, type WriteSummary, type ReadOpts } from "./signals";

export {
	create_ref_tables,
	infer_column_type,
	reconcile_columns,
	type RefTables,
	type RefTablesOptions,
	type RefTableSchema,
	type RefColumn,
	type ColumnType,
	type RefRow,
	type RefValue,
	type RefWriteOpts,
	type RefReadFilter,
	type RefRange,
	type RefWriteSummary,
} from "./ref-tables";

export { create_blob_store, type BlobStore, type BlobStoreOptions, type BlobEntry, type DownloadMode } from "./blobs";

export {
	create_workflow_runner,
	is_terminal,
	is_success,
	WORKFLOW_STATUSES,
	type WorkflowRunner,
	type WorkflowRunnerOptions,
	type WorkflowExecution,
	type WorkflowStatus,
	type StartOpts,
	type AwaitOpts,
} from "./workflows";

export { json_codec, text_codec, binary_codec, object_codec } from "./codec";

export type { SyncError, SyncEvent, EventHandler, Result, Transport, RequestOpts, QueryValue, ResponseFormat, HttpMethod, Codec, Parser } from "./types";

export { ok, err } from "./types";

export {
	match,
	unwrap_or,
	unwrap,
	unwrap_err,
	try_catch,
	try_catch_async,
	fetch_result,
	collect,
	to_nullable,
	format_error,
	to_error,
	type FetchError,
} from "./result";

export { Semaphore, parallel_map, poll_until, sleep, type PollOpts } from "./concurrency";

export { format_column, parse_column, format_timestamp, parse_timestamp, normalize_blob_path, in_folder } from "./utils";
