/**
 * @module Workflows
 * @description Starting remote workflows and polling their executions to a terminal state.
 */

import { z } from "zod";
import { poll_until } from "./concurrency";
import { ok, err, type Result, type SyncError, type Transport } from "./types";
import { create_emitter, encode_segment } from "./utils";

export const WORKFLOW_STATUSES = ["Waiting", "Executing", "Executed", "Completed", "Failed", "Cancelled"] as const;

export type WorkflowStatus = (typeof WORKFLOW_STATUSES)[number];

/**
 * One run of a workflow. Status is owned by the server; the client only observes it.
 * @category Types
 * @group Workflow Types
 */
export type WorkflowExecution = {
	id: string;
	status: WorkflowStatus;
};

/** `Executed`, `Completed`, `Failed` and `Cancelled` end an execution. */
export const is_terminal = (status: WorkflowStatus): boolean => status !== "Waiting" && status !== "Executing";

/** `Executed` and `Completed` both count as success. */
export const is_success = (status: WorkflowStatus): boolean => status === "Executed" || status === "Completed";

export type StartOpts = {
	contexts?: string[];
	scope?: string;
	entity_set?: string;
	/** Defaults to `"Now"` */
	schedule_name?: string;
	source?: string;
};

export type AwaitOpts = {
	/** Defaults to the runner's `poll_interval_ms` */
	poll_interval_ms?: number;
	/** Unbounded when omitted */
	timeout_ms?: number;
	/** Aborting stops polling; the remote execution keeps running */
	signal?: AbortSignal;
};

export type WorkflowRunner = {
	start: (workflow: string, opts?: StartOpts) => Promise<Result<WorkflowExecution>>;
	poll: (execution_id: string) => Promise<Result<WorkflowExecution>>;
	await_completion: (execution_id: string, opts?: AwaitOpts) => Promise<Result<WorkflowExecution>>;
	run: (workflow: string, opts?: StartOpts & AwaitOpts) => Promise<Result<WorkflowExecution>>;
};

export type WorkflowRunnerOptions = {
	/** Workspace name sent with every start request */
	workspace: string;
	poll_interval_ms?: number;
};

const StatusSchema = z.enum(WORKFLOW_STATUSES);

export const RemoteExecutionSchema = z.union([
	z.object({ Id: z.string(), Status: StatusSchema }),
	// some deployments answer a start request with the bare id
	z.string().min(1),
]);

const to_execution = (raw: z.infer<typeof RemoteExecutionSchema>): WorkflowExecution =>
	typeof raw === "string" ? { id: raw, status: "Waiting" } : { id: raw.Id, status: raw.Status };

/**
 * Creates the workflow runner.
 * @category Core
 * @group Workflows
 *
 * `await_completion` re-polls until the execution reaches a terminal state. A
 * `timeout` or `cancelled` error leaves the remote execution untouched; the
 * caller may poll again or keep waiting.
 *
 * @example
 * ```ts
 * const workflows = create_workflow_runner(transport, { workspace: 'Demo' })
 * const done = await workflows.run('Nightly rollup', { timeout_ms: 10 * 60_000 })
 * if (done.ok && !is_success(done.value.status)) console.warn('rollup ended as', done.value.status)
 * ```
 */
export function create_workflow_runner(transport: Transport, options: WorkflowRunnerOptions): WorkflowRunner {
	const emit = create_emitter(transport.on_event);
	const default_interval = options.poll_interval_ms ?? 1000;

	const fail = (error: SyncError): Result<never> => {
		emit({ type: "error", error });
		return err(error);
	};

	const parse = (operation: string, value: unknown): Result<WorkflowExecution> => {
		const parsed = RemoteExecutionSchema.safeParse(value);
		if (!parsed.success) return fail({ kind: "invalid_response", operation, message: parsed.error.message });
		return ok(to_execution(parsed.data));
	};

	async function start(workflow: string, opts: StartOpts = {}): Promise<Result<WorkflowExecution>> {
		const body: Record<string, unknown> = {
			WorkflowName: workflow,
			WorkspaceName: options.workspace,
			Source: opts.source ?? "signal-sync",
			ScheduleName: opts.schedule_name ?? "Now",
			ProcessingContexts: opts.contexts ?? [],
		};
		if (opts.scope) body.ProcessingScopeName = opts.scope;
		if (opts.entity_set) body.ProcessingEntitySet = opts.entity_set;

		const response = await transport.post("WorkflowExecution/AddRequest", body);
		if (!response.ok) return response;
		const execution = parse("workflow_start", response.value);
		if (!execution.ok) return execution;
		emit({ type: "workflow_start", workflow, execution_id: execution.value.id });
		return execution;
	}

	async function poll(execution_id: string): Promise<Result<WorkflowExecution>> {
		const response = await transport.get(`WorkflowExecution/${encode_segment(execution_id)}`);
		if (!response.ok) return response;
		const execution = parse("workflow_poll", response.value);
		if (!execution.ok) return execution;
		emit({ type: "workflow_poll", execution_id, status: execution.value.status });
		return execution;
	}

	async function await_completion(execution_id: string, opts: AwaitOpts = {}): Promise<Result<WorkflowExecution>> {
		const result = await poll_until(() => poll(execution_id), execution => is_terminal(execution.status), {
			interval_ms: opts.poll_interval_ms ?? default_interval,
			timeout_ms: opts.timeout_ms,
			signal: opts.signal,
			operation: "await_completion",
			id: execution_id,
			status_of: execution => execution.status,
		});
		if (!result.ok && (result.error.kind === "timeout" || result.error.kind === "cancelled")) return fail(result.error);
		return result;
	}

	return {
		start,
		poll,
		await_completion,

		async run(workflow, opts = {}) {
			const started = await start(workflow, opts);
			if (!started.ok) return started;
			if (is_terminal(started.value.status)) return started;
			return await_completion(started.value.id, opts);
		},
	};
}
