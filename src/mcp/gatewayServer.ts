import { ErrorCode, McpError, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type * as z from "zod/v4";
import { TrackerErrorCode, isTrackerError } from "../core/errors.js";
import { toRunId } from "../core/ids.js";
import type { JobRun, RunEventRecord } from "../core/jobRun.js";
import type { HistoryExporter } from "../history/historyExporter.js";
import type { InMemoryMetricsBackend } from "../metrics/metricsBackend.js";
import { EXPOSITION_CONTENT_TYPE } from "../metrics/metricsServer.js";
import type { RunStore } from "../store/runStore.js";
import type { EndOutcome, LifecycleTracker } from "../tracker/lifecycleTracker.js";
import {
  zJobBeginInput,
  zJobBeginOutput,
  zJobEndInput,
  zJobEndOutput,
  zJobHistoryExportInput,
  zJobHistoryExportOutput,
  zJobMetricsGetInput,
  zJobMetricsGetOutput,
  zJobRunEventsInput,
  zJobRunEventsOutput,
  zJobRunGetInput,
  zJobRunGetOutput,
  zJobRunOverrideInput,
  zJobRunOverrideOutput,
  zJobRunsRecentInput,
  zJobRunsRecentOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  tracker: LifecycleTracker;
  store: RunStore;
  exporter: HistoryExporter;
  metrics: InMemoryMetricsBackend;
}

function toRunSummary(run: JobRun) {
  return {
    run_id: run.id,
    job_name: run.jobName,
    start_time: run.startTime,
    end_time: run.endTime,
    duration_seconds: run.durationSeconds,
    status: run.status
  };
}

function toEventSummary(e: RunEventRecord) {
  return {
    event_id: e.eventId,
    run_id: e.runId,
    created_at: e.createdAt,
    kind: e.kind,
    message: e.message,
    data: e.data
  };
}

function toEndSummary(result: EndOutcome): z.infer<typeof zJobEndOutput> {
  switch (result.outcome) {
    case "ended":
      return { outcome: result.outcome, run_id: result.run.id, run: toRunSummary(result.run), clock_skew: result.clockSkew, error: null };
    case "already_terminal":
      return { outcome: result.outcome, run_id: result.run.id, run: toRunSummary(result.run), clock_skew: false, error: null };
    case "not_found":
      return { outcome: result.outcome, run_id: result.runId, run: null, clock_skew: false, error: null };
    case "invalid_status":
      return {
        outcome: result.outcome,
        run_id: result.runId,
        run: null,
        clock_skew: false,
        error: `invalid terminal status: '${result.status}'`
      };
    case "store_unavailable":
      return { outcome: result.outcome, run_id: result.runId, run: null, clock_skew: false, error: result.error };
  }
}

function toMcpError(e: unknown): unknown {
  if (!isTrackerError(e)) return e;
  switch (e.code) {
    case TrackerErrorCode.NotFound:
    case TrackerErrorCode.InvalidParams:
      return new McpError(ErrorCode.InvalidParams, e.message);
    case TrackerErrorCode.AlreadyTerminal:
    case TrackerErrorCode.ClockSkewDetected:
      return new McpError(ErrorCode.InvalidRequest, e.message);
    case TrackerErrorCode.StoreUnavailable:
      return new McpError(ErrorCode.InternalError, e.message);
  }
}

async function translated(fn: () => Promise<CallToolResult>): Promise<CallToolResult> {
  try {
    return await fn();
  } catch (e) {
    throw toMcpError(e);
  }
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "batchwatch-gateway",
    version: "0.1.0"
  });

  mcp.registerTool(
    "job_begin",
    {
      description: "Record the start of a batch job run and return its run_id.",
      inputSchema: zJobBeginInput,
      outputSchema: zJobBeginOutput
    },
    async (args) =>
      translated(async () => {
        const runId = await deps.tracker.begin(args.job_name);
        const run = await deps.store.get(runId);
        if (!run) throw new McpError(ErrorCode.InternalError, `run ${runId} not readable after create`);
        return {
          content: [{ type: "text", text: `Started ${run.jobName} (${runId})` }],
          structuredContent: { run: toRunSummary(run) }
        };
      })
  );

  mcp.registerTool(
    "job_end",
    {
      description: "Record the end of a batch job run. Best-effort: failures are reported in `outcome`, never raised.",
      inputSchema: zJobEndInput,
      outputSchema: zJobEndOutput
    },
    async (args) => {
      const result = await deps.tracker.end(toRunId(args.run_id), args.status);
      const summary = toEndSummary(result);
      return {
        content: [{ type: "text", text: `job_end ${summary.run_id}: ${summary.outcome}` }],
        structuredContent: summary
      };
    }
  );

  mcp.registerTool(
    "job_run_get",
    {
      description: "Fetch one job run by ID.",
      inputSchema: zJobRunGetInput,
      outputSchema: zJobRunGetOutput
    },
    async (args) =>
      translated(async () => {
        const run = await deps.store.get(toRunId(args.run_id));
        if (!run) throw new McpError(ErrorCode.InvalidParams, `unknown run_id: ${args.run_id}`);
        return {
          content: [{ type: "text", text: `Run ${run.id} (${run.jobName}): ${run.status}` }],
          structuredContent: { run: toRunSummary(run) }
        };
      })
  );

  mcp.registerTool(
    "job_runs_recent",
    {
      description: "List the most recently started job runs, newest first.",
      inputSchema: zJobRunsRecentInput,
      outputSchema: zJobRunsRecentOutput
    },
    async (args) =>
      translated(async () => {
        const runs = await deps.store.listRecent(args.limit);
        return {
          content: [{ type: "text", text: `${runs.length} runs` }],
          structuredContent: { runs: runs.map(toRunSummary) }
        };
      })
  );

  mcp.registerTool(
    "job_history_export",
    {
      description: "Snapshot of recently completed job runs (running ones are left out).",
      inputSchema: zJobHistoryExportInput,
      outputSchema: zJobHistoryExportOutput
    },
    async (args) =>
      translated(async () => {
        const records = await deps.exporter.export(args.limit);
        return {
          content: [{ type: "text", text: `Exported ${records.length} completed runs` }],
          structuredContent: { record_count: records.length, records }
        };
      })
  );

  mcp.registerTool(
    "job_run_override",
    {
      description: "Correct the terminal status of an ended run. The change is recorded as a run.override event.",
      inputSchema: zJobRunOverrideInput,
      outputSchema: zJobRunOverrideOutput
    },
    async (args) =>
      translated(async () => {
        const run = await deps.store.override(toRunId(args.run_id), args.status, args.reason);
        return {
          content: [{ type: "text", text: `Run ${run.id} status overridden to ${run.status}` }],
          structuredContent: { run: toRunSummary(run) }
        };
      })
  );

  mcp.registerTool(
    "job_run_events",
    {
      description: "Audit trail for one job run, oldest first.",
      inputSchema: zJobRunEventsInput,
      outputSchema: zJobRunEventsOutput
    },
    async (args) =>
      translated(async () => {
        const runId = toRunId(args.run_id);
        const run = await deps.store.get(runId);
        if (!run) throw new McpError(ErrorCode.InvalidParams, `unknown run_id: ${args.run_id}`);
        const events = await deps.store.listEvents(runId);
        return {
          content: [{ type: "text", text: `${events.length} events for ${runId}` }],
          structuredContent: { events: events.map(toEventSummary) }
        };
      })
  );

  mcp.registerTool(
    "job_metrics_get",
    {
      description: "Current job metrics in the Prometheus text exposition format.",
      inputSchema: zJobMetricsGetInput,
      outputSchema: zJobMetricsGetOutput
    },
    async () => {
      const exposition = deps.metrics.render();
      return {
        content: [{ type: "text", text: exposition }],
        structuredContent: { content_type: EXPOSITION_CONTENT_TYPE, exposition }
      };
    }
  );

  return mcp;
}
