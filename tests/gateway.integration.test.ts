import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { Kysely } from "kysely";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ListToolsResultSchema, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import type { DB } from "../src/db/types.js";
import { HistoryExporter } from "../src/history/historyExporter.js";
import { InMemoryMetricsBackend } from "../src/metrics/metricsBackend.js";
import { MetricsEmitter } from "../src/metrics/metricsEmitter.js";
import { EXPOSITION_CONTENT_TYPE } from "../src/metrics/metricsServer.js";
import { createGatewayServer } from "../src/mcp/gatewayServer.js";
import {
  zJobBeginOutput,
  zJobEndOutput,
  zJobHistoryExportOutput,
  zJobMetricsGetOutput,
  zJobRunEventsOutput,
  zJobRunGetOutput,
  zJobRunOverrideOutput,
  zJobRunsRecentOutput
} from "../src/mcp/toolSchemas.js";
import { LifecycleTracker } from "../src/tracker/lifecycleTracker.js";
import { ManualClock, createCaptureLogger, createMemoryStore } from "./helpers.js";

const UNKNOWN_RUN_ID = "run_" + "0".repeat(26);

function textOf(result: CallToolResult): string {
  return result.content.map((c) => (c.type === "text" ? c.text : c.type)).join("\n");
}

describe.sequential("gateway (in-memory)", () => {
  let db: Kysely<DB>;
  let clock: ManualClock;
  let client: Client;
  let serverTransport: InMemoryTransport;
  let clientTransport: InMemoryTransport;

  async function callTool(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    return client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
  }

  async function callOk(name: string, args: Record<string, unknown>): Promise<unknown> {
    const result = await callTool(name, args);
    if (result.isError) throw new Error(`${name} failed: ${textOf(result)}`);
    return result.structuredContent;
  }

  beforeAll(async () => {
    const memory = await createMemoryStore();
    db = memory.db;
    clock = new ManualClock();
    const { logger } = createCaptureLogger();
    const backend = new InMemoryMetricsBackend();
    const tracker = new LifecycleTracker({
      store: memory.store,
      metrics: new MetricsEmitter(backend, logger),
      logger,
      clock
    });
    const exporter = new HistoryExporter(memory.store, logger);
    const server = createGatewayServer({ tracker, store: memory.store, exporter, metrics: backend });

    [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);

    client = new Client({ name: "batchwatch-test-client", version: "0.0.0" });
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await clientTransport.close();
    await serverTransport.close();
    await db.destroy();
  });

  it("lists tools", async () => {
    const result = await client.request({ method: "tools/list", params: {} }, ListToolsResultSchema);
    expect(result.tools.map((t) => t.name).sort()).toEqual([
      "job_begin",
      "job_end",
      "job_history_export",
      "job_metrics_get",
      "job_run_events",
      "job_run_get",
      "job_run_override",
      "job_runs_recent"
    ]);
  });

  it("tracks a run from begin to end and exports it", async () => {
    const begun = zJobBeginOutput.parse(await callOk("job_begin", { job_name: "data_ingestion" }));
    expect(begun.run).toMatchObject({
      job_name: "data_ingestion",
      start_time: "2025-05-01T01:00:00.000Z",
      end_time: null,
      duration_seconds: null,
      status: "running"
    });
    const runId = begun.run.run_id;

    clock.advance(5);
    const ended = zJobEndOutput.parse(await callOk("job_end", { run_id: runId, status: "completed" }));
    expect(ended).toEqual({
      outcome: "ended",
      run_id: runId,
      run: {
        run_id: runId,
        job_name: "data_ingestion",
        start_time: "2025-05-01T01:00:00.000Z",
        end_time: "2025-05-01T01:00:05.000Z",
        duration_seconds: 5,
        status: "completed"
      },
      clock_skew: false,
      error: null
    });

    const again = zJobEndOutput.parse(await callOk("job_end", { run_id: runId, status: "failed" }));
    expect(again.outcome).toBe("already_terminal");
    expect(again.run?.status).toBe("completed");

    const fetched = zJobRunGetOutput.parse(await callOk("job_run_get", { run_id: runId }));
    expect(fetched.run.duration_seconds).toBe(5);

    const exported = zJobHistoryExportOutput.parse(await callOk("job_history_export", {}));
    expect(exported).toEqual({
      record_count: 1,
      records: [
        {
          jobName: "data_ingestion",
          startTime: "2025-05-01T01:00:00.000Z",
          endTime: "2025-05-01T01:00:05.000Z",
          durationSeconds: 5,
          status: "completed"
        }
      ]
    });
  });

  it("reports unknown runs without raising from job_end", async () => {
    const ended = zJobEndOutput.parse(await callOk("job_end", { run_id: UNKNOWN_RUN_ID, status: "failed" }));
    expect(ended).toEqual({ outcome: "not_found", run_id: UNKNOWN_RUN_ID, run: null, clock_skew: false, error: null });

    const invalid = zJobEndOutput.parse(await callOk("job_end", { run_id: UNKNOWN_RUN_ID, status: "running" }));
    expect(invalid.outcome).toBe("invalid_status");
    expect(invalid.error).toBe("invalid terminal status: 'running'");

    const get = await callTool("job_run_get", { run_id: UNKNOWN_RUN_ID });
    expect(get.isError).toBe(true);
    expect(textOf(get)).toContain(`unknown run_id: ${UNKNOWN_RUN_ID}`);
  });

  it("lists recent runs newest first", async () => {
    clock.advance(60);
    const later = zJobBeginOutput.parse(await callOk("job_begin", { job_name: "model_training" }));

    const recent = zJobRunsRecentOutput.parse(await callOk("job_runs_recent", { limit: 2 }));
    expect(recent.runs.map((r) => r.job_name)).toEqual(["model_training", "data_ingestion"]);
    expect(recent.runs[0]?.run_id).toBe(later.run.run_id);
  });

  it("overrides a terminal status and records the audit event", async () => {
    clock.advance(1);
    const begun = zJobBeginOutput.parse(await callOk("job_begin", { job_name: "report" }));
    const runId = begun.run.run_id;

    const refused = await callTool("job_run_override", { run_id: runId, status: "failed", reason: "manual check" });
    expect(refused.isError).toBe(true);
    expect(textOf(refused)).toContain("is still running");

    clock.advance(2);
    await callOk("job_end", { run_id: runId, status: "completed" });
    const overridden = zJobRunOverrideOutput.parse(
      await callOk("job_run_override", { run_id: runId, status: "failed", reason: "output was empty" })
    );
    expect(overridden.run.status).toBe("failed");
    expect(overridden.run.duration_seconds).toBe(2);

    const events = zJobRunEventsOutput.parse(await callOk("job_run_events", { run_id: runId }));
    expect(events.events.map((e) => e.kind)).toEqual(["run.begun", "run.ended", "run.override"]);
    expect(events.events[2]).toMatchObject({
      message: "output was empty",
      data: { previous_status: "completed", status: "failed" }
    });
  });

  it("serves the metrics exposition", async () => {
    const metrics = zJobMetricsGetOutput.parse(await callOk("job_metrics_get", {}));
    expect(metrics.content_type).toBe(EXPOSITION_CONTENT_TYPE);
    const lines = metrics.exposition.split("\n");
    expect(lines).toContain('batch_job_count_total{job_name="data_ingestion",status="completed"} 1');
    expect(lines).toContain('batch_job_duration_seconds{job_name="data_ingestion",status="completed"} 5');
    expect(lines).toContain('batch_job_count_total{job_name="report",status="completed"} 1');
  });

  it("requires an explicit status to end a run", async () => {
    clock.advance(1);
    const begun = zJobBeginOutput.parse(await callOk("job_begin", { job_name: "cleanup" }));
    const runId = begun.run.run_id;

    const ended = await callTool("job_end", { run_id: runId });
    expect(ended.isError).toBe(true);

    const fetched = zJobRunGetOutput.parse(await callOk("job_run_get", { run_id: runId }));
    expect(fetched.run.status).toBe("running");
  });
});
