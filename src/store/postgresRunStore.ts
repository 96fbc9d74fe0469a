import type { Kysely, Selectable } from "kysely";
import type { DB } from "../db/types.js";
import { runIdFactory, toRunId, type RunId } from "../core/ids.js";
import { isJsonObject, type JsonObject } from "../core/json.js";
import { RUNNING, isValidTerminalStatus, type JobRun, type RunEventKind, type RunEventRecord, type TerminalStatus } from "../core/jobRun.js";
import { TrackerError, TrackerErrorCode, errorMessage } from "../core/errors.js";
import type { RunStore } from "./runStore.js";

function toIso(value: Date | string): string {
  if (value instanceof Date) return value.toISOString();
  return new Date(value).toISOString();
}

function toIsoOrNull(value: Date | string | null): string | null {
  if (value === null) return null;
  return toIso(value);
}

function requireIso(value: string, label: string): string {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) throw new TrackerError(TrackerErrorCode.InvalidParams, `${label} is not a timestamp: ${value}`);
  return new Date(ms).toISOString();
}

async function storage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof TrackerError) throw e;
    throw new TrackerError(TrackerErrorCode.StoreUnavailable, `${operation} failed: ${errorMessage(e)}`, { cause: e });
  }
}

async function insertEvent(
  db: Kysely<DB>,
  runId: RunId,
  kind: RunEventKind,
  message: string | null,
  data: JsonObject | null
): Promise<void> {
  await db.insertInto("job_run_events").values({ run_id: runId, kind, message, data }).execute();
}

export class PostgresRunStore implements RunStore {
  private readonly newRunId: () => RunId;

  constructor(
    private readonly db: Kysely<DB>,
    opts: { newRunId?: () => RunId } = {}
  ) {
    this.newRunId = opts.newRunId ?? runIdFactory();
  }

  async create(jobName: string, startTime: string): Promise<RunId> {
    if (!jobName.trim()) throw new TrackerError(TrackerErrorCode.InvalidParams, "job_name must be non-empty");
    const start = requireIso(startTime, "start_time");
    const runId = this.newRunId();

    await storage("create run", () =>
      this.db
        .insertInto("job_runs")
        .values({ run_id: runId, job_name: jobName, start_time: start, status: RUNNING })
        .execute()
    );
    return runId;
  }

  async complete(runId: RunId, endTime: string, durationSeconds: number, status: TerminalStatus): Promise<void> {
    if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
      throw new TrackerError(TrackerErrorCode.InvalidParams, `duration_seconds must be a finite number >= 0 (got ${durationSeconds})`);
    }
    if (!isValidTerminalStatus(status)) {
      throw new TrackerError(TrackerErrorCode.InvalidParams, `invalid terminal status: '${status}'`);
    }
    const end = requireIso(endTime, "end_time");

    // Compare-and-set: only a row still running can be closed, so concurrent
    // completions of the same run have exactly one winner.
    const updated = await storage("complete run", () =>
      this.db
        .updateTable("job_runs")
        .set({ end_time: end, duration_seconds: durationSeconds, status })
        .where("run_id", "=", runId)
        .where("status", "=", RUNNING)
        .returning("run_id")
        .execute()
    );
    if (updated.length > 0) return;

    const existing = await this.get(runId);
    if (!existing) throw new TrackerError(TrackerErrorCode.NotFound, `unknown run_id: ${runId}`);
    throw new TrackerError(TrackerErrorCode.AlreadyTerminal, `run ${runId} already ended with status '${existing.status}'`);
  }

  async get(runId: RunId): Promise<JobRun | null> {
    const row = await storage("get run", () =>
      this.db.selectFrom("job_runs").selectAll().where("run_id", "=", runId).executeTakeFirst()
    );
    return row ? this.mapRun(row) : null;
  }

  async listRecent(limit: number): Promise<JobRun[]> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new TrackerError(TrackerErrorCode.InvalidParams, `limit must be an integer >= 0 (got ${limit})`);
    }
    if (limit === 0) return [];

    const rows = await storage("list recent runs", () =>
      this.db
        .selectFrom("job_runs")
        .selectAll()
        .orderBy("start_time", "desc")
        .orderBy("run_id", "desc")
        .limit(limit)
        .execute()
    );
    return rows.map((row) => this.mapRun(row));
  }

  async override(runId: RunId, status: TerminalStatus, reason: string): Promise<JobRun> {
    if (!isValidTerminalStatus(status)) {
      throw new TrackerError(TrackerErrorCode.InvalidParams, `invalid terminal status: '${status}'`);
    }
    if (!reason.trim()) throw new TrackerError(TrackerErrorCode.InvalidParams, "override reason must be non-empty");

    const before = await this.get(runId);
    if (!before) throw new TrackerError(TrackerErrorCode.NotFound, `unknown run_id: ${runId}`);
    if (before.status === RUNNING) {
      throw new TrackerError(TrackerErrorCode.InvalidParams, `run ${runId} is still running; end it before overriding`);
    }

    // The status change and its audit row commit together or not at all.
    const updated = await storage("override run", () =>
      this.db.transaction().execute(async (trx) => {
        const row = await trx
          .updateTable("job_runs")
          .set({ status })
          .where("run_id", "=", runId)
          .where("status", "=", before.status)
          .returningAll()
          .executeTakeFirst();
        if (!row) {
          throw new TrackerError(TrackerErrorCode.AlreadyTerminal, `run ${runId} changed during override; retry`);
        }
        await insertEvent(trx, runId, "run.override", reason, { previous_status: before.status, status });
        return row;
      })
    );
    return this.mapRun(updated);
  }

  async addEvent(runId: RunId, kind: RunEventKind, message: string | null, data: JsonObject | null): Promise<void> {
    await storage("add run event", () => insertEvent(this.db, runId, kind, message, data));
  }

  async listEvents(runId: RunId): Promise<RunEventRecord[]> {
    const rows = await storage("list run events", () =>
      this.db.selectFrom("job_run_events").selectAll().where("run_id", "=", runId).orderBy("event_id", "asc").execute()
    );
    return rows.map((row) => ({
      eventId: String(row.event_id),
      runId: toRunId(row.run_id),
      createdAt: toIso(row.ts),
      kind: row.kind,
      message: row.message,
      data: isJsonObject(row.data) ? row.data : null
    }));
  }

  private mapRun(row: Selectable<DB["job_runs"]>): JobRun {
    return {
      id: toRunId(row.run_id),
      jobName: row.job_name,
      startTime: toIso(row.start_time),
      endTime: toIsoOrNull(row.end_time),
      durationSeconds: row.duration_seconds,
      status: row.status
    };
  }
}
