import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { JobRun, RunEventKind, RunEventRecord, TerminalStatus } from "../core/jobRun.js";

/**
 * Durable store for job runs. Every method resolves only after its write is
 * committed; storage failures reject with a `StoreUnavailable` TrackerError.
 */
export interface RunStore {
  create(jobName: string, startTime: string): Promise<RunId>;
  /**
   * Closes a running record. Rejects with `NotFound` for an unknown id and with
   * `AlreadyTerminal` when another completion already won.
   */
  complete(runId: RunId, endTime: string, durationSeconds: number, status: TerminalStatus): Promise<void>;
  get(runId: RunId): Promise<JobRun | null>;
  listRecent(limit: number): Promise<JobRun[]>;
  /** Audited correction of a terminal status. Never reopens a run. */
  override(runId: RunId, status: TerminalStatus, reason: string): Promise<JobRun>;
  addEvent(runId: RunId, kind: RunEventKind, message: string | null, data: JsonObject | null): Promise<void>;
  listEvents(runId: RunId): Promise<RunEventRecord[]>;
}
