import { systemClock, type Clock } from "../core/clock.js";
import { TrackerError, TrackerErrorCode, errorMessage, isTrackerError } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import { RUNNING, isValidTerminalStatus, type CompletedJobRun, type JobRun, type RunEventKind } from "../core/jobRun.js";
import type { Logger } from "../core/logger.js";
import type { MetricsEmitter } from "../metrics/metricsEmitter.js";
import type { RunStore } from "../store/runStore.js";

export type EndOutcome =
  | { outcome: "ended"; run: CompletedJobRun; clockSkew: boolean }
  | { outcome: "not_found"; runId: RunId }
  | { outcome: "already_terminal"; run: JobRun }
  | { outcome: "invalid_status"; runId: RunId; status: string }
  | { outcome: "store_unavailable"; runId: RunId; error: string };

export interface LifecycleTrackerDeps {
  store: RunStore;
  metrics: MetricsEmitter;
  logger: Logger;
  clock?: Clock;
}

export class LifecycleTracker {
  private readonly clock: Clock;

  constructor(private readonly deps: LifecycleTrackerDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Records the start of a run. Storage failures propagate: a run that could
   * not be recorded must not look started.
   */
  async begin(jobName: string): Promise<RunId> {
    if (!jobName.trim()) throw new TrackerError(TrackerErrorCode.InvalidParams, "job_name must be non-empty");

    const startTime = this.clock.now().toISOString();
    const runId = await this.deps.store.create(jobName, startTime);

    await this.audit(runId, "run.begun", `job=${jobName}`, { start_time: startTime });
    await this.deps.metrics.onBegin(jobName, startTime);
    this.deps.logger.info("registered job start", { run_id: runId, job_name: jobName, start_time: startTime });
    return runId;
  }

  /** Closes a run. Never rejects; every failure is logged and reported in the outcome. */
  async end(runId: RunId, status: string): Promise<EndOutcome> {
    if (!isValidTerminalStatus(status)) {
      this.deps.logger.error("rejected job end with invalid status", {
        run_id: runId,
        status,
        code: TrackerErrorCode.InvalidParams
      });
      return { outcome: "invalid_status", runId, status };
    }

    try {
      const run = await this.deps.store.get(runId);
      if (!run) return this.notFound(runId);
      if (run.status !== RUNNING) return this.alreadyTerminal(run);

      const now = this.clock.now();
      let endTime = now.toISOString();
      let durationSeconds = (now.getTime() - Date.parse(run.startTime)) / 1000;
      const clockSkew = durationSeconds < 0;
      if (clockSkew) {
        this.deps.logger.warn("clock skew detected; clamping duration to zero", {
          run_id: runId,
          job_name: run.jobName,
          code: TrackerErrorCode.ClockSkewDetected,
          start_time: run.startTime,
          observed_end_time: endTime,
          computed_duration_seconds: durationSeconds
        });
        endTime = run.startTime;
        durationSeconds = 0;
      }

      try {
        await this.deps.store.complete(runId, endTime, durationSeconds, status);
      } catch (e) {
        if (isTrackerError(e, TrackerErrorCode.NotFound)) return this.notFound(runId);
        if (isTrackerError(e, TrackerErrorCode.AlreadyTerminal)) {
          const current = await this.deps.store.get(runId);
          return this.alreadyTerminal(current ?? run);
        }
        throw e;
      }

      const completed: CompletedJobRun = { ...run, endTime, durationSeconds, status };
      if (clockSkew) {
        await this.audit(runId, "run.clock_skew", "duration clamped to zero", { observed_end_time: now.toISOString() });
      }
      await this.audit(runId, "run.ended", `status=${status}`, { end_time: endTime, duration_seconds: durationSeconds });
      await this.deps.metrics.onEnd(run.jobName, status, durationSeconds);

      this.deps.logger.info("registered job end", {
        run_id: runId,
        job_name: run.jobName,
        status,
        duration_seconds: durationSeconds
      });
      return { outcome: "ended", run: completed, clockSkew };
    } catch (e) {
      this.deps.logger.error("failed to record job end", {
        run_id: runId,
        status,
        code: isTrackerError(e) ? e.code : TrackerErrorCode.StoreUnavailable,
        error: errorMessage(e)
      });
      return { outcome: "store_unavailable", runId, error: errorMessage(e) };
    }
  }

  private notFound(runId: RunId): EndOutcome {
    this.deps.logger.error("job run not found", { run_id: runId, code: TrackerErrorCode.NotFound });
    return { outcome: "not_found", runId };
  }

  private alreadyTerminal(run: JobRun): EndOutcome {
    this.deps.logger.warn("job run already ended; ignoring", {
      run_id: run.id,
      job_name: run.jobName,
      status: run.status,
      code: TrackerErrorCode.AlreadyTerminal
    });
    return { outcome: "already_terminal", run };
  }

  // Audit rows are best-effort: the transition itself is already committed.
  private async audit(runId: RunId, kind: RunEventKind, message: string, data: JsonObject): Promise<void> {
    try {
      await this.deps.store.addEvent(runId, kind, message, data);
    } catch (e) {
      this.deps.logger.warn("failed to record run event", { run_id: runId, kind, error: errorMessage(e) });
    }
  }
}
