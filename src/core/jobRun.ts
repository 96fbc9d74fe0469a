import type { RunId } from "./ids.js";
import type { JsonObject } from "./json.js";

export const RUNNING = "running";

/** Any label other than `running`; `completed` and `failed` are the usual ones. */
export type TerminalStatus = "completed" | "failed" | (string & {});
export type JobRunStatus = typeof RUNNING | TerminalStatus;

export interface JobRun {
  id: RunId;
  jobName: string;
  startTime: string;
  endTime: string | null;
  durationSeconds: number | null;
  status: JobRunStatus;
}

export interface CompletedJobRun extends JobRun {
  endTime: string;
  durationSeconds: number;
  status: TerminalStatus;
}

export type RunEventKind = "run.begun" | "run.ended" | "run.clock_skew" | "run.override";

export interface RunEventRecord {
  eventId: string;
  runId: RunId;
  createdAt: string;
  kind: string;
  message: string | null;
  data: JsonObject | null;
}

export function isCompleted(run: JobRun): run is CompletedJobRun {
  return run.status !== RUNNING && run.endTime !== null && run.durationSeconds !== null;
}

export function isValidTerminalStatus(status: string): boolean {
  const trimmed = status.trim();
  return trimmed.length > 0 && trimmed !== RUNNING;
}

export function durationBetween(startTime: string, endTime: string): number {
  return (Date.parse(endTime) - Date.parse(startTime)) / 1000;
}
