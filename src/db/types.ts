import type { ColumnType, Generated, JSONColumnType } from "kysely";

type JsonObject = Record<string, unknown>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;

// pg hands timestamptz back as Date; writes go in as ISO strings.
type Timestamp = ColumnType<Date | string, string, string>;
type TimestampNullable = ColumnType<Date | string | null, string | null | undefined, string | null>;
type GeneratedTimestamp = ColumnType<Date | string, string | undefined, never>;

export interface JobRunsTable {
  run_id: string;
  job_name: string;
  start_time: Timestamp;
  end_time: TimestampNullable;
  duration_seconds: ColumnType<number | null, number | null | undefined, number | null>;
  status: Generated<string>;
  created_at: GeneratedTimestamp;
}

export interface JobRunEventsTable {
  // bigserial: pg returns bigint as string
  event_id: Generated<string | number>;
  run_id: string;
  ts: GeneratedTimestamp;
  kind: string;
  message: ColumnType<string | null, string | null | undefined, string | null>;
  data: JsonNullable;
}

export interface DB {
  job_runs: JobRunsTable;
  job_run_events: JobRunEventsTable;
}
