import * as z from "zod/v4";

const ulid26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zRunId = z.string().regex(new RegExp(`^run_${ulid26}$`), "invalid run_id");
export const zJobName = z.string().min(1).max(256).refine((s) => s.trim().length > 0, "job_name must be non-blank");
export const zTerminalStatus = z
  .string()
  .min(1)
  .max(64)
  .refine((s) => s.trim().length > 0 && s.trim() !== "running", "status must be a terminal label (not 'running')");

export const zJobRun = z.object({
  run_id: zRunId,
  job_name: z.string(),
  start_time: z.string(),
  end_time: z.string().nullable(),
  duration_seconds: z.number().min(0).nullable(),
  status: z.string()
});

export const zSnapshotRecord = z.object({
  jobName: z.string(),
  startTime: z.string(),
  endTime: z.string(),
  durationSeconds: z.number().min(0),
  status: z.string()
});

export const zJobBeginInput = z.object({
  job_name: zJobName
});

export const zJobBeginOutput = z.object({
  run: zJobRun
});

export const zJobEndInput = z.object({
  run_id: zRunId,
  status: z.string().min(1).max(64)
});

export const zJobEndOutput = z.object({
  outcome: z.enum(["ended", "not_found", "already_terminal", "invalid_status", "store_unavailable"]),
  run_id: zRunId,
  run: zJobRun.nullable(),
  clock_skew: z.boolean(),
  error: z.string().nullable()
});

export const zJobRunGetInput = z.object({
  run_id: zRunId
});

export const zJobRunGetOutput = z.object({
  run: zJobRun
});

export const zJobRunsRecentInput = z.object({
  limit: z.number().int().min(1).max(1000).default(50)
});

export const zJobRunsRecentOutput = z.object({
  runs: z.array(zJobRun)
});

export const zJobHistoryExportInput = z.object({
  limit: z.number().int().min(1).max(10000).default(1000)
});

export const zJobHistoryExportOutput = z.object({
  record_count: z.number().int().min(0),
  records: z.array(zSnapshotRecord)
});

export const zJobRunOverrideInput = z.object({
  run_id: zRunId,
  status: zTerminalStatus,
  reason: z.string().min(1).max(1024)
});

export const zJobRunOverrideOutput = z.object({
  run: zJobRun
});

export const zJobRunEventsInput = z.object({
  run_id: zRunId
});

export const zJobRunEventsOutput = z.object({
  events: z.array(
    z.object({
      event_id: z.string(),
      run_id: zRunId,
      created_at: z.string(),
      kind: z.string(),
      message: z.string().nullable(),
      data: z.record(z.string(), z.unknown()).nullable()
    })
  )
});

export const zJobMetricsGetInput = z.object({});

export const zJobMetricsGetOutput = z.object({
  content_type: z.string(),
  exposition: z.string()
});
