import { errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { MetricDefinition, MetricsBackend } from "./metricsBackend.js";

export const JOB_START_TIME: MetricDefinition = {
  name: "batch_job_start_time",
  help: "Start time of batch job as unix timestamp",
  type: "gauge",
  labelNames: ["job_name"]
};

export const JOB_DURATION: MetricDefinition = {
  name: "batch_job_duration_seconds",
  help: "Duration of batch job",
  type: "gauge",
  labelNames: ["job_name", "status"]
};

export const JOB_COUNT: MetricDefinition = {
  name: "batch_job_count_total",
  help: "Total count of batch jobs",
  type: "counter",
  labelNames: ["job_name", "status"]
};

/**
 * Maps lifecycle transitions onto metric updates. Monitoring is advisory: no
 * method here rejects, whatever the backend does.
 */
export class MetricsEmitter {
  constructor(
    private readonly backend: MetricsBackend,
    private readonly logger: Logger
  ) {
    for (const def of [JOB_START_TIME, JOB_DURATION, JOB_COUNT]) backend.register(def);
  }

  async onBegin(jobName: string, startTime: string): Promise<void> {
    const unixSeconds = Date.parse(startTime) / 1000;
    await this.safely("onBegin", jobName, async () => {
      await this.backend.setGauge(JOB_START_TIME.name, { job_name: jobName }, unixSeconds);
    });
  }

  async onEnd(jobName: string, status: string, durationSeconds: number): Promise<void> {
    await this.safely("onEnd", jobName, async () => {
      await this.backend.setGauge(JOB_DURATION.name, { job_name: jobName, status }, durationSeconds);
      await this.backend.incCounter(JOB_COUNT.name, { job_name: jobName, status }, 1);
    });
  }

  private async safely(operation: string, jobName: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (e) {
      this.logger.error("metrics update failed", { operation, job_name: jobName, error: errorMessage(e) });
    }
  }
}
