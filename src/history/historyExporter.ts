import { promises as fs } from "fs";
import path from "path";
import { isCompleted } from "../core/jobRun.js";
import type { Logger } from "../core/logger.js";
import type { RunStore } from "../store/runStore.js";

export interface SnapshotRecord {
  jobName: string;
  startTime: string;
  endTime: string;
  durationSeconds: number;
  status: string;
}

export interface WriteSnapshotResult {
  outputPath: string;
  recordCount: number;
}

export class HistoryExporter {
  constructor(
    private readonly store: RunStore,
    private readonly logger: Logger
  ) {}

  /** Completed runs among the `limit` most recently started, newest first. */
  async export(limit: number): Promise<SnapshotRecord[]> {
    const runs = await this.store.listRecent(limit);
    return runs.filter(isCompleted).map((run) => ({
      jobName: run.jobName,
      startTime: run.startTime,
      endTime: run.endTime,
      durationSeconds: run.durationSeconds,
      status: run.status
    }));
  }

  async writeSnapshotFile(outputPath: string, limit: number): Promise<WriteSnapshotResult> {
    const records = await this.export(limit);
    const resolved = path.resolve(outputPath);
    await fs.mkdir(path.dirname(resolved), { recursive: true });

    // tmp file + rename: the snapshot is replaced atomically.
    const tmpPath = `${resolved}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tmpPath, JSON.stringify(records, null, 2) + "\n", "utf8");
      await fs.rename(tmpPath, resolved);
    } catch (e) {
      await fs.rm(tmpPath, { force: true });
      throw e;
    }

    this.logger.info("exported job history snapshot", { output_path: resolved, records: records.length });
    return { outputPath: resolved, recordCount: records.length };
  }
}
