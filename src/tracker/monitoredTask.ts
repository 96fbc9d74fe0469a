import type { RunId } from "../core/ids.js";
import type { LifecycleTracker } from "./lifecycleTracker.js";

/**
 * Runs `work` inside a tracked job run: `completed` when it resolves,
 * `failed` when it throws. The work's result or error passes through untouched.
 */
export async function runMonitored<T>(
  tracker: LifecycleTracker,
  jobName: string,
  work: (runId: RunId) => Promise<T> | T
): Promise<T> {
  const runId = await tracker.begin(jobName);
  let result: T;
  try {
    result = await work(runId);
  } catch (e) {
    await tracker.end(runId, "failed");
    throw e;
  }
  await tracker.end(runId, "completed");
  return result;
}
