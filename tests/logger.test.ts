import { describe, it, expect } from "vitest";
import { createLogger } from "../src/core/logger.js";

function capture(level?: "debug" | "info" | "warn" | "error") {
  const written: string[] = [];
  const logger = createLogger({ name: "tracker", level, write: (line) => written.push(line) });
  return { logger, written };
}

describe("createLogger", () => {
  it("writes one JSON object per line with the data fields inlined", () => {
    const { logger, written } = capture();
    logger.warn("job run already ended; ignoring", { run_id: "run_x", status: "completed" });

    expect(written).toHaveLength(1);
    const parsed: unknown = JSON.parse(written[0] ?? "");
    expect(parsed).toMatchObject({
      level: "warn",
      logger: "tracker",
      message: "job run already ended; ignoring",
      run_id: "run_x",
      status: "completed"
    });
  });

  it("keeps the envelope fields when data reuses their names", () => {
    const { logger, written } = capture();
    logger.info("registered job end", { level: "error", logger: "other", message: "spoofed", ts: "never", job_name: "ingest" });

    const parsed: unknown = JSON.parse(written[0] ?? "");
    expect(parsed).toMatchObject({ level: "info", logger: "tracker", message: "registered job end", job_name: "ingest" });
    expect(parsed).not.toMatchObject({ ts: "never" });
  });

  it("drops lines below the configured level", () => {
    const { logger, written } = capture("warn");
    logger.debug("d");
    logger.info("i");
    logger.error("e");
    expect(written.map((l) => JSON.parse(l).message)).toEqual(["e"]);
  });
});
