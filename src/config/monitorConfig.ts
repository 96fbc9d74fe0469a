import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";

export const DEFAULT_CONFIG_PATH = "config/default.monitor.yaml";

export const zMonitorConfig = z.object({
  version: z.literal(1),
  store: z
    .object({
      auto_schema: z.boolean().default(true)
    })
    .default({ auto_schema: true }),
  metrics: z
    .object({
      enabled: z.boolean().default(true),
      host: z.string().min(1).default("0.0.0.0"),
      port: z.number().int().min(0).max(65535).default(9876)
    })
    .default({ enabled: true, host: "0.0.0.0", port: 9876 }),
  export: z
    .object({
      default_limit: z.number().int().min(1).default(1000),
      output_path: z.string().min(1).default("var/job_runs.json")
    })
    .default({ default_limit: 1000, output_path: "var/job_runs.json" }),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info")
    })
    .default({ level: "info" })
});

export type MonitorConfig = z.infer<typeof zMonitorConfig>;

export type Env = Record<string, string | undefined>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

function parseBooleanEnv(name: string, raw: string): boolean {
  const v = raw.trim().toLowerCase();
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  throw new Error(`invalid ${name}: ${raw} (expected true|false)`);
}

function parsePortEnv(name: string, raw: string): number {
  if (!/^[0-9]+$/.test(raw.trim())) throw new Error(`invalid ${name}: ${raw}`);
  return Number(raw.trim());
}

/** Applies METRICS_PORT, LOG_LEVEL and AUTO_SCHEMA on top of the file values. */
function applyEnvOverrides(raw: unknown, env: Env): unknown {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return raw;
  const out: Record<string, unknown> = { ...raw };
  const section = (key: string): Record<string, unknown> => {
    const current = out[key];
    const copy: Record<string, unknown> =
      typeof current === "object" && current !== null && !Array.isArray(current) ? { ...current } : {};
    out[key] = copy;
    return copy;
  };

  if (env.METRICS_PORT) section("metrics").port = parsePortEnv("METRICS_PORT", env.METRICS_PORT);
  if (env.LOG_LEVEL) section("logging").level = env.LOG_LEVEL.trim().toLowerCase();
  if (env.AUTO_SCHEMA) section("store").auto_schema = parseBooleanEnv("AUTO_SCHEMA", env.AUTO_SCHEMA);
  return out;
}

export function parseMonitorConfig(raw: unknown, source: string, env: Env = {}): MonitorConfig {
  const result = zMonitorConfig.safeParse(applyEnvOverrides(raw, env));
  if (!result.success) {
    throw new Error(`invalid monitor config at ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export async function loadMonitorConfig(env: Env = process.env): Promise<MonitorConfig> {
  const filePath = env.MONITOR_CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
  const raw: unknown = YAML.parse(await fs.readFile(filePath, "utf8"));
  return parseMonitorConfig(raw, filePath, env);
}
