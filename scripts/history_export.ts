import { loadMonitorConfig } from "../src/config/monitorConfig.js";
import { createLogger } from "../src/core/logger.js";
import { createDb, createPgPool } from "../src/db/connection.js";
import { HistoryExporter } from "../src/history/historyExporter.js";
import { PostgresRunStore } from "../src/store/postgresRunStore.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/history_export.ts [--out <file.json>] [--limit <n>]",
    "",
    "env:",
    "  DATABASE_URL (required)",
    "  MONITOR_CONFIG_PATH (optional, defaults to config/default.monitor.yaml)",
    ""
  ].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (key === "help") {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }

  const config = await loadMonitorConfig();
  const outPath = typeof args.out === "string" ? args.out : config.export.output_path;

  const limitRaw = typeof args.limit === "string" ? args.limit : String(config.export.default_limit);
  if (!/^[0-9]+$/.test(limitRaw)) throw new Error(`invalid --limit: ${limitRaw}`);
  const limit = Number(limitRaw);

  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) throw new Error(`DATABASE_URL is required\n\n${usage()}`);

  const logger = createLogger({ name: "history_export", level: config.logging.level });
  const pool = createPgPool(databaseUrl, { applicationName: "batchwatch-history-export", max: 2 });
  const db = createDb(pool);
  try {
    const exporter = new HistoryExporter(new PostgresRunStore(db), logger);
    const res = await exporter.writeSnapshotFile(outPath, limit);
    process.stdout.write(`${res.recordCount}  ${res.outputPath}\n`);
  } finally {
    await db.destroy();
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
