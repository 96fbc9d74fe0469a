import type * as pg from "pg";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadMonitorConfig } from "./config/monitorConfig.js";
import { createLogger } from "./core/logger.js";
import { applySchema, createMemoryPool } from "./db/bootstrap.js";
import { createDb, createPgPool } from "./db/connection.js";
import { HistoryExporter } from "./history/historyExporter.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { InMemoryMetricsBackend } from "./metrics/metricsBackend.js";
import { MetricsEmitter } from "./metrics/metricsEmitter.js";
import { createMetricsServer, listen } from "./metrics/metricsServer.js";
import { PostgresRunStore } from "./store/postgresRunStore.js";
import { LifecycleTracker } from "./tracker/lifecycleTracker.js";

function createPool(): pg.Pool {
  const url = process.env.DATABASE_URL;
  if (url) return createPgPool(url);
  return createMemoryPool();
}

async function main(): Promise<void> {
  const config = await loadMonitorConfig();
  const logger = createLogger({ name: "batchwatch", level: config.logging.level });

  const pool = createPool();
  if (!process.env.DATABASE_URL || config.store.auto_schema) {
    await applySchema(pool);
  }

  const db = createDb(pool);
  const store = new PostgresRunStore(db);
  const backend = new InMemoryMetricsBackend();
  const emitter = new MetricsEmitter(backend, logger);
  const tracker = new LifecycleTracker({ store, metrics: emitter, logger });
  const exporter = new HistoryExporter(store, logger);

  if (config.metrics.enabled) {
    const metricsServer = createMetricsServer(backend);
    const address = await listen(metricsServer, config.metrics.port, config.metrics.host);
    logger.info("metrics endpoint ready", { host: address.address, port: address.port, path: "/metrics" });
  }

  const server = createGatewayServer({ tracker, store, exporter, metrics: backend });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("batchwatch gateway ready", { store: process.env.DATABASE_URL ? "postgres" : "pg-mem" });
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
