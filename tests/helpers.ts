import path from "path";
import { Kysely, PostgresDialect } from "kysely";
import type { Clock } from "../src/core/clock.js";
import { createLogger, type LogLine, type Logger } from "../src/core/logger.js";
import { applySchema, createMemoryPool } from "../src/db/bootstrap.js";
import { createDb } from "../src/db/connection.js";
import type { DB } from "../src/db/types.js";
import { PostgresRunStore } from "../src/store/postgresRunStore.js";

export const T0 = "2025-05-01T01:00:00.000Z";

export class ManualClock implements Clock {
  private ms: number;

  constructor(iso: string = T0) {
    this.ms = Date.parse(iso);
  }

  now(): Date {
    return new Date(this.ms);
  }

  advance(seconds: number): void {
    this.ms += Math.round(seconds * 1000);
  }
}

export async function createMemoryStore(): Promise<{ db: Kysely<DB>; store: PostgresRunStore }> {
  const pool = createMemoryPool();
  await applySchema(pool, path.resolve("db/schema.sql"));
  const db = createDb(pool);
  return { db, store: new PostgresRunStore(db) };
}

/** A store whose database refuses every connection. */
export function createUnreachableStore(): { db: Kysely<DB>; store: PostgresRunStore } {
  const db = new Kysely<DB>({
    dialect: new PostgresDialect({
      pool: {
        connect: async () => {
          throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
        },
        end: async () => {}
      }
    })
  });
  return { db, store: new PostgresRunStore(db) };
}

export function createCaptureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createLogger({
    name: "test",
    level: "debug",
    write: (line) => {
      lines.push(JSON.parse(line) as LogLine);
    }
  });
  return { logger, lines };
}
