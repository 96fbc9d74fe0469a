import * as pg from "pg";
import { Kysely, PostgresDialect } from "kysely";
import type { DB } from "./types.js";

export interface PoolOptions {
  applicationName?: string;
  max?: number;
}

export function pgPoolConfig(databaseUrl: string, opts: PoolOptions = {}): pg.PoolConfig {
  return {
    connectionString: databaseUrl,
    application_name: opts.applicationName ?? "batchwatch",
    max: opts.max ?? 10
  };
}

export function createPgPool(databaseUrl: string, opts: PoolOptions = {}): pg.Pool {
  return new pg.Pool(pgPoolConfig(databaseUrl, opts));
}

export function createDb(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}
