import { promises as fs } from "fs";
import type * as pg from "pg";
import { newDb } from "pg-mem";

export const SCHEMA_PATH = "db/schema.sql";

/** Applies the job run schema. Every statement in it is IF NOT EXISTS, so reapplying is a no-op. */
export async function applySchema(pool: pg.Pool, filePath: string = SCHEMA_PATH): Promise<void> {
  const ddl = await fs.readFile(filePath, "utf8");
  if (!ddl.trim()) throw new Error(`schema file is empty: ${filePath}`);
  await pool.query(ddl);
}

/** In-process Postgres for local runs without DATABASE_URL, and for tests. */
export function createMemoryPool(): pg.Pool {
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}
