import { promises as fs } from "fs";
import { Kysely, PostgresDialect } from "kysely";
import * as pg from "pg";
import { newDb } from "pg-mem";
import type { DB } from "./types.js";

export type LedgerBackend = "postgres" | "pg-mem";

export interface LedgerPool {
  pool: pg.Pool;
  backend: LedgerBackend;
}

/** Connects to `databaseUrl`, or to a fresh in-process pg-mem database when none is given. */
export function openLedgerPool(databaseUrl?: string): LedgerPool {
  if (databaseUrl) {
    return { pool: new pg.Pool({ connectionString: databaseUrl }), backend: "postgres" };
  }
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return { pool: new adapter.Pool() as unknown as pg.Pool, backend: "pg-mem" };
}

export function createLedgerDb(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}

/** Runs the schema script; every statement in it is `IF NOT EXISTS`, so reapplying is harmless. */
export async function applyLedgerSchema(pool: pg.Pool, schemaPath: string): Promise<void> {
  const sql = await fs.readFile(schemaPath, "utf8");
  if (!sql.trim()) throw new Error(`ledger schema is empty: ${schemaPath}`);
  await pool.query(sql);
}
