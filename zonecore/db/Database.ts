// zonecore/db/Database.ts
//
// Postgres pool for the zone registry. Nothing connects at import time; the
// server builds a pool only when ZONE_DB_URL is set.

import { Pool } from "pg";

import { Logger } from "../utils/logger";

const log = Logger.scope("DB");

export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  // Errors on idle clients; the pool stays usable.
  pool.on("error", (err: Error) => {
    log.error("Postgres pool error", { err });
  });

  return pool;
}

/** SELECT 1 smoke test; returns false instead of throwing so startup can fall back. */
export async function testDbConnection(pool: Pool): Promise<boolean> {
  try {
    const r = await pool.query<{ ok: number }>("SELECT 1 AS ok");
    log.success("Postgres connected", { ok: r.rows[0]?.ok });
    return true;
  } catch (err) {
    log.error("Postgres connection test failed", { err });
    return false;
  }
}
