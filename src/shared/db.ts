/**
 * PostgreSQL Pool
 * ===============
 * Shared `pg` pool, created lazily from DATABASE_URL.
 */

import pg from "pg";

import { ConfigurationError } from "./errors.js";
import { logger } from "./logger.js";

let pool: pg.Pool | null = null;

export function getPool(databaseUrl: string | undefined): pg.Pool {
  if (pool) {return pool;}
  if (!databaseUrl) {throw new ConfigurationError("DATABASE_URL is required");}

  pool = new pg.Pool({ connectionString: databaseUrl, max: 10 });
  pool.on("error", (err) => {
    logger.error("Postgres pool error", { error: err.message });
  });
  return pool;
}

const UNIQUE_VIOLATION = "23505";

/**
 * True for a Postgres unique-constraint violation, e.g. two concurrent
 * inserts that both passed an existence check.
 */
export function isUniqueViolation(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === UNIQUE_VIOLATION;
}

export async function disconnectDb(): Promise<void> {
  if (!pool) {return;}
  const current = pool;
  pool = null;
  await current.end();
}
