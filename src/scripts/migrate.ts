/* eslint-disable no-console */
import "dotenv/config";

import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import { disconnectDb, getPool } from "../shared/db.js";

const MIGRATIONS_DIR = path.resolve(process.cwd(), "sql");
const MIGRATION_TABLE = "schema_migrations";

async function main() {
  const pool = getPool(process.env.DATABASE_URL);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
      name       TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `);

  const applied = new Set(
    (await pool.query<{ name: string }>(`SELECT name FROM ${MIGRATION_TABLE}`)).rows.map((r) => r.name)
  );
  const files = (await readdir(MIGRATIONS_DIR)).filter((f) => f.endsWith(".sql")).sort();

  for (const file of files) {
    if (applied.has(file)) {continue;}

    const sql = await readFile(path.join(MIGRATIONS_DIR, file), "utf8");
    const client = await pool.connect();
    try {
      await client.query("BEGIN");
      await client.query(sql);
      await client.query(`INSERT INTO ${MIGRATION_TABLE} (name) VALUES ($1)`, [file]);
      await client.query("COMMIT");
      console.log(`✅ Applied ${file}`);
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }

  console.log("Migrations up to date");
}

main()
  .catch((err: unknown) => {
    console.error("❌ Migration failed:", err);
    process.exitCode = 1;
  })
  .finally(() => disconnectDb());
