import fs from "node:fs/promises";
import path from "node:path";
import type { Pool } from "pg";
import type { Logger } from "../lib/logger";
import { withTransaction } from "./postgres";

export const runMigrations = async (
  pool: Pool,
  logger: Logger,
  migrationsDir = path.join(process.cwd(), "migrations")
): Promise<{ applied: string[] }> => {
  const applied: string[] = [];
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id text PRIMARY KEY,
      applied_at timestamptz NOT NULL DEFAULT now()
    )
  `);

  const files = (await fs.readdir(migrationsDir))
    .filter((file) => file.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b));

  for (const file of files) {
    const exists = await pool.query("SELECT 1 FROM schema_migrations WHERE id = $1", [file]);
    if (exists.rowCount && exists.rowCount > 0) {
      continue;
    }

    const sql = await fs.readFile(path.join(migrationsDir, file), "utf8");
    await withTransaction(pool, "BEGIN", async (client) => {
      await client.query(sql);
      await client.query("INSERT INTO schema_migrations (id) VALUES ($1)", [file]);
    });
    applied.push(file);
  }

  logger.info({ applied }, "migrations complete");
  return { applied };
};
