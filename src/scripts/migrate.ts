// src/scripts/migrate.ts
// ============================================================================
// SQL-Migrationen aus migrations/*.sql anwenden (alphabetisch, je Datei
// eine Transaktion). Bereits angewendete stehen in schema_migrations.
// ============================================================================

import { readdir, readFile } from "node:fs/promises";
import pg from "pg";

const { Pool } = pg;

const MIGRATIONS_DIR = new URL("../../migrations/", import.meta.url);

async function main() {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("Missing DATABASE_URL for migration run.");
  }

  const pool = new Pool({ connectionString });

  try {
    await pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        name       text PRIMARY KEY,
        applied_at timestamptz NOT NULL DEFAULT now()
      );
    `);

    const { rows } = await pool.query<{ name: string }>(`SELECT name FROM schema_migrations;`);
    const applied = new Set(rows.map((row) => row.name));

    const files = (await readdir(MIGRATIONS_DIR))
      .filter((file) => file.endsWith(".sql"))
      .sort();

    for (const file of files) {
      if (applied.has(file)) continue;

      const sql = await readFile(new URL(file, MIGRATIONS_DIR), "utf8");
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        await client.query(sql);
        await client.query(`INSERT INTO schema_migrations (name) VALUES ($1);`, [file]);
        await client.query("COMMIT");
        console.log("migration_applied", file);
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      } finally {
        client.release();
      }
    }
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error("migration_failed", err);
  process.exit(1);
});
