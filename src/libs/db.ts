// src/libs/db.ts
// ============================================================================
// PostgreSQL Connector
// - Ein zentraler Connection-Pool pro Prozess
// - Typsicheres query<T>() für einfache SELECT/INSERT/UPDATE-Operationen
// - Healthcheck-Funktionen für /health & Startup-Checks
// - Graceful Shutdown für geordnetes Beenden (z. B. bei SIGTERM)
// ============================================================================

import pg, { type QueryResultRow } from "pg";
import { env } from "./env.js";

const { Pool } = pg;

// ============================================================================
// Typen
// ============================================================================

/** Pool oder Client - beides reicht für die Repositories. */
export type DbPool = pg.Pool;

// ============================================================================
// Connection-Pool
// ----------------------------------------------------------------------------
// EIN Pool pro Prozess. Alle Repositories teilen sich diesen Pool.
// Der Pool verbindet sich erst bei der ersten Query.
// ============================================================================

export const pool: DbPool = new Pool({
  connectionString: env.DATABASE_URL,
  max: env.DATABASE_POOL_MAX,
  idleTimeoutMillis: 10_000,
  connectionTimeoutMillis: 5_000,
});

// Fehler auf idle Clients sonst als uncaughtException
pool.on("error", (err) => {
  console.error("[db] idle client error", err);
});

/**
 * Führt ein SQL-Statement aus und gibt die Zeilen als T[] zurück.
 *
 * @example
 *   const users = await query<{ id: string }>(
 *     "SELECT id FROM users WHERE phone = $1",
 *     ["+79991234567"],
 *   );
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  sql: string,
  params: unknown[] = [],
): Promise<T[]> {
  const res = await pool.query<T>(sql, params);
  return res.rows;
}

// ============================================================================
// Healthcheck für /health & /health/db
// ============================================================================

export async function dbHealth(): Promise<{ ok: boolean; error?: string }> {
  try {
    await pool.query("SELECT 1;");
    return { ok: true };
  } catch (err: unknown) {
    const message =
      err instanceof Error ? err.message : "unknown database error";

    return {
      ok: false,
      error: message,
    };
  }
}

/** Wirft, wenn die Datenbank nicht erreichbar ist (Startup-Check). */
export async function checkDb(): Promise<void> {
  const { ok, error } = await dbHealth();
  if (!ok) {
    throw new Error(`[DB] Healthcheck failed: ${error ?? "unknown"}`);
  }
}

// ============================================================================
// Graceful Shutdown
// ============================================================================

export async function closeDb(): Promise<void> {
  await pool.end();
}
