import { Pool } from "pg";
import type { AppConfig } from "./env";

let pool: Pool | null = null;

/** Lazily created pool; null when no DATABASE_URL is configured. */
export function getPool(config: AppConfig): Pool | null {
  if (!config.databaseUrl) return null;
  if (!pool) {
    pool = new Pool({
      connectionString: config.databaseUrl,
      ssl: config.pgSsl ? { rejectUnauthorized: false } : false,
    });
  }
  return pool;
}

export async function pingDb(p: Pool) {
  const r = await p.query<{ db: string; db_user: string }>(`
    select current_database() as db,
           current_user as db_user
  `);
  return r.rows[0];
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
}
