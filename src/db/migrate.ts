import path from "node:path";
import { fileURLToPath } from "node:url";
import { drizzle } from "drizzle-orm/node-postgres";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import type pg from "pg";
import { logger } from "../config/logger.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * MIGRATION CONVENTIONS
 *
 * Migrations are generated by drizzle-kit from src/db/schema/ into
 * drizzle/migrations (`npm run db:generate`); review the SQL before
 * committing. Every migration must stay compatible with the previous
 * release's code, since the deploy sequence is: migrate, then roll out.
 *
 * __dirname is <root>/dist/db or <root>/src/db; either way the folder is
 * <root>/drizzle/migrations.
 */
export const MIGRATIONS_FOLDER = path.resolve(__dirname, "../../drizzle/migrations");

const MIGRATION_LOCK_ID = 7_231_042;

/**
 * Apply all pending migrations. Every process runs this at startup; a
 * session advisory lock on one pooled connection keeps concurrent
 * migrators from applying the same migration twice.
 */
export async function runMigrations(pool: pg.Pool, migrationsFolder = MIGRATIONS_FOLDER): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query("SELECT pg_advisory_lock($1)", [MIGRATION_LOCK_ID]);
    try {
      await migrate(drizzle(client), { migrationsFolder });
    } finally {
      await client.query("SELECT pg_advisory_unlock($1)", [MIGRATION_LOCK_ID]);
    }
    logger.info("Database migrations applied", { migrationsFolder });
  } finally {
    client.release();
  }
}
