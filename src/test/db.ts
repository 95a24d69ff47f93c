import { randomUUID } from "node:crypto";
import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import { migrate } from "drizzle-orm/pglite/migrator";
import type { DrizzleDb } from "../db/index.js";
import { MIGRATIONS_FOLDER } from "../db/migrate.js";
import * as schema from "../db/schema/index.js";
import { calls, users } from "../db/schema/index.js";

// Migrate once per worker process, then snapshot. Each test restores from snapshot
// instead of re-running all migrations.
let migratedSnapshot: Blob | null = null;

async function getSnapshot(): Promise<Blob> {
  if (migratedSnapshot) return migratedSnapshot;
  const pool = new PGlite();
  await migrate(drizzle(pool, { schema }), { migrationsFolder: MIGRATIONS_FOLDER });
  migratedSnapshot = await pool.dumpDataDir("auto");
  await pool.close();
  return migratedSnapshot;
}

export async function createTestDb(): Promise<{ db: DrizzleDb; pool: PGlite }> {
  const snapshot = await getSnapshot();
  const pool = new PGlite({ loadDataDir: snapshot });
  const db = drizzle(pool, { schema }) as unknown as DrizzleDb;
  return { db, pool };
}

export async function seedUser(db: DrizzleDb, id: string = randomUUID()): Promise<string> {
  await db.insert(users).values({ id, email: `${id}@example.test` });
  return id;
}

export interface SeedCallOptions {
  id?: string;
  transcript?: string | null;
  status?: string;
}

export async function seedCall(db: DrizzleDb, opts: SeedCallOptions = {}): Promise<string> {
  const id = opts.id ?? randomUUID();
  await db.insert(calls).values({
    id,
    providerCallId: `prov-${id}`,
    status: opts.status ?? "completed",
    transcript: opts.transcript === undefined ? "Customer needs a quote for two rooms of carpet." : opts.transcript,
  });
  return id;
}
