import { drizzle } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import pg from "pg";
import type { Config } from "../config/index.js";
import * as schema from "./schema/index.js";

/** The schema type shared across all db instances. */
export type Schema = typeof schema;

/**
 * Structural DrizzleDb type, satisfied by both NodePgDatabase (production)
 * and PgliteDatabase (tests). Repositories accept this type.
 */
export type DrizzleDb = PgDatabase<PgQueryResultHKT, Schema>;

/** The handle passed to a `db.transaction()` callback. */
export type DrizzleTx = Parameters<Parameters<DrizzleDb["transaction"]>[0]>[0];

/** Create the process-wide pg.Pool. Every store in the process shares it. */
export function createPool(dbConfig: Config["database"]): pg.Pool {
  return new pg.Pool({
    connectionString: dbConfig.url,
    max: dbConfig.poolMax,
    statement_timeout: dbConfig.statementTimeoutMs,
  });
}

/** Create a Drizzle database instance wrapping the given pg.Pool. */
export function createDb(pool: pg.Pool): DrizzleDb {
  return drizzle(pool, { schema }) as unknown as DrizzleDb;
}

export { schema };
