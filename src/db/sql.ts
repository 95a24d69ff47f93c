import { type SQL, sql } from "drizzle-orm";

/**
 * Bind a Date as an explicit timestamptz parameter for use inside raw `sql`
 * fragments, where no column mapping applies.
 */
export function timestamptz(value: Date): SQL {
  return sql`${value.toISOString()}::timestamptz`;
}
