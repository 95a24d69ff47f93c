import { pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

/**
 * Users are owned by the auth service; the core only needs the row to exist
 * as the target of session and rate-limit foreign keys.
 */
export const users = pgTable("users", {
  id: uuid("id").primaryKey(),
  email: text("email").notNull().unique(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});
