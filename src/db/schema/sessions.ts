import { sql } from "drizzle-orm";
import { index, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";
import { users } from "./users.js";

/**
 * Bearer-token sessions with rotation tracking.
 *
 * `previous_token` stays valid for 30 seconds after `rotated_at` so requests
 * already in flight with the old token still authenticate.
 */
export const sessions = pgTable(
  "sessions",
  {
    id: uuid("id").primaryKey(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    token: text("token").notNull().unique(),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    lastActiveAt: timestamp("last_active_at", { withTimezone: true }),
    ipAddress: text("ip_address"),
    userAgent: text("user_agent"),
    previousToken: text("previous_token"),
    rotatedAt: timestamp("rotated_at", { withTimezone: true }),
  },
  (table) => [
    index("idx_sessions_user_id").on(table.userId),
    index("idx_sessions_expires_at").on(table.expiresAt),
    index("idx_sessions_previous_token")
      .on(table.previousToken)
      .where(sql`previous_token IS NOT NULL`),
    index("idx_sessions_rotated_at")
      .on(table.rotatedAt)
      .where(sql`rotated_at IS NOT NULL`),
  ],
);
