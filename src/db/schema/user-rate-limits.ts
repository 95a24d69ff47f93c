import { sql } from "drizzle-orm";
import { check, index, integer, pgTable, text, timestamp, unique, uuid } from "drizzle-orm/pg-core";
import { users } from "./users.js";

/** Fixed-window request counters, one row per (user, window type). */
export const userRateLimits = pgTable(
  "user_rate_limits",
  {
    id: uuid("id").primaryKey(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    /** minute | hour | day */
    windowType: text("window_type").notNull(),
    requestCount: integer("request_count").notNull().default(0),
    /** When the current window closes and the count resets. */
    windowEnd: timestamp("window_end", { withTimezone: true }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique("uq_user_rate_limits_user_window").on(table.userId, table.windowType),
    index("idx_user_rate_limits_window_end").on(table.windowEnd),
    check("chk_user_rate_limits_window_type", sql`${table.windowType} IN ('minute', 'hour', 'day')`),
  ],
);
