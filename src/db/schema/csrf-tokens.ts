import { sql } from "drizzle-orm";
import { boolean, index, pgTable, text, timestamp, uniqueIndex, uuid } from "drizzle-orm/pg-core";
import { sessions } from "./sessions.js";

export const csrfTokens = pgTable(
  "csrf_tokens",
  {
    id: uuid("id").primaryKey(),
    token: text("token").notNull().unique(),
    sessionId: uuid("session_id").references(() => sessions.id, { onDelete: "cascade" }),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    used: boolean("used").notNull().default(false),
  },
  (table) => [
    // One unused token per session; getOrCreate upserts against this index.
    uniqueIndex("uq_csrf_tokens_unused_session")
      .on(table.sessionId)
      .where(sql`used = false`),
    index("idx_csrf_tokens_expires_at").on(table.expiresAt),
  ],
);
