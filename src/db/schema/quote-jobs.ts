import { sql } from "drizzle-orm";
import { check, index, integer, jsonb, pgTable, text, timestamp, uniqueIndex, uuid } from "drizzle-orm/pg-core";
import { calls } from "./calls.js";

/**
 * Quote generation job queue.
 *
 * States: pending -> processing -> completed | failed, or back to pending
 * with a later scheduled_at when a retry is due. Rows are never deleted.
 */
export const quoteJobs = pgTable(
  "quote_jobs",
  {
    id: uuid("id").primaryKey(),
    callId: uuid("call_id")
      .notNull()
      .references(() => calls.id, { onDelete: "cascade" }),
    /** pending | processing | completed | failed */
    status: text("status").notNull().default("pending"),
    attempts: integer("attempts").notNull().default(0),
    maxAttempts: integer("max_attempts").notNull().default(3),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
    /** Earliest time the job is eligible to run. Pushed forward by retry backoff. */
    scheduledAt: timestamp("scheduled_at", { withTimezone: true }).notNull().defaultNow(),
    startedAt: timestamp("started_at", { withTimezone: true }),
    completedAt: timestamp("completed_at", { withTimezone: true }),
    lastError: text("last_error"),
    errorCount: integer("error_count").notNull().default(0),
    metadata: jsonb("metadata").$type<Record<string, unknown>>().notNull().default({}),
  },
  (table) => [
    index("idx_quote_jobs_status_scheduled").on(table.status, table.scheduledAt),
    index("idx_quote_jobs_call_id").on(table.callId),
    index("idx_quote_jobs_created_at").on(table.createdAt),
    uniqueIndex("uq_quote_jobs_active_call")
      .on(table.callId)
      .where(sql`status IN ('pending', 'processing')`),
    check("chk_quote_jobs_status", sql`${table.status} IN ('pending', 'processing', 'completed', 'failed')`),
  ],
);
