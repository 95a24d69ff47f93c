import { index, jsonb, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

/**
 * Recorded provider calls. Owned by the call pipeline; the quote job queue
 * reads the transcript and writes the generated quote back.
 */
export const calls = pgTable(
  "calls",
  {
    id: uuid("id").primaryKey(),
    providerCallId: text("provider_call_id").notNull().unique(),
    /** pending | in_progress | completed | failed */
    status: text("status").notNull().default("pending"),
    transcript: text("transcript"),
    extractedData: jsonb("extracted_data").$type<Record<string, unknown>>(),
    quoteSummary: text("quote_summary"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("idx_calls_status").on(table.status)],
);
