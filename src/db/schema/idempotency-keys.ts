import { index, jsonb, pgTable, text, timestamp } from "drizzle-orm/pg-core";
import type { JsonValue } from "../../idempotency/repository-types.js";

/** Cached responses of side-effecting operations, replayed by key until expiry. */
export const idempotencyKeys = pgTable(
  "idempotency_keys",
  {
    key: text("key").primaryKey(),
    response: jsonb("response").$type<JsonValue>().notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
  },
  (table) => [index("idx_idempotency_keys_expires_at").on(table.expiresAt)],
);

/**
 * In-flight markers. Inserted before the side effect runs; only the holder
 * proceeds. A claim past `expires_at` is abandoned and may be taken over.
 */
export const idempotencyClaims = pgTable(
  "idempotency_claims",
  {
    key: text("key").primaryKey(),
    /** Random token naming the current holder; completion and release match on it. */
    owner: text("owner").notNull(),
    claimedAt: timestamp("claimed_at", { withTimezone: true }).notNull(),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
  },
  (table) => [index("idx_idempotency_claims_expires_at").on(table.expiresAt)],
);
