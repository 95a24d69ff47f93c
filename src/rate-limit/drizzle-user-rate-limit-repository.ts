import { randomUUID } from "node:crypto";
import { and, eq, gt, lte, sql } from "drizzle-orm";
import { runStatement, type StoreContext } from "../db/context.js";
import type { DrizzleDb } from "../db/index.js";
import { userRateLimits } from "../db/schema/index.js";
import { timestamptz } from "../db/sql.js";
import type { QueryOptions } from "../db/timeouts.js";
import type { IUserRateLimitRepository } from "./user-rate-limit-repository.js";
import { WINDOW_TYPES, type WindowType, windowEnd } from "./window.js";

export class DrizzleUserRateLimitRepository implements IUserRateLimitRepository {
  constructor(
    private readonly db: DrizzleDb,
    private readonly ctx: StoreContext,
  ) {}

  async incrementRequestCount(userId: string, windowType: WindowType, opts?: QueryOptions): Promise<number> {
    return runStatement(this.ctx, "DrizzleUserRateLimitRepository.incrementRequestCount", "write", opts, async () => {
      this.ctx.guard.requireUuid(userId, "userId");
      this.ctx.guard.requireOneOf(windowType, WINDOW_TYPES, "windowType");

      const now = this.ctx.clock.now();
      const end = windowEnd(now, windowType);
      // Column references in SET resolve to the existing row, so the
      // reset-or-increment decision is made under the row lock.
      const ended = sql`${userRateLimits.windowEnd} <= ${timestamptz(now)}`;
      const rows = await this.db
        .insert(userRateLimits)
        .values({
          id: randomUUID(),
          userId,
          windowType,
          requestCount: 1,
          windowEnd: end,
          createdAt: now,
          updatedAt: now,
        })
        .onConflictDoUpdate({
          target: [userRateLimits.userId, userRateLimits.windowType],
          set: {
            requestCount: sql`CASE WHEN ${ended} THEN 1 ELSE ${userRateLimits.requestCount} + 1 END`,
            windowEnd: sql`CASE WHEN ${ended} THEN ${timestamptz(end)} ELSE ${userRateLimits.windowEnd} END`,
            updatedAt: now,
          },
        })
        .returning({ requestCount: userRateLimits.requestCount });

      const row = rows[0];
      if (!row) throw new Error("upsert returned no row");
      return row.requestCount;
    });
  }

  async getRequestCount(userId: string, windowType: WindowType, opts?: QueryOptions): Promise<number> {
    return runStatement(this.ctx, "DrizzleUserRateLimitRepository.getRequestCount", "read", opts, async () => {
      this.ctx.guard.requireUuid(userId, "userId");
      this.ctx.guard.requireOneOf(windowType, WINDOW_TYPES, "windowType");

      const rows = await this.db
        .select({ requestCount: userRateLimits.requestCount })
        .from(userRateLimits)
        .where(
          and(
            eq(userRateLimits.userId, userId),
            eq(userRateLimits.windowType, windowType),
            gt(userRateLimits.windowEnd, this.ctx.clock.now()),
          ),
        );
      return rows[0]?.requestCount ?? 0;
    });
  }

  async resetExpiredWindows(opts?: QueryOptions): Promise<number> {
    return runStatement(this.ctx, "DrizzleUserRateLimitRepository.resetExpiredWindows", "write", opts, async () => {
      const result = await this.db
        .delete(userRateLimits)
        .where(lte(userRateLimits.windowEnd, this.ctx.clock.now()))
        .returning({ id: userRateLimits.id });
      return result.length;
    });
  }
}
