import type { PGlite } from "@electric-sql/pglite";
import { eq } from "drizzle-orm";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createStoreContext } from "../db/context.js";
import { ValidationError } from "../db/errors.js";
import type { DrizzleDb } from "../db/index.js";
import { userRateLimits } from "../db/schema/index.js";
import { FakeClock } from "../test/clock.js";
import { createTestDb, seedUser } from "../test/db.js";
import { DrizzleUserRateLimitRepository } from "./drizzle-user-rate-limit-repository.js";
import type { WindowType } from "./window.js";

describe("DrizzleUserRateLimitRepository", () => {
  let db: DrizzleDb;
  let pool: PGlite;
  let clock: FakeClock;
  let repo: DrizzleUserRateLimitRepository;
  let userId: string;

  beforeEach(async () => {
    ({ db, pool } = await createTestDb());
    clock = new FakeClock("2026-03-02T12:00:00.000Z");
    repo = new DrizzleUserRateLimitRepository(db, createStoreContext({ clock }));
    userId = await seedUser(db);
  });

  afterEach(async () => {
    await pool.close();
  });

  describe("incrementRequestCount", () => {
    it("counts within a window and resets once it has ended", async () => {
      expect(await repo.incrementRequestCount(userId, "minute")).toBe(1);
      expect(await repo.incrementRequestCount(userId, "minute")).toBe(2);
      expect(await repo.incrementRequestCount(userId, "minute")).toBe(3);

      clock.advance(61_000);
      expect(await repo.incrementRequestCount(userId, "minute")).toBe(1);
    });

    it("resets at the window boundary itself", async () => {
      await repo.incrementRequestCount(userId, "minute");
      await repo.incrementRequestCount(userId, "minute");

      clock.set("2026-03-02T12:01:00.000Z");
      expect(await repo.incrementRequestCount(userId, "minute")).toBe(1);
    });

    it("moves window_end forward to the aligned boundary on reset", async () => {
      await repo.incrementRequestCount(userId, "minute");
      clock.set("2026-03-02T12:05:30.000Z");
      await repo.incrementRequestCount(userId, "minute");

      const rows = await db.select().from(userRateLimits).where(eq(userRateLimits.userId, userId));
      expect(rows).toHaveLength(1);
      expect(rows[0]?.windowEnd.toISOString()).toBe("2026-03-02T12:06:00.000Z");
      expect(rows[0]?.requestCount).toBe(1);
    });

    it("keeps window_end while incrementing in place", async () => {
      await repo.incrementRequestCount(userId, "hour");
      clock.advance(30 * 60_000);
      expect(await repo.incrementRequestCount(userId, "hour")).toBe(2);

      const rows = await db.select().from(userRateLimits).where(eq(userRateLimits.userId, userId));
      expect(rows[0]?.windowEnd.toISOString()).toBe("2026-03-02T13:00:00.000Z");
    });

    it("keeps one counter per window type", async () => {
      const windows: WindowType[] = ["minute", "hour", "day"];
      for (const w of windows) await repo.incrementRequestCount(userId, w);
      await repo.incrementRequestCount(userId, "day");

      expect(await repo.getRequestCount(userId, "minute")).toBe(1);
      expect(await repo.getRequestCount(userId, "hour")).toBe(1);
      expect(await repo.getRequestCount(userId, "day")).toBe(2);
    });

    it("yields every count from 1 to N under concurrent increments", async () => {
      const counts = await Promise.all(Array.from({ length: 10 }, () => repo.incrementRequestCount(userId, "minute")));
      expect([...counts].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    });

    it("rejects a malformed user id", async () => {
      const err = await repo.incrementRequestCount("user-1", "minute").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ field: "userId", op: "DrizzleUserRateLimitRepository.incrementRequestCount" });
    });
  });

  describe("getRequestCount", () => {
    it("reads 0 for a user with no counter and creates nothing", async () => {
      expect(await repo.getRequestCount(userId, "minute")).toBe(0);
      const rows = await db.select().from(userRateLimits);
      expect(rows).toHaveLength(0);
    });

    it("reads 0 once the window has ended", async () => {
      await repo.incrementRequestCount(userId, "minute");
      clock.advance(60_000);
      expect(await repo.getRequestCount(userId, "minute")).toBe(0);
    });
  });

  describe("resetExpiredWindows", () => {
    it("deletes only ended windows", async () => {
      await repo.incrementRequestCount(userId, "minute");
      await repo.incrementRequestCount(userId, "hour");

      clock.advance(120_000);
      expect(await repo.resetExpiredWindows()).toBe(1);
      expect(await repo.getRequestCount(userId, "hour")).toBe(1);
    });
  });
});
