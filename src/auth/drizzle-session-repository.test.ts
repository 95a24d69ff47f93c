import type { PGlite } from "@electric-sql/pglite";
import { eq } from "drizzle-orm";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createStoreContext } from "../db/context.js";
import { ConflictError, NotFoundError, ValidationError } from "../db/errors.js";
import type { DrizzleDb } from "../db/index.js";
import { sessions } from "../db/schema/index.js";
import { FakeClock } from "../test/clock.js";
import { createTestDb, seedUser } from "../test/db.js";
import { DrizzleSessionRepository } from "./drizzle-session-repository.js";
import type { Session } from "./repository-types.js";
import { newSession } from "./session.js";

describe("DrizzleSessionRepository", () => {
  let db: DrizzleDb;
  let pool: PGlite;
  let clock: FakeClock;
  let repo: DrizzleSessionRepository;
  let userId: string;

  beforeEach(async () => {
    ({ db, pool } = await createTestDb());
    clock = new FakeClock("2026-03-02T12:00:00.000Z");
    repo = new DrizzleSessionRepository(db, createStoreContext({ clock }));
    userId = await seedUser(db);
  });

  afterEach(async () => {
    await pool.close();
  });

  function create(token: string, ttlMs = 86_400_000): Promise<Session> {
    return repo.create(
      newSession({ userId, token, ttlMs, now: clock.now(), ipAddress: "198.51.100.7", userAgent: "test-agent" }),
    );
  }

  describe("create / getByToken", () => {
    it("round-trips a session", async () => {
      const created = await create("tok-a");
      const found = await repo.getByToken("tok-a");

      expect(found).toEqual(created);
      expect(found.userId).toBe(userId);
      expect(found.ipAddress).toBe("198.51.100.7");
      expect(found.expiresAt.toISOString()).toBe("2026-03-03T12:00:00.000Z");
    });

    it("raises NotFoundError for an unknown token", async () => {
      const err = await repo.getByToken("missing").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(NotFoundError);
      expect(err).toMatchObject({ code: "NOT_FOUND", op: "DrizzleSessionRepository.getByToken" });
    });

    it("raises NotFoundError once the session has expired", async () => {
      await create("tok-a", 60_000);
      clock.advance(60_000);
      await expect(repo.getByToken("tok-a")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("rejects a duplicate token as a conflict", async () => {
      await create("tok-a");
      await expect(create("tok-a")).rejects.toBeInstanceOf(ConflictError);
    });

    it("validates the user id", async () => {
      const bad = newSession({ userId: "not-a-uuid", token: "tok-a", ttlMs: 60_000, now: clock.now() });
      await expect(repo.create(bad)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("rotate", () => {
    it("keeps the previous token valid for 30 seconds", async () => {
      const session = await create("tok-a");
      const rotated = await repo.rotate(session.id, "tok-a", "tok-b");

      expect(rotated.token).toBe("tok-b");
      expect(rotated.previousToken).toBe("tok-a");
      expect(rotated.rotatedAt?.toISOString()).toBe("2026-03-02T12:00:00.000Z");

      clock.advance(10_000);
      expect((await repo.getByToken("tok-a")).id).toBe(session.id);
      expect((await repo.getByToken("tok-b")).id).toBe(session.id);

      clock.advance(25_000);
      await expect(repo.getByToken("tok-a")).rejects.toBeInstanceOf(NotFoundError);
      expect((await repo.getByToken("tok-b")).id).toBe(session.id);
    });

    it("raises ConflictError when the presented token is no longer current", async () => {
      const session = await create("tok-a");
      await repo.rotate(session.id, "tok-a", "tok-b");

      const err = await repo.rotate(session.id, "tok-a", "tok-c").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ConflictError);
      expect((await repo.getByToken("tok-b")).token).toBe("tok-b");
    });

    it("lets exactly one of two concurrent rotations win", async () => {
      const session = await create("tok-a");
      const results = await Promise.allSettled([
        repo.rotate(session.id, "tok-a", "tok-b"),
        repo.rotate(session.id, "tok-a", "tok-c"),
      ]);

      const won = results.filter((r) => r.status === "fulfilled");
      const lost = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
      expect(won).toHaveLength(1);
      expect(lost).toHaveLength(1);
      expect(lost[0]?.reason).toBeInstanceOf(ConflictError);
    });

    it("raises NotFoundError for a missing session", async () => {
      await expect(repo.rotate("00000000-0000-4000-8000-000000000000", "tok-a", "tok-b")).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });
  });

  describe("update", () => {
    it("writes the mutable columns", async () => {
      const session = await create("tok-a");
      const extendedTo = new Date("2026-03-05T12:00:00.000Z");
      await repo.update({ ...session, expiresAt: extendedTo, userAgent: "other-agent", token: "tok-z" });

      const found = await repo.getByToken("tok-z");
      expect(found.expiresAt.toISOString()).toBe("2026-03-05T12:00:00.000Z");
      expect(found.userAgent).toBe("other-agent");
    });

    it("raises NotFoundError when the row is gone", async () => {
      const session = await create("tok-a");
      await repo.delete("tok-a");
      await expect(repo.update(session)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("grace window housekeeping", () => {
    it("clearExpiredPreviousTokens only narrows elapsed windows", async () => {
      const a = await create("tok-a");
      await repo.rotate(a.id, "tok-a", "tok-a2");
      clock.advance(20_000);
      const b = await create("tok-b");
      await repo.rotate(b.id, "tok-b", "tok-b2");

      clock.advance(10_000);
      expect(await repo.clearExpiredPreviousTokens()).toBe(1);

      const [rowA] = await db.select().from(sessions).where(eq(sessions.id, a.id));
      const [rowB] = await db.select().from(sessions).where(eq(sessions.id, b.id));
      expect(rowA?.previousToken).toBeNull();
      expect(rowA?.rotatedAt).toBeNull();
      expect(rowB?.previousToken).toBe("tok-b");
    });

    it("invalidatePreviousToken closes the window immediately", async () => {
      const session = await create("tok-a");
      await repo.rotate(session.id, "tok-a", "tok-b");
      await repo.invalidatePreviousToken(session.id);

      await expect(repo.getByToken("tok-a")).rejects.toBeInstanceOf(NotFoundError);
      expect((await repo.getByToken("tok-b")).previousToken).toBeNull();
    });
  });

  describe("touch", () => {
    it("moves last_active_at to now", async () => {
      const session = await create("tok-a");
      clock.advance(5_000);
      await repo.touch(session.id);
      expect((await repo.getByToken("tok-a")).lastActiveAt?.toISOString()).toBe("2026-03-02T12:00:05.000Z");
    });
  });

  describe("deletion", () => {
    it("delete reports whether a row was removed", async () => {
      await create("tok-a");
      expect(await repo.delete("tok-a")).toBe(true);
      expect(await repo.delete("tok-a")).toBe(false);
    });

    it("deleteById removes the session after its token was rotated", async () => {
      const session = await create("tok-a");
      await repo.rotate(session.id, "tok-a", "tok-b");

      expect(await repo.deleteById(session.id)).toBe(true);
      expect(await repo.deleteById(session.id)).toBe(false);
      await expect(repo.getByToken("tok-b")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("deleteExpired removes only expired sessions", async () => {
      await create("short", 60_000);
      await create("long", 3_600_000);
      clock.advance(60_000);
      expect(await repo.deleteExpired()).toBe(1);
      expect((await repo.getByToken("long")).token).toBe("long");
    });

    it("deleteByUserId removes every session of the user", async () => {
      await create("tok-a");
      await create("tok-b");
      const otherUser = await seedUser(db);
      await repo.create(newSession({ userId: otherUser, token: "tok-other", ttlMs: 60_000, now: clock.now() }));

      expect(await repo.deleteByUserId(userId)).toBe(2);
      expect((await repo.getByToken("tok-other")).userId).toBe(otherUser);
    });
  });
});
