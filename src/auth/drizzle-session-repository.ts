import { and, eq, gt, isNotNull, lte, or, sql } from "drizzle-orm";
import { runStatement, type StoreContext } from "../db/context.js";
import { ConflictError, NotFoundError } from "../db/errors.js";
import type { DrizzleDb } from "../db/index.js";
import { sessions } from "../db/schema/index.js";
import type { QueryOptions } from "../db/timeouts.js";
import type { Session } from "./repository-types.js";
import { TOKEN_GRACE_PERIOD_MS } from "./session.js";
import type { ISessionRepository } from "./session-repository.js";

export class DrizzleSessionRepository implements ISessionRepository {
  constructor(
    private readonly db: DrizzleDb,
    private readonly ctx: StoreContext,
  ) {}

  async create(session: Session, opts?: QueryOptions): Promise<Session> {
    return runStatement(this.ctx, "DrizzleSessionRepository.create", "write", opts, async () => {
      this.ctx.guard.requireUuid(session.id, "id");
      this.ctx.guard.requireUuid(session.userId, "userId");
      this.ctx.guard.requireString(session.token, "token");
      this.ctx.guard.requireDate(session.expiresAt, "expiresAt");

      const rows = await this.db
        .insert(sessions)
        .values({
          id: session.id,
          userId: session.userId,
          token: session.token,
          expiresAt: session.expiresAt,
          createdAt: session.createdAt,
          lastActiveAt: session.lastActiveAt,
          ipAddress: session.ipAddress,
          userAgent: session.userAgent,
        })
        .returning();
      const row = rows[0];
      if (!row) throw new Error("insert returned no row");
      return this.toSession(row);
    });
  }

  async getByToken(token: string, opts?: QueryOptions): Promise<Session> {
    const op = "DrizzleSessionRepository.getByToken";
    return runStatement(this.ctx, op, "read", opts, async () => {
      this.ctx.guard.requireString(token, "token");
      const now = this.ctx.clock.now();
      const graceCutoff = new Date(now.getTime() - TOKEN_GRACE_PERIOD_MS);

      const rows = await this.db
        .select()
        .from(sessions)
        .where(
          and(
            gt(sessions.expiresAt, now),
            or(
              eq(sessions.token, token),
              and(eq(sessions.previousToken, token), gt(sessions.rotatedAt, graceCutoff)),
            ),
          ),
        )
        .limit(1);
      const row = rows[0];
      if (!row) throw new NotFoundError("session", op);
      return this.toSession(row);
    });
  }

  async update(session: Session, opts?: QueryOptions): Promise<void> {
    const op = "DrizzleSessionRepository.update";
    await runStatement(this.ctx, op, "write", opts, async () => {
      this.ctx.guard.requireUuid(session.id, "id");
      this.ctx.guard.requireString(session.token, "token");
      this.ctx.guard.requireDate(session.expiresAt, "expiresAt");

      const rows = await this.db
        .update(sessions)
        .set({
          token: session.token,
          expiresAt: session.expiresAt,
          lastActiveAt: session.lastActiveAt,
          ipAddress: session.ipAddress,
          userAgent: session.userAgent,
          previousToken: session.previousToken,
          rotatedAt: session.rotatedAt,
        })
        .where(eq(sessions.id, session.id))
        .returning({ id: sessions.id });
      if (rows.length === 0) throw new NotFoundError("session", op);
    });
  }

  async rotate(sessionId: string, presentedToken: string, newToken: string, opts?: QueryOptions): Promise<Session> {
    const op = "DrizzleSessionRepository.rotate";
    return runStatement(this.ctx, op, "write", opts, async () => {
      this.ctx.guard.requireUuid(sessionId, "sessionId");
      this.ctx.guard.requireString(presentedToken, "presentedToken");
      this.ctx.guard.requireString(newToken, "newToken");
      const now = this.ctx.clock.now();

      // SET expressions read the pre-update row, so previous_token receives
      // the token being replaced.
      const rows = await this.db
        .update(sessions)
        .set({
          token: newToken,
          previousToken: sql`${sessions.token}`,
          rotatedAt: now,
          lastActiveAt: now,
        })
        .where(and(eq(sessions.id, sessionId), eq(sessions.token, presentedToken), gt(sessions.expiresAt, now)))
        .returning();
      const row = rows[0];
      if (row) return this.toSession(row);

      // Best-effort classification: the row can change between the update
      // and this read.
      const live = await this.db
        .select({ id: sessions.id })
        .from(sessions)
        .where(and(eq(sessions.id, sessionId), gt(sessions.expiresAt, now)));
      if (live.length === 0) throw new NotFoundError("session", op);
      throw new ConflictError("session token was rotated concurrently", op);
    });
  }

  async clearExpiredPreviousTokens(opts?: QueryOptions): Promise<number> {
    return runStatement(this.ctx, "DrizzleSessionRepository.clearExpiredPreviousTokens", "write", opts, async () => {
      const graceCutoff = new Date(this.ctx.clock.now().getTime() - TOKEN_GRACE_PERIOD_MS);
      const rows = await this.db
        .update(sessions)
        .set({ previousToken: null, rotatedAt: null })
        .where(and(isNotNull(sessions.rotatedAt), lte(sessions.rotatedAt, graceCutoff)))
        .returning({ id: sessions.id });
      return rows.length;
    });
  }

  async invalidatePreviousToken(sessionId: string, opts?: QueryOptions): Promise<void> {
    const op = "DrizzleSessionRepository.invalidatePreviousToken";
    await runStatement(this.ctx, op, "write", opts, async () => {
      this.ctx.guard.requireUuid(sessionId, "sessionId");
      const rows = await this.db
        .update(sessions)
        .set({ previousToken: null, rotatedAt: null })
        .where(eq(sessions.id, sessionId))
        .returning({ id: sessions.id });
      if (rows.length === 0) throw new NotFoundError("session", op);
    });
  }

  async touch(sessionId: string, opts?: QueryOptions): Promise<void> {
    const op = "DrizzleSessionRepository.touch";
    await runStatement(this.ctx, op, "write", opts, async () => {
      this.ctx.guard.requireUuid(sessionId, "sessionId");
      const rows = await this.db
        .update(sessions)
        .set({ lastActiveAt: this.ctx.clock.now() })
        .where(eq(sessions.id, sessionId))
        .returning({ id: sessions.id });
      if (rows.length === 0) throw new NotFoundError("session", op);
    });
  }

  async delete(token: string, opts?: QueryOptions): Promise<boolean> {
    return runStatement(this.ctx, "DrizzleSessionRepository.delete", "write", opts, async () => {
      this.ctx.guard.requireString(token, "token");
      const rows = await this.db.delete(sessions).where(eq(sessions.token, token)).returning({ id: sessions.id });
      return rows.length > 0;
    });
  }

  async deleteById(sessionId: string, opts?: QueryOptions): Promise<boolean> {
    return runStatement(this.ctx, "DrizzleSessionRepository.deleteById", "write", opts, async () => {
      this.ctx.guard.requireUuid(sessionId, "sessionId");
      const rows = await this.db.delete(sessions).where(eq(sessions.id, sessionId)).returning({ id: sessions.id });
      return rows.length > 0;
    });
  }

  async deleteExpired(opts?: QueryOptions): Promise<number> {
    return runStatement(this.ctx, "DrizzleSessionRepository.deleteExpired", "write", opts, async () => {
      const rows = await this.db
        .delete(sessions)
        .where(lte(sessions.expiresAt, this.ctx.clock.now()))
        .returning({ id: sessions.id });
      return rows.length;
    });
  }

  async deleteByUserId(userId: string, opts?: QueryOptions): Promise<number> {
    return runStatement(this.ctx, "DrizzleSessionRepository.deleteByUserId", "write", opts, async () => {
      this.ctx.guard.requireUuid(userId, "userId");
      const rows = await this.db.delete(sessions).where(eq(sessions.userId, userId)).returning({ id: sessions.id });
      return rows.length;
    });
  }

  private toSession(row: typeof sessions.$inferSelect): Session {
    return {
      id: row.id,
      userId: row.userId,
      token: row.token,
      expiresAt: row.expiresAt,
      createdAt: row.createdAt,
      lastActiveAt: row.lastActiveAt ?? null,
      ipAddress: row.ipAddress ?? null,
      userAgent: row.userAgent ?? null,
      previousToken: row.previousToken ?? null,
      rotatedAt: row.rotatedAt ?? null,
    };
  }
}
