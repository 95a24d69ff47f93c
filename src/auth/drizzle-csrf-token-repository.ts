import { randomUUID } from "node:crypto";
import { and, eq, gt, lte, sql } from "drizzle-orm";
import { runStatement, type StoreContext } from "../db/context.js";
import { NotFoundError } from "../db/errors.js";
import type { DrizzleDb } from "../db/index.js";
import { csrfTokens } from "../db/schema/index.js";
import { timestamptz } from "../db/sql.js";
import type { QueryOptions } from "../db/timeouts.js";
import type { ICsrfTokenRepository } from "./csrf-token-repository.js";
import type { CsrfToken } from "./repository-types.js";

export class DrizzleCsrfTokenRepository implements ICsrfTokenRepository {
  constructor(
    private readonly db: DrizzleDb,
    private readonly ctx: StoreContext,
  ) {}

  async create(token: CsrfToken, opts?: QueryOptions): Promise<CsrfToken> {
    return runStatement(this.ctx, "DrizzleCsrfTokenRepository.create", "write", opts, async () => {
      this.ctx.guard.requireUuid(token.id, "id");
      this.ctx.guard.requireString(token.token, "token");
      this.ctx.guard.requireDate(token.expiresAt, "expiresAt");
      if (token.sessionId !== null) this.ctx.guard.requireUuid(token.sessionId, "sessionId");

      const rows = await this.db.insert(csrfTokens).values(token).returning();
      const row = rows[0];
      if (!row) throw new Error("insert returned no row");
      return this.toToken(row);
    });
  }

  async getOrCreate(sessionId: string | null, token: string, ttlMs: number, opts?: QueryOptions): Promise<CsrfToken> {
    return runStatement(this.ctx, "DrizzleCsrfTokenRepository.getOrCreate", "write", opts, async () => {
      if (sessionId !== null) this.ctx.guard.requireUuid(sessionId, "sessionId");
      this.ctx.guard.requireString(token, "token");
      this.ctx.guard.requirePositive(ttlMs, "ttlMs");

      const now = this.ctx.clock.now();
      const expiresAt = new Date(now.getTime() + ttlMs);
      // Arbitrates on the partial unique index (session_id) WHERE used = false.
      // An expired unused token is replaced in place; a live one is kept and
      // returned. A null session never conflicts and always inserts.
      const expired = sql`${csrfTokens.expiresAt} <= ${timestamptz(now)}`;
      const rows = await this.db
        .insert(csrfTokens)
        .values({ id: randomUUID(), token, sessionId, expiresAt, createdAt: now, used: false })
        .onConflictDoUpdate({
          target: csrfTokens.sessionId,
          targetWhere: sql`used = false`,
          set: {
            token: sql`CASE WHEN ${expired} THEN excluded.token ELSE ${csrfTokens.token} END`,
            expiresAt: sql`CASE WHEN ${expired} THEN excluded.expires_at ELSE ${csrfTokens.expiresAt} END`,
            createdAt: sql`CASE WHEN ${expired} THEN excluded.created_at ELSE ${csrfTokens.createdAt} END`,
          },
        })
        .returning();
      const row = rows[0];
      if (!row) throw new Error("upsert returned no row");
      return this.toToken(row);
    });
  }

  async getByToken(token: string, opts?: QueryOptions): Promise<CsrfToken> {
    const op = "DrizzleCsrfTokenRepository.getByToken";
    return runStatement(this.ctx, op, "read", opts, async () => {
      this.ctx.guard.requireString(token, "token");
      const rows = await this.db
        .select()
        .from(csrfTokens)
        .where(
          and(eq(csrfTokens.token, token), eq(csrfTokens.used, false), gt(csrfTokens.expiresAt, this.ctx.clock.now())),
        );
      const row = rows[0];
      if (!row) throw new NotFoundError("csrf token", op);
      return this.toToken(row);
    });
  }

  async markUsed(token: string, opts?: QueryOptions): Promise<void> {
    const op = "DrizzleCsrfTokenRepository.markUsed";
    await runStatement(this.ctx, op, "write", opts, async () => {
      this.ctx.guard.requireString(token, "token");
      const rows = await this.db
        .update(csrfTokens)
        .set({ used: true })
        .where(eq(csrfTokens.token, token))
        .returning({ id: csrfTokens.id });
      if (rows.length === 0) throw new NotFoundError("csrf token", op);
    });
  }

  async consume(token: string, opts?: QueryOptions): Promise<CsrfToken> {
    const op = "DrizzleCsrfTokenRepository.consume";
    return runStatement(this.ctx, op, "write", opts, async () => {
      this.ctx.guard.requireString(token, "token");
      const rows = await this.db
        .update(csrfTokens)
        .set({ used: true })
        .where(
          and(eq(csrfTokens.token, token), eq(csrfTokens.used, false), gt(csrfTokens.expiresAt, this.ctx.clock.now())),
        )
        .returning();
      const row = rows[0];
      if (!row) throw new NotFoundError("csrf token", op);
      return this.toToken(row);
    });
  }

  async delete(token: string, opts?: QueryOptions): Promise<number> {
    return runStatement(this.ctx, "DrizzleCsrfTokenRepository.delete", "write", opts, async () => {
      this.ctx.guard.requireString(token, "token");
      const rows = await this.db.delete(csrfTokens).where(eq(csrfTokens.token, token)).returning({ id: csrfTokens.id });
      return rows.length;
    });
  }

  async deleteBySessionId(sessionId: string, opts?: QueryOptions): Promise<number> {
    return runStatement(this.ctx, "DrizzleCsrfTokenRepository.deleteBySessionId", "write", opts, async () => {
      this.ctx.guard.requireUuid(sessionId, "sessionId");
      const rows = await this.db
        .delete(csrfTokens)
        .where(eq(csrfTokens.sessionId, sessionId))
        .returning({ id: csrfTokens.id });
      return rows.length;
    });
  }

  async deleteExpired(opts?: QueryOptions): Promise<number> {
    return runStatement(this.ctx, "DrizzleCsrfTokenRepository.deleteExpired", "write", opts, async () => {
      const rows = await this.db
        .delete(csrfTokens)
        .where(lte(csrfTokens.expiresAt, this.ctx.clock.now()))
        .returning({ id: csrfTokens.id });
      return rows.length;
    });
  }

  private toToken(row: typeof csrfTokens.$inferSelect): CsrfToken {
    return {
      id: row.id,
      token: row.token,
      sessionId: row.sessionId ?? null,
      expiresAt: row.expiresAt,
      createdAt: row.createdAt,
      used: row.used,
    };
  }
}
