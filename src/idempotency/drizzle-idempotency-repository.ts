import { randomUUID } from "node:crypto";
import { and, eq, gt, lte } from "drizzle-orm";
import { runStatement, type StoreContext } from "../db/context.js";
import { ConflictError } from "../db/errors.js";
import type { DrizzleDb } from "../db/index.js";
import { idempotencyClaims, idempotencyKeys } from "../db/schema/index.js";
import type { QueryOptions } from "../db/timeouts.js";
import { runInTransaction } from "../db/transaction.js";
import type { IIdempotencyRepository } from "./idempotency-repository.js";
import type { IdempotencyRecord, JsonValue } from "./repository-types.js";

export class DrizzleIdempotencyRepository implements IIdempotencyRepository {
  constructor(
    private readonly db: DrizzleDb,
    private readonly ctx: StoreContext,
  ) {}

  async get(key: string, opts?: QueryOptions): Promise<IdempotencyRecord | null> {
    return runStatement(this.ctx, "DrizzleIdempotencyRepository.get", "read", opts, async () => {
      this.ctx.guard.requireString(key, "key");
      const rows = await this.db
        .select()
        .from(idempotencyKeys)
        .where(and(eq(idempotencyKeys.key, key), gt(idempotencyKeys.expiresAt, this.ctx.clock.now())));
      const row = rows[0];
      return row ? this.toRecord(row) : null;
    });
  }

  async save(key: string, response: JsonValue, expiresAt: Date, opts?: QueryOptions): Promise<void> {
    await runStatement(this.ctx, "DrizzleIdempotencyRepository.save", "write", opts, async () => {
      this.ctx.guard.requireString(key, "key");
      this.ctx.guard.requireDate(expiresAt, "expiresAt");
      const now = this.ctx.clock.now();
      await this.db
        .insert(idempotencyKeys)
        .values({ key, response, createdAt: now, expiresAt })
        .onConflictDoUpdate({
          target: idempotencyKeys.key,
          set: { response, createdAt: now, expiresAt },
        });
    });
  }

  async cleanupExpired(opts?: QueryOptions): Promise<number> {
    return runStatement(this.ctx, "DrizzleIdempotencyRepository.cleanupExpired", "write", opts, async () => {
      const result = await this.db
        .delete(idempotencyKeys)
        .where(lte(idempotencyKeys.expiresAt, this.ctx.clock.now()))
        .returning({ key: idempotencyKeys.key });
      return result.length;
    });
  }

  async claim(key: string, leaseMs: number, opts?: QueryOptions): Promise<string | null> {
    return runStatement(this.ctx, "DrizzleIdempotencyRepository.claim", "write", opts, async () => {
      this.ctx.guard.requireString(key, "key");
      this.ctx.guard.requirePositive(leaseMs, "leaseMs");
      const now = this.ctx.clock.now();
      const expiresAt = new Date(now.getTime() + leaseMs);
      const owner = randomUUID();
      // Insert, or take over a claim whose lease has lapsed. A live claim
      // leaves the row untouched and RETURNING yields nothing.
      const rows = await this.db
        .insert(idempotencyClaims)
        .values({ key, owner, claimedAt: now, expiresAt })
        .onConflictDoUpdate({
          target: idempotencyClaims.key,
          set: { owner, claimedAt: now, expiresAt },
          setWhere: lte(idempotencyClaims.expiresAt, now),
        })
        .returning({ owner: idempotencyClaims.owner });
      return rows[0]?.owner ?? null;
    });
  }

  async complete(key: string, owner: string, response: JsonValue, expiresAt: Date, opts?: QueryOptions): Promise<void> {
    const op = "DrizzleIdempotencyRepository.complete";
    await runInTransaction(
      this.db,
      this.ctx,
      op,
      async (tx) => {
        this.ctx.guard.requireString(key, "key");
        this.ctx.guard.requireUuid(owner, "owner");
        this.ctx.guard.requireDate(expiresAt, "expiresAt");
        const released = await tx
          .delete(idempotencyClaims)
          .where(and(eq(idempotencyClaims.key, key), eq(idempotencyClaims.owner, owner)))
          .returning({ key: idempotencyClaims.key });
        if (released.length === 0) throw new ConflictError(`claim on ${key} is no longer held`, op);

        const now = this.ctx.clock.now();
        await tx
          .insert(idempotencyKeys)
          .values({ key, response, createdAt: now, expiresAt })
          .onConflictDoUpdate({
            target: idempotencyKeys.key,
            set: { response, createdAt: now, expiresAt },
          });
      },
      opts,
    );
  }

  async releaseClaim(key: string, owner: string, opts?: QueryOptions): Promise<boolean> {
    return runStatement(this.ctx, "DrizzleIdempotencyRepository.releaseClaim", "write", opts, async () => {
      this.ctx.guard.requireString(key, "key");
      this.ctx.guard.requireUuid(owner, "owner");
      const rows = await this.db
        .delete(idempotencyClaims)
        .where(and(eq(idempotencyClaims.key, key), eq(idempotencyClaims.owner, owner)))
        .returning({ key: idempotencyClaims.key });
      return rows.length > 0;
    });
  }

  async cleanupExpiredClaims(opts?: QueryOptions): Promise<number> {
    return runStatement(this.ctx, "DrizzleIdempotencyRepository.cleanupExpiredClaims", "write", opts, async () => {
      const result = await this.db
        .delete(idempotencyClaims)
        .where(lte(idempotencyClaims.expiresAt, this.ctx.clock.now()))
        .returning({ key: idempotencyClaims.key });
      return result.length;
    });
  }

  private toRecord(row: typeof idempotencyKeys.$inferSelect): IdempotencyRecord {
    return {
      key: row.key,
      response: row.response,
      createdAt: row.createdAt,
      expiresAt: row.expiresAt,
    };
  }
}
