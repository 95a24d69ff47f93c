import { eq } from "drizzle-orm";
import { runStatement, type StoreContext } from "../db/context.js";
import { NotFoundError } from "../db/errors.js";
import type { DrizzleDb } from "../db/index.js";
import { calls } from "../db/schema/index.js";
import type { QueryOptions } from "../db/timeouts.js";
import type { ICallRepository } from "./call-repository.js";
import type { Call } from "./repository-types.js";

export class DrizzleCallRepository implements ICallRepository {
  constructor(
    private readonly db: DrizzleDb,
    private readonly ctx: StoreContext,
  ) {}

  async getById(id: string, opts?: QueryOptions): Promise<Call> {
    const op = "DrizzleCallRepository.getById";
    return runStatement(this.ctx, op, "read", opts, async () => {
      this.ctx.guard.requireUuid(id, "id");
      const rows = await this.db.select().from(calls).where(eq(calls.id, id));
      const row = rows[0];
      if (!row) throw new NotFoundError("call", op);
      return {
        id: row.id,
        providerCallId: row.providerCallId,
        status: row.status,
        transcript: row.transcript ?? null,
        extractedData: row.extractedData ?? null,
        quoteSummary: row.quoteSummary ?? null,
        createdAt: row.createdAt,
        updatedAt: row.updatedAt,
      };
    });
  }

  async saveQuote(id: string, quoteSummary: string, opts?: QueryOptions): Promise<void> {
    const op = "DrizzleCallRepository.saveQuote";
    await runStatement(this.ctx, op, "write", opts, async () => {
      this.ctx.guard.requireUuid(id, "id");
      this.ctx.guard.requireString(quoteSummary, "quoteSummary");
      const rows = await this.db
        .update(calls)
        .set({ quoteSummary, updatedAt: this.ctx.clock.now() })
        .where(eq(calls.id, id))
        .returning({ id: calls.id });
      if (rows.length === 0) throw new NotFoundError("call", op);
    });
  }
}
