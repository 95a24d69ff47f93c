import { and, asc, desc, eq, inArray, lt, lte, sql } from "drizzle-orm";
import { runStatement, type StoreContext } from "../db/context.js";
import { ConflictError, NotFoundError } from "../db/errors.js";
import type { DrizzleDb } from "../db/index.js";
import { quoteJobs } from "../db/schema/index.js";
import type { QueryOptions } from "../db/timeouts.js";
import { QUOTE_JOB_STATUSES, type QuoteJob, type QuoteJobStatus } from "./quote-job.js";
import type { EnqueueResult, IQuoteJobRepository, UpdateJobOptions } from "./quote-job-repository.js";

const ACTIVE_STATUSES: QuoteJobStatus[] = ["pending", "processing"];

export class DrizzleQuoteJobRepository implements IQuoteJobRepository {
  constructor(
    private readonly db: DrizzleDb,
    private readonly ctx: StoreContext,
  ) {}

  async create(job: QuoteJob, opts?: QueryOptions): Promise<QuoteJob> {
    return runStatement(this.ctx, "DrizzleQuoteJobRepository.create", "write", opts, async () => {
      this.validate(job);
      const rows = await this.db.insert(quoteJobs).values(job).returning();
      const row = rows[0];
      if (!row) throw new Error("insert returned no row");
      return this.toJob(row);
    });
  }

  async enqueue(job: QuoteJob, opts?: QueryOptions): Promise<EnqueueResult> {
    const op = "DrizzleQuoteJobRepository.enqueue";
    return runStatement(this.ctx, op, "write", opts, async () => {
      this.validate(job);
      // uq_quote_jobs_active_call admits one pending/processing job per call.
      // A second attempt covers the active job finishing between the two
      // statements.
      for (let attempt = 0; attempt < 2; attempt++) {
        const inserted = await this.db.insert(quoteJobs).values(job).onConflictDoNothing().returning();
        const row = inserted[0];
        if (row) return { job: this.toJob(row), created: true };

        const active = await this.db
          .select()
          .from(quoteJobs)
          .where(and(eq(quoteJobs.callId, job.callId), inArray(quoteJobs.status, ACTIVE_STATUSES)))
          .limit(1);
        const existing = active[0];
        if (existing) return { job: this.toJob(existing), created: false };
      }
      throw new ConflictError(`could not enqueue job for call ${job.callId}`, op);
    });
  }

  async getById(id: string, opts?: QueryOptions): Promise<QuoteJob> {
    const op = "DrizzleQuoteJobRepository.getById";
    return runStatement(this.ctx, op, "read", opts, async () => {
      this.ctx.guard.requireUuid(id, "id");
      const rows = await this.db.select().from(quoteJobs).where(eq(quoteJobs.id, id));
      const row = rows[0];
      if (!row) throw new NotFoundError("quote job", op);
      return this.toJob(row);
    });
  }

  async getByCallId(callId: string, opts?: QueryOptions): Promise<QuoteJob> {
    const op = "DrizzleQuoteJobRepository.getByCallId";
    return runStatement(this.ctx, op, "read", opts, async () => {
      this.ctx.guard.requireUuid(callId, "callId");
      const rows = await this.db
        .select()
        .from(quoteJobs)
        .where(eq(quoteJobs.callId, callId))
        .orderBy(desc(quoteJobs.createdAt))
        .limit(1);
      const row = rows[0];
      if (!row) throw new NotFoundError("quote job", op);
      return this.toJob(row);
    });
  }

  async getPendingJobs(limit: number, opts?: QueryOptions): Promise<QuoteJob[]> {
    return runStatement(this.ctx, "DrizzleQuoteJobRepository.getPendingJobs", "list", opts, async () => {
      this.ctx.guard.requirePositive(limit, "limit");
      const rows = await this.db
        .select()
        .from(quoteJobs)
        .where(and(eq(quoteJobs.status, "pending"), lte(quoteJobs.scheduledAt, this.ctx.clock.now())))
        .orderBy(asc(quoteJobs.scheduledAt))
        .limit(limit);
      return rows.map((r) => this.toJob(r));
    });
  }

  async getProcessingJobs(olderThanMs: number, opts?: QueryOptions): Promise<QuoteJob[]> {
    return runStatement(this.ctx, "DrizzleQuoteJobRepository.getProcessingJobs", "list", opts, async () => {
      this.ctx.guard.requireNonNegative(olderThanMs, "olderThanMs");
      const cutoff = new Date(this.ctx.clock.now().getTime() - olderThanMs);
      const rows = await this.db
        .select()
        .from(quoteJobs)
        .where(and(eq(quoteJobs.status, "processing"), lt(quoteJobs.startedAt, cutoff)))
        .orderBy(asc(quoteJobs.startedAt));
      return rows.map((r) => this.toJob(r));
    });
  }

  async update(job: QuoteJob, opts: UpdateJobOptions = {}): Promise<void> {
    const op = "DrizzleQuoteJobRepository.update";
    await runStatement(this.ctx, op, "write", opts, async () => {
      this.validate(job);
      const { expectedStatus, expectedAttempts } = opts;
      const conditions = [eq(quoteJobs.id, job.id)];
      if (expectedStatus !== undefined) conditions.push(eq(quoteJobs.status, expectedStatus));
      if (expectedAttempts !== undefined) conditions.push(eq(quoteJobs.attempts, expectedAttempts));

      const rows = await this.db
        .update(quoteJobs)
        .set({
          status: job.status,
          attempts: job.attempts,
          maxAttempts: job.maxAttempts,
          updatedAt: job.updatedAt,
          scheduledAt: job.scheduledAt,
          startedAt: job.startedAt,
          completedAt: job.completedAt,
          lastError: job.lastError,
          errorCount: job.errorCount,
          metadata: job.metadata,
        })
        .where(and(...conditions))
        .returning({ id: quoteJobs.id });
      if (rows.length > 0) return;

      if (conditions.length > 1) {
        // Best-effort: the row may change between the update and this read.
        const current = await this.db
          .select({ status: quoteJobs.status, attempts: quoteJobs.attempts })
          .from(quoteJobs)
          .where(eq(quoteJobs.id, job.id));
        const row = current[0];
        if (row) {
          throw new ConflictError(
            `quote job ${job.id} is ${row.status} at attempt ${row.attempts}, expected ${expectedStatus ?? "any"} at attempt ${expectedAttempts ?? "any"}`,
            op,
          );
        }
      }
      throw new NotFoundError("quote job", op);
    });
  }

  async claimPendingJobs(limit: number, opts?: QueryOptions): Promise<QuoteJob[]> {
    return runStatement(this.ctx, "DrizzleQuoteJobRepository.claimPendingJobs", "write", opts, async () => {
      this.ctx.guard.requirePositive(limit, "limit");
      const now = this.ctx.clock.now();
      // Rows locked by a concurrent claimer are skipped rather than waited on.
      const due = this.db
        .select({ id: quoteJobs.id })
        .from(quoteJobs)
        .where(and(eq(quoteJobs.status, "pending"), lte(quoteJobs.scheduledAt, now)))
        .orderBy(asc(quoteJobs.scheduledAt))
        .limit(limit)
        .for("update", { skipLocked: true });

      const rows = await this.db
        .update(quoteJobs)
        .set({
          status: "processing",
          attempts: sql`${quoteJobs.attempts} + 1`,
          startedAt: now,
          updatedAt: now,
        })
        .where(and(inArray(quoteJobs.id, due), eq(quoteJobs.status, "pending")))
        .returning();
      return rows.map((r) => this.toJob(r)).sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime());
    });
  }

  async countByStatus(opts?: QueryOptions): Promise<Record<QuoteJobStatus, number>> {
    return runStatement(this.ctx, "DrizzleQuoteJobRepository.countByStatus", "read", opts, async () => {
      const rows = await this.db
        .select({ status: quoteJobs.status, count: sql<number>`count(*)::int` })
        .from(quoteJobs)
        .groupBy(quoteJobs.status);

      const counts: Record<QuoteJobStatus, number> = { pending: 0, processing: 0, completed: 0, failed: 0 };
      for (const row of rows) {
        if (isStatus(row.status)) counts[row.status] = Number(row.count);
      }
      return counts;
    });
  }

  private validate(job: QuoteJob): void {
    this.ctx.guard.requireUuid(job.id, "id");
    this.ctx.guard.requireUuid(job.callId, "callId");
    this.ctx.guard.requireOneOf(job.status, QUOTE_JOB_STATUSES, "status");
    this.ctx.guard.requireNonNegative(job.attempts, "attempts");
    this.ctx.guard.requirePositive(job.maxAttempts, "maxAttempts");
    this.ctx.guard.requireDate(job.scheduledAt, "scheduledAt");
  }

  private toJob(row: typeof quoteJobs.$inferSelect): QuoteJob {
    return {
      id: row.id,
      callId: row.callId,
      status: toStatus(row.status),
      attempts: row.attempts,
      maxAttempts: row.maxAttempts,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
      scheduledAt: row.scheduledAt,
      startedAt: row.startedAt ?? null,
      completedAt: row.completedAt ?? null,
      lastError: row.lastError ?? null,
      errorCount: row.errorCount,
      metadata: row.metadata,
    };
  }
}

function isStatus(value: string): value is QuoteJobStatus {
  return QUOTE_JOB_STATUSES.some((s) => s === value);
}

function toStatus(value: string): QuoteJobStatus {
  if (!isStatus(value)) throw new Error(`unknown quote job status: ${value}`);
  return value;
}
