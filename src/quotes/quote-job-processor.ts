import type { Clock } from "../clock.js";
import { logger } from "../config/logger.js";
import { ConflictError } from "../db/errors.js";
import { captureError } from "../observability/sentry.js";
import type { ICallRepository } from "./call-repository.js";
import { DEFAULT_MAX_ATTEMPTS, markCompleted, markFailed, newQuoteJob, type QuoteJob, type QuoteJobStatus } from "./quote-job.js";
import type { EnqueueResult, IQuoteJobRepository, UpdateJobOptions } from "./quote-job-repository.js";

/** Turns a call transcript into a quote summary. Supplied by the host application. */
export interface QuoteGenerator {
  generateQuote(transcript: string, extractedData: Record<string, unknown>): Promise<string>;
}

export interface QuoteJobProcessorOptions {
  /** Jobs claimed per processBatch() call (default: 10). */
  batchSize?: number;
  /** A job processing longer than this is considered abandoned (default: 5 minutes). */
  stuckJobTimeoutMs?: number;
  maxAttempts?: number;
}

export interface BatchResult {
  claimed: number;
  completed: number;
  retried: number;
  failed: number;
  /** Jobs whose outcome could not be recorded; recoverStuckJobs picks them up later. */
  errors: number;
}

export const STUCK_JOB_ERROR = "job interrupted - process restarted";
const DEFAULT_BATCH_SIZE = 10;
const DEFAULT_STUCK_JOB_TIMEOUT_MS = 5 * 60 * 1000;

type Outcome = "completed" | "retried" | "failed";

/**
 * Drives quote jobs through their lifecycle.
 *
 * A generation failure never escapes processBatch: it is written to the job
 * (last_error, error_count) and the job is rescheduled or finalised. Every
 * write-back is a compare-and-swap on `processing` and the claim's attempt
 * number, so a job that stuck-job recovery has reset, or that another worker
 * has claimed since, is left alone.
 */
export class QuoteJobProcessor {
  private readonly batchSize: number;
  private readonly stuckJobTimeoutMs: number;
  private readonly maxAttempts: number;

  constructor(
    private readonly jobs: IQuoteJobRepository,
    private readonly calls: ICallRepository,
    private readonly generator: QuoteGenerator,
    private readonly clock: Clock,
    opts: QuoteJobProcessorOptions = {},
  ) {
    this.batchSize = opts.batchSize ?? DEFAULT_BATCH_SIZE;
    this.stuckJobTimeoutMs = opts.stuckJobTimeoutMs ?? DEFAULT_STUCK_JOB_TIMEOUT_MS;
    this.maxAttempts = opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  async enqueue(callId: string, metadata?: Record<string, unknown>): Promise<EnqueueResult> {
    const result = await this.jobs.enqueue(
      newQuoteJob(callId, this.clock.now(), { maxAttempts: this.maxAttempts, metadata }),
    );
    if (result.created) {
      logger.info("Quote job enqueued", { jobId: result.job.id, callId });
    }
    return result;
  }

  async processBatch(): Promise<BatchResult> {
    const claimed = await this.jobs.claimPendingJobs(this.batchSize);
    const result: BatchResult = { claimed: claimed.length, completed: 0, retried: 0, failed: 0, errors: 0 };

    for (const job of claimed) {
      try {
        result[await this.process(job)]++;
      } catch (err) {
        result.errors++;
        logger.error("Quote job outcome not recorded", { jobId: job.id, callId: job.callId, error: err });
        captureError(err, { source: "quote-job-processor", jobId: job.id });
      }
    }
    return result;
  }

  /** Fail jobs left in processing by a crashed or partitioned worker. Returns how many were reset. */
  async recoverStuckJobs(): Promise<number> {
    const stuck = await this.jobs.getProcessingJobs(this.stuckJobTimeoutMs);
    let recovered = 0;
    for (const job of stuck) {
      const next = markFailed(job, STUCK_JOB_ERROR, this.clock.now());
      try {
        await this.jobs.update(next, claimOf(job));
      } catch (err) {
        if (err instanceof ConflictError) continue;
        throw err;
      }
      recovered++;
      logger.warn("Recovered stuck quote job", { jobId: job.id, startedAt: job.startedAt, status: next.status });
    }
    return recovered;
  }

  stats(): Promise<Record<QuoteJobStatus, number>> {
    return this.jobs.countByStatus();
  }

  getJob(id: string): Promise<QuoteJob> {
    return this.jobs.getById(id);
  }

  getJobByCallId(callId: string): Promise<QuoteJob> {
    return this.jobs.getByCallId(callId);
  }

  private async process(job: QuoteJob): Promise<Outcome> {
    const error = await this.generate(job);
    if (error !== null) return this.fail(job, error);

    await this.jobs.update(markCompleted(job, this.clock.now()), claimOf(job));
    logger.info("Quote job completed", { jobId: job.id, callId: job.callId, attempts: job.attempts });
    return "completed";
  }

  /** Generate and store the quote; resolves to the failure message, or null on success. */
  private async generate(job: QuoteJob): Promise<string | null> {
    try {
      const call = await this.calls.getById(job.callId);
      if (call.transcript === null || call.transcript.trim() === "") return "call has no transcript";
      const quote = await this.generator.generateQuote(call.transcript, call.extractedData ?? {});
      await this.calls.saveQuote(call.id, quote);
      return null;
    } catch (err) {
      return err instanceof Error ? err.message : String(err);
    }
  }

  private async fail(job: QuoteJob, error: string): Promise<Outcome> {
    const next = markFailed(job, error, this.clock.now());
    await this.jobs.update(next, claimOf(job));

    if (next.status === "pending") {
      logger.warn("Quote job failed, retry scheduled", {
        jobId: job.id,
        attempts: job.attempts,
        scheduledAt: next.scheduledAt.toISOString(),
        error,
      });
      return "retried";
    }
    logger.error("Quote job failed permanently", { jobId: job.id, attempts: job.attempts, error });
    return "failed";
  }
}

function claimOf(job: QuoteJob): UpdateJobOptions {
  return { expectedStatus: "processing", expectedAttempts: job.attempts };
}
