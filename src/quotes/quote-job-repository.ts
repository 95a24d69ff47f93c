import type { QueryOptions } from "../db/timeouts.js";
import type { QuoteJob, QuoteJobStatus } from "./quote-job.js";

export interface EnqueueResult {
  job: QuoteJob;
  /** False when an active job for the call already existed and was returned instead. */
  created: boolean;
}

export interface UpdateJobOptions extends QueryOptions {
  /** Compare-and-swap: only write while the stored status still equals this. */
  expectedStatus?: QuoteJobStatus;
  /**
   * Compare-and-swap on the claim: every claim increments attempts, so a
   * writer holding an older claim of the same job no longer matches.
   */
  expectedAttempts?: number;
}

export interface IQuoteJobRepository {
  create(job: QuoteJob, opts?: QueryOptions): Promise<QuoteJob>;
  /** Insert unless the call already has a pending or processing job. */
  enqueue(job: QuoteJob, opts?: QueryOptions): Promise<EnqueueResult>;
  getById(id: string, opts?: QueryOptions): Promise<QuoteJob>;
  /** Most recently created job for the call. */
  getByCallId(callId: string, opts?: QueryOptions): Promise<QuoteJob>;
  /** Pending jobs due now, earliest `scheduled_at` first. Read-only; see claimPendingJobs. */
  getPendingJobs(limit: number, opts?: QueryOptions): Promise<QuoteJob[]>;
  /** Jobs processing since longer than `olderThanMs`, oldest first. */
  getProcessingJobs(olderThanMs: number, opts?: QueryOptions): Promise<QuoteJob[]>;
  update(job: QuoteJob, opts?: UpdateJobOptions): Promise<void>;
  /**
   * Atomically move up to `limit` due jobs to processing, incrementing
   * attempts. Concurrent claimers never receive the same job.
   */
  claimPendingJobs(limit: number, opts?: QueryOptions): Promise<QuoteJob[]>;
  countByStatus(opts?: QueryOptions): Promise<Record<QuoteJobStatus, number>>;
}
