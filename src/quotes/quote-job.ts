/**
 * Quote job lifecycle: pure rules, no I/O.
 *
 * ```
 * pending    → processing
 * processing → completed, pending (retry), failed (attempts exhausted)
 * ```
 *
 * Failure is state, not an exception: a failed attempt is recorded in
 * `last_error` / `error_count` and either rescheduled with backoff or
 * finalised as `failed`.
 */
import { randomUUID } from "node:crypto";

export const QUOTE_JOB_STATUSES = ["pending", "processing", "completed", "failed"] as const;

export type QuoteJobStatus = (typeof QUOTE_JOB_STATUSES)[number];

export const VALID_TRANSITIONS: Record<QuoteJobStatus, readonly QuoteJobStatus[]> = {
  pending: ["processing"],
  processing: ["completed", "pending", "failed"],
  completed: [],
  failed: [],
};

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface QuoteJob {
  id: string;
  callId: string;
  status: QuoteJobStatus;
  attempts: number;
  maxAttempts: number;
  createdAt: Date;
  updatedAt: Date;
  /** Earliest time the job may be claimed. */
  scheduledAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  lastError: string | null;
  errorCount: number;
  /** Opaque; carried unchanged across retries. */
  metadata: Record<string, unknown>;
}

export function isValidTransition(from: QuoteJobStatus, to: QuoteJobStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export class InvalidTransitionError extends Error {
  readonly name = "InvalidTransitionError" as const;
  constructor(jobId: string, from: QuoteJobStatus, to: QuoteJobStatus) {
    super(`Invalid quote job transition for ${jobId}: ${from} → ${to}`);
  }
}

function transition(job: QuoteJob, to: QuoteJobStatus): void {
  if (!isValidTransition(job.status, to)) {
    throw new InvalidTransitionError(job.id, job.status, to);
  }
}

export function newQuoteJob(
  callId: string,
  now: Date,
  opts: { maxAttempts?: number; metadata?: Record<string, unknown> } = {},
): QuoteJob {
  return {
    id: randomUUID(),
    callId,
    status: "pending",
    attempts: 0,
    maxAttempts: opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    createdAt: now,
    updatedAt: now,
    scheduledAt: now,
    startedAt: null,
    completedAt: null,
    lastError: null,
    errorCount: 0,
    metadata: opts.metadata ?? {},
  };
}

export function canRetry(job: QuoteJob): boolean {
  return job.attempts < job.maxAttempts && job.status !== "completed";
}

/** Delay before the next attempt, by the number of attempts made so far: 5s, 15s, then 60s. */
export function retryBackoffMs(attempts: number): number {
  switch (attempts) {
    case 1:
      return 5_000;
    case 2:
      return 15_000;
    default:
      return 60_000;
  }
}

export function markCompleted(job: QuoteJob, now: Date): QuoteJob {
  transition(job, "completed");
  return { ...job, status: "completed", completedAt: now, updatedAt: now };
}

/** Record a failed attempt: reschedule with backoff while attempts remain, else finalise. */
export function markFailed(job: QuoteJob, error: string, now: Date): QuoteJob {
  const failed = { ...job, lastError: error, errorCount: job.errorCount + 1, updatedAt: now };
  if (canRetry(job)) {
    transition(job, "pending");
    return {
      ...failed,
      status: "pending",
      scheduledAt: new Date(now.getTime() + retryBackoffMs(job.attempts)),
    };
  }
  transition(job, "failed");
  return { ...failed, status: "failed", completedAt: now };
}
