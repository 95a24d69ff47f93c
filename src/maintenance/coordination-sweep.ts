import type { ICsrfTokenRepository } from "../auth/csrf-token-repository.js";
import type { ISessionRepository } from "../auth/session-repository.js";
import { logger } from "../config/logger.js";
import type { IIdempotencyRepository } from "../idempotency/idempotency-repository.js";
import { captureError } from "../observability/sentry.js";
import type { IUserRateLimitRepository } from "../rate-limit/user-rate-limit-repository.js";

export interface CoordinationSweepDeps {
  idempotency: IIdempotencyRepository;
  csrfTokens: ICsrfTokenRepository;
  sessions: ISessionRepository;
  rateLimits: IUserRateLimitRepository;
  /** Omitted when this process does not run the quote job poller. */
  quoteJobs?: { recoverStuckJobs(): Promise<number> };
}

export const SWEEP_STEPS = [
  "idempotencyRecords",
  "idempotencyClaims",
  "csrfTokens",
  "sessions",
  "sessionGraceWindows",
  "rateLimitWindows",
  "stuckQuoteJobs",
] as const;

export type SweepStep = (typeof SWEEP_STEPS)[number];

export interface SweepError {
  step: SweepStep;
  message: string;
}

export interface CoordinationSweepResult {
  /** Rows removed, reset or recovered per step. Steps that failed or did not run are absent. */
  counts: Partial<Record<SweepStep, number>>;
  errors: SweepError[];
}

/**
 * Purge expired coordination state and recover abandoned quote jobs.
 * Called on a timer. Steps run in order and independently: one failing
 * step is recorded and the rest still run.
 */
export async function runCoordinationSweep(deps: CoordinationSweepDeps): Promise<CoordinationSweepResult> {
  const steps: [SweepStep, () => Promise<number>][] = [
    ["idempotencyRecords", () => deps.idempotency.cleanupExpired()],
    ["idempotencyClaims", () => deps.idempotency.cleanupExpiredClaims()],
    ["csrfTokens", () => deps.csrfTokens.deleteExpired()],
    ["sessions", () => deps.sessions.deleteExpired()],
    ["sessionGraceWindows", () => deps.sessions.clearExpiredPreviousTokens()],
    ["rateLimitWindows", () => deps.rateLimits.resetExpiredWindows()],
  ];
  const { quoteJobs } = deps;
  if (quoteJobs) steps.push(["stuckQuoteJobs", () => quoteJobs.recoverStuckJobs()]);

  const result: CoordinationSweepResult = { counts: {}, errors: [] };
  for (const [step, run] of steps) {
    try {
      result.counts[step] = await run();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      result.errors.push({ step, message });
      logger.error("Coordination sweep step failed", { step, error: err });
      captureError(err, { source: "coordination-sweep", extra: { step } });
    }
  }

  if (result.errors.length === 0) {
    logger.debug("Coordination sweep complete", { counts: result.counts });
  } else {
    logger.warn("Coordination sweep finished with errors", { counts: result.counts, failed: result.errors.length });
  }
  return result;
}
