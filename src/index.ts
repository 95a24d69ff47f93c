import { DrizzleCsrfTokenRepository } from "./auth/drizzle-csrf-token-repository.js";
import { DrizzleSessionRepository } from "./auth/drizzle-session-repository.js";
import { SessionService } from "./auth/session-service.js";
import type { Clock } from "./clock.js";
import { type Config, config as defaultConfig } from "./config/index.js";
import { logger } from "./config/logger.js";
import { budgetsFromConfig, createStoreContext, type StoreContext } from "./db/context.js";
import type { DrizzleDb } from "./db/index.js";
import { DrizzleIdempotencyRepository } from "./idempotency/drizzle-idempotency-repository.js";
import { IdempotentExecutor } from "./idempotency/idempotent-executor.js";
import { runCoordinationSweep } from "./maintenance/coordination-sweep.js";
import { captureError, initSentry } from "./observability/sentry.js";
import type { ICallRepository } from "./quotes/call-repository.js";
import { DrizzleCallRepository } from "./quotes/drizzle-call-repository.js";
import { DrizzleQuoteJobRepository } from "./quotes/drizzle-quote-job-repository.js";
import { type QuoteGenerator, QuoteJobProcessor } from "./quotes/quote-job-processor.js";
import { DrizzleUserRateLimitRepository } from "./rate-limit/drizzle-user-rate-limit-repository.js";
import { UserRateLimiter } from "./rate-limit/user-rate-limiter.js";

export interface CoordinationCoreOptions {
  config?: Config;
  clock?: Clock;
}

export interface CoordinationCore {
  config: Config;
  ctx: StoreContext;
  repositories: {
    sessions: DrizzleSessionRepository;
    csrfTokens: DrizzleCsrfTokenRepository;
    idempotency: DrizzleIdempotencyRepository;
    rateLimits: DrizzleUserRateLimitRepository;
    quoteJobs: DrizzleQuoteJobRepository;
    calls: DrizzleCallRepository;
  };
  sessions: SessionService;
  idempotency: IdempotentExecutor;
  rateLimiter: UserRateLimiter;
}

/**
 * Wire every repository and service over one database handle. Build the
 * handle from the process-wide pool (createPool + createDb) so all stores
 * share its connections.
 */
export function createCoordinationCore(db: DrizzleDb, options: CoordinationCoreOptions = {}): CoordinationCore {
  const config = options.config ?? defaultConfig;
  initSentry(config.sentryDsn, config.nodeEnv);

  const ctx = createStoreContext({ clock: options.clock, budgets: budgetsFromConfig(config.timeouts) });
  const repositories = {
    sessions: new DrizzleSessionRepository(db, ctx),
    csrfTokens: new DrizzleCsrfTokenRepository(db, ctx),
    idempotency: new DrizzleIdempotencyRepository(db, ctx),
    rateLimits: new DrizzleUserRateLimitRepository(db, ctx),
    quoteJobs: new DrizzleQuoteJobRepository(db, ctx),
    calls: new DrizzleCallRepository(db, ctx),
  };

  return {
    config,
    ctx,
    repositories,
    sessions: new SessionService(repositories.sessions, repositories.csrfTokens, ctx.clock, {
      ...config.session,
      csrfTtlMs: config.csrf.ttlMs,
    }),
    idempotency: new IdempotentExecutor(repositories.idempotency, ctx.clock, config.idempotency),
    rateLimiter: new UserRateLimiter(repositories.rateLimits, config.rateLimit, config.rateLimit.failOpen),
  };
}

export function createQuoteJobProcessor(
  core: CoordinationCore,
  quoteGenerator: QuoteGenerator,
  calls: ICallRepository = core.repositories.calls,
): QuoteJobProcessor {
  return new QuoteJobProcessor(core.repositories.quoteJobs, calls, quoteGenerator, core.ctx.clock, core.config.quoteJobs);
}

export interface BackgroundWorkOptions {
  quoteGenerator: QuoteGenerator;
  /** Call store to read transcripts from and write quotes to (default: the core's calls table). */
  calls?: ICallRepository;
}

export interface BackgroundWork {
  processor: QuoteJobProcessor;
  /** Clear the timers and wait for a tick that is still running. */
  stop(): Promise<void>;
}

/**
 * Start the quote job poller and the coordination sweep. Jobs left in
 * processing by a previous process are recovered before the first poll.
 * A tick that is still running when the next one is due is skipped.
 */
export async function startBackgroundWork(core: CoordinationCore, options: BackgroundWorkOptions): Promise<BackgroundWork> {
  const processor = createQuoteJobProcessor(core, options.quoteGenerator, options.calls);

  const recovered = await processor.recoverStuckJobs();
  if (recovered > 0) logger.info("Recovered stuck quote jobs at startup", { recovered });

  let polling: Promise<void> | null = null;
  let sweeping: Promise<void> | null = null;

  const poller = setInterval(() => {
    if (polling) return;
    polling = processor
      .processBatch()
      .then((result) => {
        if (result.claimed > 0) logger.info("Quote job batch processed", { ...result });
      })
      .catch((err) => {
        logger.error("Quote job poll failed", { error: err });
        captureError(err, { source: "quote-job-processor" });
      })
      .finally(() => {
        polling = null;
      });
  }, core.config.quoteJobs.pollIntervalMs);

  const sweeper = setInterval(() => {
    if (sweeping) return;
    sweeping = runCoordinationSweep({
      idempotency: core.repositories.idempotency,
      csrfTokens: core.repositories.csrfTokens,
      sessions: core.repositories.sessions,
      rateLimits: core.repositories.rateLimits,
      quoteJobs: processor,
    })
      .then(() => undefined)
      .finally(() => {
        sweeping = null;
      });
  }, core.config.maintenance.sweepIntervalMs);

  logger.info("Background work started", {
    pollIntervalMs: core.config.quoteJobs.pollIntervalMs,
    sweepIntervalMs: core.config.maintenance.sweepIntervalMs,
  });

  return {
    processor,
    async stop() {
      clearInterval(poller);
      clearInterval(sweeper);
      await Promise.all([polling, sweeping]);
      logger.info("Background work stopped");
    },
  };
}

export type { AuthenticatedSession, SessionMeta, SessionServiceOptions } from "./auth/session-service.js";
export type { CsrfToken, Session } from "./auth/repository-types.js";
export { SessionService } from "./auth/session-service.js";
export type { Clock } from "./clock.js";
export { systemClock } from "./clock.js";
export type { Config } from "./config/index.js";
export { loadConfig } from "./config/index.js";
export type { StoreContext } from "./db/context.js";
export { createStoreContext } from "./db/context.js";
export {
  ConflictError,
  DatabaseError,
  NotFoundError,
  QueryTimeoutError,
  RepositoryError,
  ValidationError,
} from "./db/errors.js";
export type { DrizzleDb } from "./db/index.js";
export { createDb, createPool } from "./db/index.js";
export { runMigrations } from "./db/migrate.js";
export type { QueryOptions } from "./db/timeouts.js";
export type { IdempotentOutcome } from "./idempotency/idempotent-executor.js";
export { IdempotencyInFlightError, IdempotentExecutor } from "./idempotency/idempotent-executor.js";
export type { JsonValue } from "./idempotency/repository-types.js";
export type { CoordinationSweepResult } from "./maintenance/coordination-sweep.js";
export { runCoordinationSweep } from "./maintenance/coordination-sweep.js";
export type { BatchResult, QuoteGenerator } from "./quotes/quote-job-processor.js";
export { QuoteJobProcessor } from "./quotes/quote-job-processor.js";
export type { QuoteJob, QuoteJobStatus } from "./quotes/quote-job.js";
export type { Call } from "./quotes/repository-types.js";
export type { UserRateLimitStats } from "./rate-limit/user-rate-limiter.js";
export { RateLimitExceededError, UserRateLimiter } from "./rate-limit/user-rate-limiter.js";
