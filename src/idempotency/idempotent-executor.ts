import type { Clock } from "../clock.js";
import { logger } from "../config/logger.js";
import { ConflictError } from "../db/errors.js";
import type { IIdempotencyRepository } from "./idempotency-repository.js";
import type { JsonValue } from "./repository-types.js";

/** Another caller holds a live claim on the key and has not finished yet. */
export class IdempotencyInFlightError extends ConflictError {
  readonly name = "IdempotencyInFlightError";
  readonly key: string;

  constructor(key: string) {
    super(`request ${key} is already in flight`, "IdempotentExecutor.run");
    this.key = key;
  }
}

export interface IdempotentExecutorOptions {
  /** How long a stored response is replayed. */
  ttlMs: number;
  /** How long a claim blocks other callers before it may be taken over. */
  claimLeaseMs: number;
}

export interface IdempotentOutcome {
  response: JsonValue;
  /** True when the response came from the cache and `fn` did not run. */
  replayed: boolean;
}

/**
 * Single-flight execution of a side effect per key.
 *
 * The claim row is the only thing that grants the right to run `fn`: the
 * cache read before it is an optimisation, the one after it closes the gap
 * where a previous owner completed between our read and our claim. Completion
 * and release match on the owner token, so a caller whose lease lapsed cannot
 * touch the claim of whoever took the key over.
 */
export class IdempotentExecutor {
  constructor(
    private readonly repo: IIdempotencyRepository,
    private readonly clock: Clock,
    private readonly options: IdempotentExecutorOptions,
  ) {}

  async run(key: string, fn: () => Promise<JsonValue>, overrides: Partial<IdempotentExecutorOptions> = {}): Promise<IdempotentOutcome> {
    const ttlMs = overrides.ttlMs ?? this.options.ttlMs;
    const leaseMs = overrides.claimLeaseMs ?? this.options.claimLeaseMs;

    const cached = await this.repo.get(key);
    if (cached) return { response: cached.response, replayed: true };

    const owner = await this.repo.claim(key, leaseMs);
    if (owner === null) throw new IdempotencyInFlightError(key);

    let response: JsonValue;
    try {
      const completed = await this.repo.get(key);
      if (completed) {
        await this.release(key, owner);
        return { response: completed.response, replayed: true };
      }
      response = await fn();
    } catch (err) {
      await this.release(key, owner);
      throw err;
    }

    // The side effect has happened. If recording it fails the claim is left
    // to lapse, so no other caller runs it again within the lease.
    try {
      await this.repo.complete(key, owner, response, new Date(this.clock.now().getTime() + ttlMs));
    } catch (err) {
      logger.error("Idempotent response not recorded", { key, error: err });
      throw err;
    }
    return { response, replayed: false };
  }

  private async release(key: string, owner: string): Promise<void> {
    try {
      if (!(await this.repo.releaseClaim(key, owner))) {
        logger.warn("Idempotency claim was taken over before release", { key });
      }
    } catch (err) {
      logger.warn("Failed to release idempotency claim", {
        key,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
