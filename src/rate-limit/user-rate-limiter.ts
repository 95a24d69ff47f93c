import { logger } from "../config/logger.js";
import { RepositoryError } from "../db/errors.js";
import type { QueryOptions } from "../db/timeouts.js";
import type { IUserRateLimitRepository } from "./user-rate-limit-repository.js";
import { WINDOW_TYPES, type WindowType } from "./window.js";

export interface UserRateLimits {
  perMinute: number;
  perHour: number;
  perDay: number;
}

export const DEFAULT_USER_RATE_LIMITS: UserRateLimits = {
  perMinute: 60,
  perHour: 300,
  perDay: 1000,
};

export class RateLimitExceededError extends Error {
  readonly name = "RateLimitExceededError" as const;

  constructor(
    readonly userId: string,
    readonly windowType: WindowType,
    readonly limit: number,
    readonly count: number,
  ) {
    super(`user ${windowType} rate limit exceeded (${count}/${limit})`);
  }
}

export interface WindowStats {
  max: number;
  used: number;
  remaining: number;
}

export type UserRateLimitStats = Record<WindowType, WindowStats>;

/**
 * Per-user admission control over the shared counters. Every process in the
 * fleet sees the same counts, so the limits hold across instances.
 */
export class UserRateLimiter {
  constructor(
    private readonly repo: IUserRateLimitRepository,
    private readonly limits: UserRateLimits = DEFAULT_USER_RATE_LIMITS,
    private readonly failOpen = true,
  ) {}

  /**
   * Count the request against the minute, hour and day windows in that
   * order. Throws RateLimitExceededError for the first window over its limit;
   * later windows are not incremented. When failing open, a retriable store
   * error admits the request; any other error propagates.
   */
  async allow(userId: string, opts?: QueryOptions): Promise<void> {
    for (const windowType of WINDOW_TYPES) {
      let count: number;
      try {
        count = await this.repo.incrementRequestCount(userId, windowType, opts);
      } catch (err) {
        // Only store outages fail open; a bad user id is the caller's error.
        if (!this.failOpen || !(err instanceof RepositoryError && err.retriable)) throw err;
        logger.error("Rate limit store unavailable, allowing request", {
          userId,
          windowType,
          error: err instanceof Error ? err.message : String(err),
        });
        return;
      }

      const limit = this.limitFor(windowType);
      if (count > limit) {
        logger.warn("User rate limit exceeded", { userId, windowType, count, limit });
        throw new RateLimitExceededError(userId, windowType, limit, count);
      }
    }
  }

  async stats(userId: string, opts?: QueryOptions): Promise<UserRateLimitStats> {
    const [minute, hour, day] = await Promise.all(
      WINDOW_TYPES.map((windowType) => this.repo.getRequestCount(userId, windowType, opts)),
    );
    return {
      minute: this.windowStats("minute", minute ?? 0),
      hour: this.windowStats("hour", hour ?? 0),
      day: this.windowStats("day", day ?? 0),
    };
  }

  private windowStats(windowType: WindowType, used: number): WindowStats {
    const max = this.limitFor(windowType);
    return { max, used, remaining: Math.max(0, max - used) };
  }

  private limitFor(windowType: WindowType): number {
    switch (windowType) {
      case "minute":
        return this.limits.perMinute;
      case "hour":
        return this.limits.perHour;
      case "day":
        return this.limits.perDay;
    }
  }
}
