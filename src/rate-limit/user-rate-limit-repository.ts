import type { QueryOptions } from "../db/timeouts.js";
import type { WindowType } from "./window.js";

/**
 * Fixed-window request counters, one per (user, window type).
 *
 * A burst straddling a window boundary can admit up to twice the nominal
 * limit: the counter resets at the boundary, not a sliding interval later.
 */
export interface IUserRateLimitRepository {
  /** Count after this request. Resets to 1 when the stored window has ended. */
  incrementRequestCount(userId: string, windowType: WindowType, opts?: QueryOptions): Promise<number>;
  /** Current count; an absent or ended window reads as 0. */
  getRequestCount(userId: string, windowType: WindowType, opts?: QueryOptions): Promise<number>;
  /** Delete counters whose window has ended. Returns rows removed. */
  resetExpiredWindows(opts?: QueryOptions): Promise<number>;
}
