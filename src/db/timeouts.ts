import { QueryTimeoutError } from "./errors.js";

/** Operation classes, each with its own default deadline. */
export type QueryBudget = "read" | "list" | "write" | "transaction";

export type QueryBudgets = Record<QueryBudget, number>;

export const DEFAULT_QUERY_BUDGETS: QueryBudgets = {
  read: 5_000,
  list: 10_000,
  write: 10_000,
  transaction: 30_000,
};

/** Per-call options accepted by every store operation. */
export interface QueryOptions {
  /** Caller deadline in ms. Only ever tightens the class default. */
  timeoutMs?: number;
  /** Aborting rejects the pending operation with QueryTimeoutError. */
  signal?: AbortSignal;
}

/** The deadline an operation runs under: the class default or a tighter caller value, never longer. */
export function effectiveTimeout(defaultMs: number, opts?: QueryOptions): number {
  const requested = opts?.timeoutMs;
  if (requested === undefined || !Number.isFinite(requested)) return defaultMs;
  return Math.min(defaultMs, Math.max(0, requested));
}

/**
 * Run `fn` under a deadline. The underlying statement is not cancelled here;
 * the pool's statement_timeout bounds it server-side.
 */
export async function withDeadline<T>(timeoutMs: number, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  if (signal?.aborted) {
    throw new QueryTimeoutError(timeoutMs, undefined, signal.reason);
  }

  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new QueryTimeoutError(timeoutMs)), timeoutMs);
    if (signal) {
      onAbort = () => reject(new QueryTimeoutError(timeoutMs, undefined, signal.reason));
      signal.addEventListener("abort", onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([fn(), expiry]);
  } finally {
    clearTimeout(timer);
    if (signal && onAbort) signal.removeEventListener("abort", onAbort);
  }
}
