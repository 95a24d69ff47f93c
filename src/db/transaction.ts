import { logger } from "../config/logger.js";
import { runStatement, type StoreContext } from "./context.js";
import { QueryTimeoutError } from "./errors.js";
import type { DrizzleDb, DrizzleTx } from "./index.js";
import { effectiveTimeout, type QueryOptions } from "./timeouts.js";

/**
 * Run `fn` in one short-lived transaction under the transaction budget.
 *
 * Drizzle rolls back whenever the callback throws. A callback that finishes
 * after the deadline is rolled back too, since its caller has already seen
 * a QueryTimeoutError.
 */
export async function runInTransaction<T>(
  db: DrizzleDb,
  ctx: StoreContext,
  op: string,
  fn: (tx: DrizzleTx) => Promise<T>,
  opts?: QueryOptions,
): Promise<T> {
  const timeoutMs = effectiveTimeout(ctx.budgets.transaction, opts);
  const startedAt = Date.now();

  return runStatement(ctx, op, "transaction", opts, () =>
    db.transaction(async (tx) => {
      try {
        const result = await fn(tx);
        if (Date.now() - startedAt > timeoutMs) {
          throw new QueryTimeoutError(timeoutMs);
        }
        return result;
      } catch (err) {
        logger.debug("Transaction rolling back", { op, error: err instanceof Error ? err.message : String(err) });
        throw err;
      }
    }),
  );
}
