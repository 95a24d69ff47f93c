import { type Clock, systemClock } from "../clock.js";
import type { Config } from "../config/index.js";
import { toRepositoryError } from "./errors.js";
import { Guard } from "./guards.js";
import { DEFAULT_QUERY_BUDGETS, effectiveTimeout, type QueryBudget, type QueryBudgets, type QueryOptions, withDeadline } from "./timeouts.js";

/** Collaborators every repository receives alongside the db handle. */
export interface StoreContext {
  guard: Guard;
  clock: Clock;
  budgets: QueryBudgets;
}

export function createStoreContext(overrides: Partial<StoreContext> = {}): StoreContext {
  return {
    guard: overrides.guard ?? new Guard(),
    clock: overrides.clock ?? systemClock,
    budgets: overrides.budgets ?? DEFAULT_QUERY_BUDGETS,
  };
}

export function budgetsFromConfig(timeouts: Config["timeouts"]): QueryBudgets {
  return {
    read: timeouts.readMs,
    list: timeouts.listMs,
    write: timeouts.writeMs,
    transaction: timeouts.transactionMs,
  };
}

/**
 * Run one store operation under its budget class and normalize whatever it
 * throws into the repository error taxonomy, tagged with `op`.
 */
export async function runStatement<T>(
  ctx: StoreContext,
  op: string,
  budget: QueryBudget,
  opts: QueryOptions | undefined,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await withDeadline(effectiveTimeout(ctx.budgets[budget], opts), fn, opts?.signal);
  } catch (err) {
    throw toRepositoryError(op, err);
  }
}
