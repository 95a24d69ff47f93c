/**
 * Repository error taxonomy.
 *
 * Every store operation either succeeds or throws one of these. The `op`
 * field names the failing operation ("DrizzleSessionRepository.getByToken");
 * wrapped driver failures keep the original error as `cause`.
 *
 * This layer never retries. `retriable` is a hint for callers.
 */

export type RepositoryErrorCode = "NOT_FOUND" | "VALIDATION_ERROR" | "DATABASE_ERROR" | "CONFLICT" | "TIMEOUT";

export abstract class RepositoryError extends Error {
  abstract readonly code: RepositoryErrorCode;
  abstract readonly retriable: boolean;
  readonly op: string | undefined;

  constructor(message: string, op?: string, cause?: unknown) {
    super(op ? `${op}: ${message}` : message, cause === undefined ? undefined : { cause });
    this.op = op;
  }
}

/** The row does not exist, or exists but is expired/used/outside its grace window. */
export class NotFoundError extends RepositoryError {
  readonly name = "NotFoundError" as const;
  readonly code = "NOT_FOUND" as const;
  readonly retriable = false;
  readonly resource: string;

  constructor(resource: string, op?: string) {
    super(`${resource} not found`, op);
    this.resource = resource;
  }
}

/** A guard rejected the input before the store was touched. */
export class ValidationError extends RepositoryError {
  readonly name = "ValidationError" as const;
  readonly code = "VALIDATION_ERROR" as const;
  readonly retriable = false;
  readonly field: string;

  constructor(field: string, message: string, op?: string) {
    super(message, op);
    this.field = field;
  }
}

/** A uniqueness race or a compare-and-swap that found the row changed underneath it. */
export class ConflictError extends RepositoryError {
  readonly name: string = "ConflictError";
  readonly code = "CONFLICT" as const;
  readonly retriable = false;
}

/** Transient or infrastructure failure of the store. */
export class DatabaseError extends RepositoryError {
  readonly name = "DatabaseError" as const;
  readonly code = "DATABASE_ERROR" as const;
  readonly retriable = true;

  constructor(op: string, cause: unknown) {
    super(`database operation failed: ${describe(cause)}`, op, cause);
  }
}

/** The operation outlived its deadline. */
export class QueryTimeoutError extends RepositoryError {
  readonly name = "QueryTimeoutError" as const;
  readonly code = "TIMEOUT" as const;
  readonly retriable = true;
  readonly timeoutMs: number;

  constructor(timeoutMs: number, op?: string, cause?: unknown) {
    super(`deadline of ${timeoutMs}ms exceeded`, op, cause);
    this.timeoutMs = timeoutMs;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sqlState(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("code" in err && typeof err.code === "string") return err.code;
  if ("cause" in err && err.cause !== err) return sqlState(err.cause);
  return undefined;
}

/** Returns true when `err` is a Postgres unique-constraint violation (SQLSTATE 23505). */
export function isUniqueConstraintViolation(err: unknown): boolean {
  return sqlState(err) === "23505";
}

/**
 * Normalize anything thrown by a store operation into the taxonomy.
 * Taxonomy errors pass through; guard and timeout errors raised without an
 * op name pick up this one.
 */
export function toRepositoryError(op: string, err: unknown): RepositoryError {
  if (err instanceof ValidationError && err.op === undefined) {
    return new ValidationError(err.field, err.message, op);
  }
  if (err instanceof QueryTimeoutError && err.op === undefined) {
    return new QueryTimeoutError(err.timeoutMs, op, err.cause);
  }
  if (err instanceof RepositoryError) return err;
  if (isUniqueConstraintViolation(err)) {
    return new ConflictError(`unique constraint violated: ${describe(err)}`, op, err);
  }
  return new DatabaseError(op, err);
}
