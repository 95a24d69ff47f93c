import type { QueryOptions } from "../db/timeouts.js";
import type { IdempotencyRecord, JsonValue } from "./repository-types.js";

export interface IIdempotencyRepository {
  /** The unexpired record for `key`, or null. */
  get(key: string, opts?: QueryOptions): Promise<IdempotencyRecord | null>;
  /** Upsert. Concurrent saves race and the last commit wins; no single-flight. */
  save(key: string, response: JsonValue, expiresAt: Date, opts?: QueryOptions): Promise<void>;
  cleanupExpired(opts?: QueryOptions): Promise<number>;

  /**
   * Claim `key` for `leaseMs`. Resolves to the owner token the holder passes
   * to complete/releaseClaim, or null while someone else holds a live claim.
   */
  claim(key: string, leaseMs: number, opts?: QueryOptions): Promise<string | null>;
  /**
   * Store the response and drop the claim in one transaction. ConflictError,
   * and nothing stored, when `owner` no longer holds the claim.
   */
  complete(key: string, owner: string, response: JsonValue, expiresAt: Date, opts?: QueryOptions): Promise<void>;
  /** Drop the claim if `owner` still holds it. Returns whether it did. */
  releaseClaim(key: string, owner: string, opts?: QueryOptions): Promise<boolean>;
  cleanupExpiredClaims(opts?: QueryOptions): Promise<number>;
}
