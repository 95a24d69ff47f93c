import type { QueryOptions } from "../db/timeouts.js";
import type { CsrfToken } from "./repository-types.js";

export interface ICsrfTokenRepository {
  create(token: CsrfToken, opts?: QueryOptions): Promise<CsrfToken>;
  /**
   * The session's live unused token, or `token` stored with a `ttlMs` expiry.
   * Concurrent callers for one session all receive the same token.
   */
  getOrCreate(sessionId: string | null, token: string, ttlMs: number, opts?: QueryOptions): Promise<CsrfToken>;
  /** An unused, unexpired token. NotFoundError otherwise. */
  getByToken(token: string, opts?: QueryOptions): Promise<CsrfToken>;
  markUsed(token: string, opts?: QueryOptions): Promise<void>;
  /** Validate and mark used in one statement. A second consume raises NotFoundError. */
  consume(token: string, opts?: QueryOptions): Promise<CsrfToken>;
  delete(token: string, opts?: QueryOptions): Promise<number>;
  deleteBySessionId(sessionId: string, opts?: QueryOptions): Promise<number>;
  deleteExpired(opts?: QueryOptions): Promise<number>;
}
