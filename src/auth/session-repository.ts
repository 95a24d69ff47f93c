import type { QueryOptions } from "../db/timeouts.js";
import type { Session } from "./repository-types.js";

export interface ISessionRepository {
  create(session: Session, opts?: QueryOptions): Promise<Session>;
  /**
   * The unexpired session whose current token is `token`, or whose previous
   * token is `token` and was rotated less than 30s ago. NotFoundError otherwise.
   */
  getByToken(token: string, opts?: QueryOptions): Promise<Session>;
  /** Overwrite the mutable columns of an existing session. NotFoundError if it is gone. */
  update(session: Session, opts?: QueryOptions): Promise<void>;
  /**
   * Compare-and-swap rotation: succeeds only while `presentedToken` is still
   * the current token. A lost race raises ConflictError.
   */
  rotate(sessionId: string, presentedToken: string, newToken: string, opts?: QueryOptions): Promise<Session>;
  /** Null out previous tokens whose grace window has elapsed. Returns rows changed. */
  clearExpiredPreviousTokens(opts?: QueryOptions): Promise<number>;
  /** Close the grace window now. A cleared token never validates again. */
  invalidatePreviousToken(sessionId: string, opts?: QueryOptions): Promise<void>;
  touch(sessionId: string, opts?: QueryOptions): Promise<void>;
  delete(token: string, opts?: QueryOptions): Promise<boolean>;
  /** Delete by id, whatever the session's current token. False when no row matched. */
  deleteById(sessionId: string, opts?: QueryOptions): Promise<boolean>;
  deleteExpired(opts?: QueryOptions): Promise<number>;
  deleteByUserId(userId: string, opts?: QueryOptions): Promise<number>;
}
