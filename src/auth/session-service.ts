import type { Clock } from "../clock.js";
import { logger } from "../config/logger.js";
import { ConflictError, NotFoundError } from "../db/errors.js";
import type { ICsrfTokenRepository } from "./csrf-token-repository.js";
import type { CsrfToken, Session } from "./repository-types.js";
import { newSession, shouldRotate } from "./session.js";
import type { ISessionRepository } from "./session-repository.js";
import { generateToken } from "./tokens.js";

export interface SessionServiceOptions {
  ttlMs: number;
  /** Idle time after which the next authenticated request rotates the token. */
  rotateAfterMs: number;
  /** Lifetime of CSRF tokens issued for a session. */
  csrfTtlMs: number;
}

export interface SessionMeta {
  ipAddress?: string | null;
  userAgent?: string | null;
}

export interface AuthenticatedSession {
  session: Session;
  /** True when this request rotated the token; the client must switch to `session.token`. */
  rotated: boolean;
}

export class SessionService {
  constructor(
    private readonly sessions: ISessionRepository,
    private readonly csrfTokens: ICsrfTokenRepository,
    private readonly clock: Clock,
    private readonly options: SessionServiceOptions,
    private readonly newToken: () => string = generateToken,
  ) {}

  async createSession(userId: string, meta: SessionMeta = {}): Promise<Session> {
    const session = newSession({
      userId,
      token: this.newToken(),
      ttlMs: this.options.ttlMs,
      now: this.clock.now(),
      ipAddress: meta.ipAddress,
      userAgent: meta.userAgent,
    });
    const created = await this.sessions.create(session);
    logger.info("Session created", { sessionId: created.id, userId });
    return created;
  }

  /**
   * Resolve a bearer token to its session. Idle sessions get a fresh token.
   *
   * Several requests carrying the same token can race to rotate; the loser
   * sees ConflictError and re-reads, finding its token as the previous one
   * inside the grace window.
   */
  async authenticate(token: string): Promise<AuthenticatedSession> {
    const session = await this.sessions.getByToken(token);

    // Superseded token still inside its grace window; a sibling already rotated.
    if (session.token !== token) return { session, rotated: false };

    const now = this.clock.now();
    if (!shouldRotate(session, now, this.options.rotateAfterMs)) {
      await this.sessions.touch(session.id);
      return { session: { ...session, lastActiveAt: now }, rotated: false };
    }

    try {
      const rotated = await this.sessions.rotate(session.id, token, this.newToken());
      logger.info("Session token rotated", { sessionId: rotated.id, userId: rotated.userId });
      return { session: rotated, rotated: true };
    } catch (err) {
      if (!(err instanceof ConflictError)) throw err;
      logger.debug("Concurrent rotation detected", { sessionId: session.id });
      return { session: await this.sessions.getByToken(token), rotated: false };
    }
  }

  /** The session's live CSRF token, issuing one when it has none. */
  csrfToken(session: Session): Promise<CsrfToken> {
    return this.csrfTokens.getOrCreate(session.id, this.newToken(), this.options.csrfTtlMs);
  }

  /**
   * Close the grace window, drop CSRF tokens, then delete the session. The
   * delete goes by id, so a sibling rotating the token meanwhile does not
   * keep the session alive.
   */
  async logout(token: string): Promise<void> {
    const session = await this.sessions.getByToken(token);
    await this.sessions.invalidatePreviousToken(session.id);
    await this.csrfTokens.deleteBySessionId(session.id);
    if (!(await this.sessions.deleteById(session.id))) {
      throw new NotFoundError("session", "SessionService.logout");
    }
    logger.info("Session logged out", { sessionId: session.id, userId: session.userId });
  }

  async revokeAll(userId: string): Promise<number> {
    const count = await this.sessions.deleteByUserId(userId);
    logger.info("Sessions revoked", { userId, count });
    return count;
  }
}
