import { randomUUID } from "node:crypto";
import type { Session } from "./repository-types.js";

/** How long a superseded token keeps authenticating after rotation. */
export const TOKEN_GRACE_PERIOD_MS = 30_000;

export interface NewSessionInput {
  userId: string;
  token: string;
  ttlMs: number;
  now: Date;
  ipAddress?: string | null;
  userAgent?: string | null;
}

export function newSession(input: NewSessionInput): Session {
  return {
    id: randomUUID(),
    userId: input.userId,
    token: input.token,
    expiresAt: new Date(input.now.getTime() + input.ttlMs),
    createdAt: input.now,
    lastActiveAt: input.now,
    ipAddress: input.ipAddress ?? null,
    userAgent: input.userAgent ?? null,
    previousToken: null,
    rotatedAt: null,
  };
}

/** True once the session has been idle longer than `rotateAfterMs`. */
export function shouldRotate(session: Session, now: Date, rotateAfterMs: number): boolean {
  const lastActive = session.lastActiveAt ?? session.createdAt;
  return now.getTime() - lastActive.getTime() > rotateAfterMs;
}
