/** A bearer-token session. Dates are absolute instants; nullable columns are null, not undefined. */
export interface Session {
  id: string;
  userId: string;
  token: string;
  expiresAt: Date;
  createdAt: Date;
  lastActiveAt: Date | null;
  ipAddress: string | null;
  userAgent: string | null;
  /** The token this one replaced. Accepted until 30s after `rotatedAt`. */
  previousToken: string | null;
  rotatedAt: Date | null;
}

export interface CsrfToken {
  id: string;
  token: string;
  sessionId: string | null;
  expiresAt: Date;
  createdAt: Date;
  used: boolean;
}
