import crypto from "node:crypto";

/** 256 bits of randomness, hex-encoded. Used for session and CSRF tokens. */
export function generateToken(): string {
  return crypto.randomBytes(32).toString("hex");
}
