export * from "./calls.js";
export * from "./csrf-tokens.js";
export * from "./idempotency-keys.js";
export * from "./quote-jobs.js";
export * from "./sessions.js";
export * from "./user-rate-limits.js";
export * from "./users.js";
