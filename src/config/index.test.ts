import { describe, expect, it } from "vitest";
import { loadConfig } from "./index.js";

describe("loadConfig", () => {
  it("uses defaults when no env vars are set", () => {
    const cfg = loadConfig({});
    expect(cfg.nodeEnv).toBe("development");
    expect(cfg.logLevel).toBe("info");
    expect(cfg.sentryDsn).toBeUndefined();
    expect(cfg.timeouts).toEqual({ readMs: 5_000, listMs: 10_000, writeMs: 10_000, transactionMs: 30_000 });
    expect(cfg.rateLimit).toEqual({ perMinute: 60, perHour: 300, perDay: 1000, failOpen: true });
    expect(cfg.quoteJobs).toEqual({
      pollIntervalMs: 5_000,
      batchSize: 10,
      stuckJobTimeoutMs: 300_000,
      maxAttempts: 3,
    });
    expect(cfg.session.rotateAfterMs).toBe(900_000);
  });

  it("coerces numeric strings", () => {
    const cfg = loadConfig({
      DB_READ_TIMEOUT_MS: "250",
      RATE_LIMIT_PER_MINUTE: "5",
      QUOTE_JOB_STUCK_TIMEOUT_MS: "600000",
    });
    expect(cfg.timeouts.readMs).toBe(250);
    expect(cfg.rateLimit.perMinute).toBe(5);
    expect(cfg.quoteJobs.stuckJobTimeoutMs).toBe(600_000);
  });

  it("parses the fail-open flag", () => {
    expect(loadConfig({ RATE_LIMIT_FAIL_OPEN: "false" }).rateLimit.failOpen).toBe(false);
    expect(loadConfig({ RATE_LIMIT_FAIL_OPEN: "true" }).rateLimit.failOpen).toBe(true);
  });

  it("treats an empty SENTRY_DSN as unset", () => {
    expect(loadConfig({ SENTRY_DSN: "" }).sentryDsn).toBeUndefined();
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });

  it("rejects a non-positive timeout", () => {
    expect(() => loadConfig({ DB_WRITE_TIMEOUT_MS: "0" })).toThrow();
  });
});
