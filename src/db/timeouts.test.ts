import { describe, expect, it } from "vitest";
import { QueryTimeoutError } from "./errors.js";
import { effectiveTimeout, withDeadline } from "./timeouts.js";

describe("effectiveTimeout", () => {
  it("uses the class default when the caller sets nothing", () => {
    expect(effectiveTimeout(5_000)).toBe(5_000);
    expect(effectiveTimeout(5_000, {})).toBe(5_000);
  });

  it("lets the caller tighten but never extend the deadline", () => {
    expect(effectiveTimeout(5_000, { timeoutMs: 200 })).toBe(200);
    expect(effectiveTimeout(5_000, { timeoutMs: 60_000 })).toBe(5_000);
    expect(effectiveTimeout(5_000, { timeoutMs: -5 })).toBe(0);
    expect(effectiveTimeout(5_000, { timeoutMs: Number.POSITIVE_INFINITY })).toBe(5_000);
  });
});

describe("withDeadline", () => {
  it("resolves with the operation's value", async () => {
    expect(await withDeadline(1_000, async () => 42)).toBe(42);
  });

  it("rejects with QueryTimeoutError when the operation outlives the deadline", async () => {
    const slow = () => new Promise<string>((resolve) => setTimeout(() => resolve("late"), 200));
    const err = await withDeadline(20, slow).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(QueryTimeoutError);
    expect(err).toMatchObject({ timeoutMs: 20 });
  });

  it("propagates the operation's own failure", async () => {
    await expect(
      withDeadline(1_000, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
  });

  it("rejects immediately for an already aborted signal without running the operation", async () => {
    const controller = new AbortController();
    controller.abort();
    let ran = false;

    await expect(
      withDeadline(
        1_000,
        async () => {
          ran = true;
        },
        controller.signal,
      ),
    ).rejects.toBeInstanceOf(QueryTimeoutError);
    expect(ran).toBe(false);
  });

  it("rejects when the signal aborts mid-flight", async () => {
    const controller = new AbortController();
    const pending = withDeadline(1_000, () => new Promise<never>(() => {}), controller.signal);
    controller.abort(new Error("client went away"));

    const err = await pending.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(QueryTimeoutError);
    expect(err).toMatchObject({ cause: new Error("client went away") });
  });
});
