import { describe, expect, it } from "vitest";
import { generateToken } from "./tokens.js";

describe("generateToken", () => {
  it("returns 64 lowercase hex characters", () => {
    expect(generateToken()).toMatch(/^[0-9a-f]{64}$/);
  });

  it("does not repeat", () => {
    const tokens = new Set(Array.from({ length: 50 }, () => generateToken()));
    expect(tokens.size).toBe(50);
  });
});
