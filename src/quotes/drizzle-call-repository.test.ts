import type { PGlite } from "@electric-sql/pglite";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createStoreContext } from "../db/context.js";
import { NotFoundError, ValidationError } from "../db/errors.js";
import type { DrizzleDb } from "../db/index.js";
import { FakeClock } from "../test/clock.js";
import { createTestDb, seedCall } from "../test/db.js";
import { DrizzleCallRepository } from "./drizzle-call-repository.js";

describe("DrizzleCallRepository", () => {
  let db: DrizzleDb;
  let pool: PGlite;
  let clock: FakeClock;
  let repo: DrizzleCallRepository;

  beforeEach(async () => {
    ({ db, pool } = await createTestDb());
    clock = new FakeClock("2026-03-02T12:00:00.000Z");
    repo = new DrizzleCallRepository(db, createStoreContext({ clock }));
  });

  afterEach(async () => {
    await pool.close();
  });

  it("reads a call with its transcript", async () => {
    const id = await seedCall(db, { transcript: "Two windows, one door." });
    const call = await repo.getById(id);

    expect(call.providerCallId).toBe(`prov-${id}`);
    expect(call.transcript).toBe("Two windows, one door.");
    expect(call.extractedData).toBeNull();
    expect(call.quoteSummary).toBeNull();
  });

  it("maps a missing transcript to null", async () => {
    const id = await seedCall(db, { transcript: null });
    expect((await repo.getById(id)).transcript).toBeNull();
  });

  it("raises NotFoundError for an unknown call", async () => {
    await expect(repo.getById("00000000-0000-4000-8000-000000000000")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("saveQuote stores the summary and bumps updated_at", async () => {
    const id = await seedCall(db);
    clock.advance(30_000);
    await repo.saveQuote(id, "Estimate: 2 rooms, 40 sqm");

    const call = await repo.getById(id);
    expect(call.quoteSummary).toBe("Estimate: 2 rooms, 40 sqm");
    expect(call.updatedAt.toISOString()).toBe("2026-03-02T12:00:30.000Z");
  });

  it("saveQuote raises NotFoundError for an unknown call", async () => {
    await expect(repo.saveQuote("00000000-0000-4000-8000-000000000000", "x")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("saveQuote rejects an empty summary", async () => {
    const id = await seedCall(db);
    await expect(repo.saveQuote(id, "")).rejects.toBeInstanceOf(ValidationError);
  });
});
