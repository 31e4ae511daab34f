/**
 * Tests for verification and statistics routes.
 *
 * GET /api/v1/verify
 * GET /api/v1/statistics
 */

import { describe, it, expect } from "vitest";
import { GENESIS_HASH, InMemoryLedgerStore } from "@lexledger/ledger";
import { createTestApp, jsonRequest, readJson, sampleAmendment, T0 } from "./setup.js";
import type { ErrorBody } from "./setup.js";

interface VerifyBody {
  data: {
    valid: boolean;
    checkedCount: number;
    mode: string;
    firstBadSequence?: number;
    defect?: string;
  };
}

describe("GET /api/v1/verify", () => {
  it("walks the whole chain by default", async () => {
    const { app } = await createTestApp();
    await app.request(jsonRequest("/api/v1/amendments", "POST", sampleAmendment));
    await app.request(jsonRequest("/api/v1/amendments", "POST", sampleAmendment));

    const res = await app.request("/api/v1/verify");
    expect(res.status).toBe(200);

    const body = await readJson<VerifyBody>(res);
    expect(body.data).toEqual({ valid: true, checkedCount: 2, mode: "full" });
  });

  it("checks only new records in incremental mode", async () => {
    const { app } = await createTestApp();
    await app.request(jsonRequest("/api/v1/amendments", "POST", sampleAmendment));
    await app.request(jsonRequest("/api/v1/amendments", "POST", sampleAmendment));
    await app.request("/api/v1/verify");
    await app.request(jsonRequest("/api/v1/amendments", "POST", sampleAmendment));

    const body = await readJson<VerifyBody>(await app.request("/api/v1/verify?mode=incremental"));

    expect(body.data).toEqual({ valid: true, checkedCount: 1, mode: "incremental" });
  });

  it("reports the first defect of a corrupt chain", async () => {
    const store = new InMemoryLedgerStore([
      {
        sequenceNumber: 1,
        payload: "{}",
        timestamp: 1,
        previousHash: GENESIS_HASH,
        recordHash: "a".repeat(64),
      },
    ]);
    const { app } = await createTestApp({ store });

    const body = await readJson<VerifyBody>(await app.request("/api/v1/verify"));

    expect(body.data).toMatchObject({
      valid: false,
      firstBadSequence: 0,
      defect: "sequenceGap",
      checkedCount: 1,
    });
  });

  it("returns 400 for an unknown mode", async () => {
    const { app } = await createTestApp();

    const res = await app.request("/api/v1/verify?mode=partial");
    expect(res.status).toBe(400);

    const body = await readJson<ErrorBody>(res);
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/statistics", () => {
  it("returns zero counts for an empty ledger", async () => {
    const { app } = await createTestApp();

    const body = await readJson<{ data: Record<string, unknown> }>(
      await app.request("/api/v1/statistics"),
    );

    expect(body.data).toEqual({
      count: 0,
      act: { actId: "DU-TEST-1", actTitle: "Test Act" },
      byChangeType: { substantive: 0, editorial: 0 },
      byAuthor: {},
      undecodable: 0,
    });
  });

  it("counts amendments by change type and author", async () => {
    const { app } = await createTestApp();
    await app.request(jsonRequest("/api/v1/amendments", "POST", sampleAmendment));
    await app.request(
      jsonRequest("/api/v1/amendments", "POST", {
        content: "Art. 2.",
        author: "Senat",
        changeType: "editorial",
        timestamp: T0 + 60_000,
      }),
    );

    const body = await readJson<{ data: Record<string, unknown> }>(
      await app.request("/api/v1/statistics"),
    );

    expect(body.data).toMatchObject({
      count: 2,
      firstTimestamp: T0,
      lastTimestamp: T0 + 60_000,
      spanMs: 60_000,
      byChangeType: { substantive: 1, editorial: 1 },
      byAuthor: { Sejm: 1, Senat: 1 },
    });
  });
});
