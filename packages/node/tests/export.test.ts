/**
 * Tests for export routes.
 *
 * GET /api/v1/export  JSON document
 * GET /api/v1/export/records  JSONL record stream
 */

import { describe, it, expect } from "vitest";
import { parseRecordLine } from "@lexledger/ledger";
import type { AmendmentRecord } from "@lexledger/ledger";
import { createTestApp, jsonRequest, readJson, sampleAmendment } from "./setup.js";

interface ExportBody {
  data: {
    act: { actId: string };
    exportedAt: string;
    head: { sequenceNumber: number; recordHash: string } | null;
    verification: { valid: boolean; checkedCount: number };
    records: AmendmentRecord[];
  };
}

describe("GET /api/v1/export", () => {
  it("returns the act, head, verification and records", async () => {
    const { app } = await createTestApp();
    await app.request(jsonRequest("/api/v1/amendments", "POST", sampleAmendment));
    await app.request(jsonRequest("/api/v1/amendments", "POST", sampleAmendment));

    const res = await app.request("/api/v1/export");
    expect(res.status).toBe(200);

    const { data } = await readJson<ExportBody>(res);
    expect(data.act.actId).toBe("DU-TEST-1");
    expect(data.exportedAt).toBe("2023-11-14T22:13:20.000Z");
    expect(data.verification).toMatchObject({ valid: true, checkedCount: 2 });
    expect(data.records.map((r) => r.sequenceNumber)).toEqual([0, 1]);
    expect(data.head).toEqual({
      sequenceNumber: 1,
      recordHash: data.records[1]?.recordHash,
      timestamp: data.records[1]?.timestamp,
    });
  });

  it("exports a null head for an empty ledger", async () => {
    const { app } = await createTestApp();

    const { data } = await readJson<ExportBody>(await app.request("/api/v1/export"));
    expect(data.head).toBeNull();
    expect(data.records).toEqual([]);
  });
});

describe("GET /api/v1/export/records", () => {
  it("streams one JSON record per line", async () => {
    const { app } = await createTestApp();
    await app.request(jsonRequest("/api/v1/amendments", "POST", sampleAmendment));
    await app.request(jsonRequest("/api/v1/amendments", "POST", sampleAmendment));

    const res = await app.request("/api/v1/export/records");
    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toContain("application/x-ndjson");

    const text = await res.text();
    expect(text.endsWith("\n")).toBe(true);

    const lines = text.trimEnd().split("\n");
    expect(lines).toHaveLength(2);

    const { data } = await readJson<ExportBody>(await app.request("/api/v1/export"));
    expect(lines.map((line) => parseRecordLine(line))).toEqual(data.records);
  });

  it("returns an empty body for an empty ledger", async () => {
    const { app } = await createTestApp();

    const res = await app.request("/api/v1/export/records");
    expect(await res.text()).toBe("");
  });
});
