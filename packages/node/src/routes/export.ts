/**
 * Export routes for auditor verification.
 *
 * GET /api/v1/export  Act, head, verification and every record
 * GET /api/v1/export/records  Records as JSONL, in the ledger file format
 */

import { Hono } from "hono";
import { serializeRecord } from "@lexledger/ledger";
import type { AppEnv } from "../types/api-contract.js";

export function createExportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/export  JSON document
  routes.get("/", async (c) => {
    const service = c.get("service");
    return c.json({ data: await service.exportLedger() });
  });

  // GET /api/v1/export/records  NDJSON stream of all records
  routes.get("/records", async (c) => {
    const service = c.get("service");
    const records = await service.ledger.read();

    const body = records.map((r) => serializeRecord(r) + "\n").join("");

    return c.text(body, 200, {
      "Content-Type": "application/x-ndjson",
    });
  });

  return routes;
}
