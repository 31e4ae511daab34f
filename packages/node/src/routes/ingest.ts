/**
 * POST /api/v1/ingest  Append the amendments of an XML document.
 *
 * 201 when every amendment was appended; 200 with `failed` set when an
 * append stopped the run part-way.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { IngestSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createIngestRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(IngestSchema), async (c) => {
    const service = c.get("service");
    const report = await service.ingest(c.get("validatedBody").xml);

    return c.json({ data: report }, report.failed === undefined ? 201 : 200);
  });

  return routes;
}
