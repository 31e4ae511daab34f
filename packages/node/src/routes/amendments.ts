/**
 * Amendment routes.
 *
 * POST /api/v1/amendments  Record an amendment
 * GET  /api/v1/amendments  List amendments (cursor pagination)
 * GET  /api/v1/amendments/:sequence  Get one amendment
 * GET  /api/v1/amendments/:sequence/diff  Line diff against the previous content
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ListAmendmentsQuerySchema,
  RecordAmendmentSchema,
  SequenceParamSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";

export function createAmendmentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/amendments  Record
  routes.post("/", validateBody(RecordAmendmentSchema), async (c) => {
    const service = c.get("service");
    const view = await service.recordAmendment(c.get("validatedBody"));
    return c.json({ data: view }, 201);
  });

  // GET /api/v1/amendments  List
  routes.get("/", async (c) => {
    const service = c.get("service");
    const query = ListAmendmentsQuerySchema.parse(c.req.query());

    const views = await service.listAmendments({
      author: query.author,
      changeType: query.changeType,
      actId: query.actId,
    });

    const result = paginate(
      views,
      { cursor: query.cursor, limit: query.limit },
      (v) => v.sequenceNumber,
      "sequenceNumber",
    );

    return c.json(result);
  });

  // GET /api/v1/amendments/:sequence
  routes.get("/:sequence", async (c) => {
    const service = c.get("service");
    const sequence = SequenceParamSchema.parse(c.req.param("sequence"));

    const view = await service.getAmendment(sequence);
    if (view === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Amendment ${sequence} not found`),
        404,
      );
    }

    return c.json({ data: view });
  });

  // GET /api/v1/amendments/:sequence/diff
  routes.get("/:sequence/diff", async (c) => {
    const service = c.get("service");
    const sequence = SequenceParamSchema.parse(c.req.param("sequence"));

    const diff = await service.diff(sequence);
    if (diff === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Amendment ${sequence} not found`),
        404,
      );
    }

    return c.json({ data: diff });
  });

  return routes;
}
