/**
 * Verification routes.
 *
 * GET /api/v1/verify?mode=full|incremental  Walk the hash chain
 * GET /api/v1/statistics  Chain and amendment statistics
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { VerifyQuerySchema } from "../types/dto.js";

export function createVerifyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/verify
  routes.get("/verify", async (c) => {
    const service = c.get("service");
    const { mode } = VerifyQuerySchema.parse(c.req.query());

    const result = await service.verify(mode);
    return c.json({ data: result });
  });

  // GET /api/v1/statistics
  routes.get("/statistics", async (c) => {
    const service = c.get("service");
    return c.json({ data: await service.statistics() });
  });

  return routes;
}
