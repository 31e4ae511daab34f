/**
 * GET /api/v1/search?q=&limit=  Case-insensitive search over
 * amendment content and summaries.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SearchQuerySchema } from "../types/dto.js";

export function createSearchRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const service = c.get("service");
    const { q, limit } = SearchQuerySchema.parse(c.req.query());

    const matches = await service.search(q, limit);
    return c.json({ data: matches, query: q });
  });

  return routes;
}
