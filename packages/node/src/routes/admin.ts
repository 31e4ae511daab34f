/**
 * Administrative routes.
 *
 * POST /api/v1/admin/reset  Discard the whole chain (audited)
 * GET  /api/v1/audit  Audit log, newest first
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AuditQuerySchema, ResetSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/admin/reset
  routes.post("/admin/reset", validateBody(ResetSchema), async (c) => {
    const service = c.get("service");
    const receipt = await service.reset(c.get("validatedBody"));
    return c.json({ data: receipt });
  });

  // GET /api/v1/audit
  routes.get("/audit", (c) => {
    const service = c.get("service");
    const query = AuditQuerySchema.parse(c.req.query());
    return c.json({ data: service.audit.query(query) });
  });

  return routes;
}
