/**
 * Health check routes.
 *
 * GET /health  Liveness probe (always 200 if server is running)
 * GET /ready  Readiness probe (incremental chain verification)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AmendmentService } from "../services/amendment-service.js";

export function createHealthRoutes(service: AmendmentService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    const readiness = await service.readiness();
    const timestamp = new Date().toISOString();

    if (readiness.ready) {
      return c.json(
        { status: "ready", verification: readiness.verification, timestamp },
        200,
      );
    }

    return c.json(
      {
        status: "not_ready",
        reason: readiness.reason,
        verification: readiness.verification,
        timestamp,
      },
      503,
    );
  });

  return routes;
}
