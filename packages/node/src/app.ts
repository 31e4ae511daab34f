/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability: tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import type { AmendmentService } from "./services/amendment-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  rateLimitMiddleware,
  TokenBucketStore,
} from "./middleware/rate-limit.js";
import type { RateLimitConfig } from "./middleware/rate-limit.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAmendmentRoutes } from "./routes/amendments.js";
import { createVerifyRoutes } from "./routes/verify.js";
import { createSearchRoutes } from "./routes/search.js";
import { createExportRoutes } from "./routes/export.js";
import { createIngestRoutes } from "./routes/ingest.js";
import { createAdminRoutes } from "./routes/admin.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: AmendmentService;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** When provided, /api/* is rate limited per client */
  readonly rateLimit?: RateLimitConfig;
  /** Called with every error answered with a 500 */
  readonly onInternalError?: (err: Error, c: Context) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: AmendmentService;
  readonly rateLimitStore?: TokenBucketStore | undefined;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;

  let rateLimitStore: TokenBucketStore | undefined;
  if (options.rateLimit !== undefined) {
    rateLimitStore = new TokenBucketStore(options.rateLimit);
  }

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onInternalError));

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (rateLimitStore !== undefined) {
    app.use("/api/*", rateLimitMiddleware(rateLimitStore));
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Mount v1 API routes
  app.route("/api/v1/amendments", createAmendmentRoutes());
  app.route("/api/v1/search", createSearchRoutes());
  app.route("/api/v1/export", createExportRoutes());
  app.route("/api/v1/ingest", createIngestRoutes());
  app.route("/api/v1", createVerifyRoutes());
  app.route("/api/v1", createAdminRoutes());

  return { app, service, rateLimitStore };
}
