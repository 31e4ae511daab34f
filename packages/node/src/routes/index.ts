/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAmendmentRoutes } from "./amendments.js";
export { createVerifyRoutes } from "./verify.js";
export { createSearchRoutes } from "./search.js";
export { createExportRoutes } from "./export.js";
export { createIngestRoutes } from "./ingest.js";
export { createAdminRoutes } from "./admin.js";
