/**
 * @lexledger/node: HTTP API over the amendment ledger.
 *
 * @packageDocumentation
 */

export { AmendmentService, toView } from "./services/amendment-service.js";
export type {
  AmendmentServiceOptions,
  AmendmentFilter,
  AmendmentDiff,
  AmendmentStatistics,
  LedgerExport,
  Readiness,
} from "./services/amendment-service.js";
export { AuditLog } from "./services/audit-log.js";
export type { AuditAction, AuditLogEntry, AuditLogQuery } from "./services/audit-log.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
