/**
 * Middleware barrel: re-exports all middleware.
 */

export { handleError, createErrorHandler } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, pinoRequestLog } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export {
  rateLimitMiddleware,
  TokenBucketStore,
  clientIdOf,
  CLIENT_ID_HEADER,
} from "./rate-limit.js";
export type { RateLimitConfig, ConsumeResult } from "./rate-limit.js";
