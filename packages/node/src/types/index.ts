/**
 * Type barrel: re-exports all public types from @lexledger/node.
 */

// DTOs
export {
  ChangeTypeSchema,
  PaginationQuerySchema,
  SequenceParamSchema,
  RecordAmendmentSchema,
  ListAmendmentsQuerySchema,
  VerifyQuerySchema,
  SearchQuerySchema,
  AuditQuerySchema,
  IngestSchema,
  ResetSchema,
} from "./dto.js";
export type {
  RecordAmendmentDto,
  ListAmendmentsQuery,
  AmendmentView,
  SearchQuery,
  IngestDto,
  ResetDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
