/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import type { AmendmentPayload } from "@lexledger/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const ChangeTypeSchema = z.enum(["substantive", "editorial"]);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const SequenceParamSchema = z.coerce.number().int().min(0);

// =============================================================================
// Amendment DTOs
// =============================================================================

const nonBlank = (max: number) =>
  z.string().trim().min(1).max(max);

export const RecordAmendmentSchema = z.object({
  /** Default: the configured act */
  actId: nonBlank(128).optional(),
  actTitle: z.string().max(512).optional(),
  changeType: ChangeTypeSchema.default("substantive"),
  content: nonBlank(100_000),
  author: nonBlank(256),
  /** Default: a plain-language summary of the content */
  summary: z.string().max(2_000).optional(),
  /** Default: content of the act's latest amendment */
  previousContent: z.string().max(100_000).optional(),
  /** Integer ms since epoch. Default: the ledger clock */
  timestamp: z.number().int().min(0).optional(),
});

export type RecordAmendmentDto = z.infer<typeof RecordAmendmentSchema>;

export const ListAmendmentsQuerySchema = PaginationQuerySchema.extend({
  author: z.string().optional(),
  changeType: ChangeTypeSchema.optional(),
  actId: z.string().optional(),
});

export type ListAmendmentsQuery = z.infer<typeof ListAmendmentsQuerySchema>;

/**
 * A stored record with its decoded amendment.
 */
export interface AmendmentView {
  readonly sequenceNumber: number;
  readonly timestamp: number;
  /** `timestamp` as ISO 8601 */
  readonly recordedAt: string;
  readonly previousHash: string;
  readonly recordHash: string;
  readonly amendment: AmendmentPayload;
}

// =============================================================================
// Query DTOs
// =============================================================================

export const VerifyQuerySchema = z.object({
  mode: z.enum(["full", "incremental"]).default("full"),
});

export const SearchQuerySchema = z.object({
  q: z.string().trim().min(1).max(256),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type SearchQuery = z.infer<typeof SearchQuerySchema>;

export const AuditQuerySchema = z.object({
  action: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

// =============================================================================
// Ingestion & Administration DTOs
// =============================================================================

export const IngestSchema = z.object({
  xml: z.string().min(1).max(5_000_000),
});

export type IngestDto = z.infer<typeof IngestSchema>;

export const ResetSchema = z.object({
  actor: nonBlank(128),
  reason: nonBlank(1_024),
});

export type ResetDto = z.infer<typeof ResetSchema>;
