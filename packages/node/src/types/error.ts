/**
 * Error envelope for API responses.
 *
 * Every error response has the shape
 *   { error: { code, message, details? } }
 * where `code` is one of ErrorCode. Ledger and ingestion errors reach
 * the client under their own codes; `details` carries what locates the
 * failure (the sequence number, the document's amendment index, or the
 * verification result of a corrupt chain).
 */

import type { LedgerErrorCode } from "@lexledger/ledger";
import type { IngestionErrorCode } from "@lexledger/ingestion";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Codes raised by the HTTP layer itself.
 *
 * - VALIDATION_ERROR (400): body, query or path parameter rejected by its schema
 * - NOT_FOUND (404): no amendment at the requested sequence number
 * - RATE_LIMITED (429): the client's token bucket is empty
 * - INTERNAL_ERROR (500): anything unexpected; the message is generic
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "RATE_LIMITED"
  | "INTERNAL_ERROR";

/**
 * Every code a response can carry.
 *
 * Ledger codes: INVALID_PAYLOAD and INVALID_TIMESTAMP (400),
 * TIMESTAMP_REGRESSION and CORRUPTION_DETECTED (409), CAPACITY_EXCEEDED
 * (422), and the append failures PERSISTENCE_FAILED, UNCONFIRMED_WRITE,
 * APPEND_TIMEOUT and RESYNC_FAILED (503), after which the amendment may
 * be sent again. Ingestion codes (MALFORMED_XML, MISSING_ACT,
 * INVALID_AMENDMENT) are all 400; nothing from that document was appended.
 */
export type ErrorCode = ApiErrorCode | LedgerErrorCode | IngestionErrorCode;

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  if (details === undefined) {
    return { error: { code, message } };
  }
  return { error: { code, message, details } };
}
