/**
 * @lexledger/ledger: Errors.
 *
 * Every failure the ledger raises is a LedgerError with a stable code.
 * Append failures never advance the chain head, so a caller may retry
 * the same payload after an AppendError.
 */

import type { VerificationResult } from "./types.js";

export type LedgerErrorCode =
  | "PERSISTENCE_FAILED"
  | "UNCONFIRMED_WRITE"
  | "APPEND_TIMEOUT"
  | "RESYNC_FAILED"
  | "TIMESTAMP_REGRESSION"
  | "CORRUPTION_DETECTED"
  | "INVALID_PAYLOAD"
  | "INVALID_TIMESTAMP"
  | "CAPACITY_EXCEEDED";

export type AppendErrorCode = Extract<
  LedgerErrorCode,
  "PERSISTENCE_FAILED" | "UNCONFIRMED_WRITE" | "APPEND_TIMEOUT" | "RESYNC_FAILED"
>;

export class LedgerError extends Error {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string,
    public readonly sequenceNumber?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LedgerError";
  }
}

/**
 * The append did not commit: persistence failed, could not be
 * confirmed, or the call timed out.
 */
export class AppendError extends LedgerError {
  constructor(
    code: AppendErrorCode,
    message: string,
    sequenceNumber?: number,
    options?: { cause?: unknown },
  ) {
    super(code, message, sequenceNumber, options);
    this.name = "AppendError";
  }
}

/**
 * A caller-supplied timestamp is earlier than the chain head's.
 */
export class OrderingError extends LedgerError {
  constructor(
    public readonly timestamp: number,
    public readonly headTimestamp: number,
    sequenceNumber: number,
  ) {
    super(
      "TIMESTAMP_REGRESSION",
      `Timestamp ${timestamp} is earlier than the previous record's ${headTimestamp}`,
      sequenceNumber,
    );
    this.name = "OrderingError";
  }
}

/**
 * Raised only by verify-or-fail paths; plain verification reports.
 */
export class CorruptionDetectedError extends LedgerError {
  constructor(public readonly result: VerificationResult) {
    super(
      "CORRUPTION_DETECTED",
      `Ledger corruption at sequence ${String(result.firstBadSequence)}: ${result.defect ?? "unknown"}`,
      result.firstBadSequence,
    );
    this.name = "CorruptionDetectedError";
  }
}
