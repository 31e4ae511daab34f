/**
 * @lexledger/ingestion: Errors.
 */

export type IngestionErrorCode = "MALFORMED_XML" | "MISSING_ACT" | "INVALID_AMENDMENT";

export class IngestionError extends Error {
  constructor(
    public readonly code: IngestionErrorCode,
    message: string,
    /** Position of the offending <Amendment>, when there is one */
    public readonly index?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "IngestionError";
  }
}
