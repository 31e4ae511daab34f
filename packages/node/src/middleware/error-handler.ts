/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Ledger and ingestion errors keep their codes; the code decides
 * the HTTP status. Anything without a known code is a 500 with a
 * generic message.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import { CorruptionDetectedError } from "@lexledger/ledger";
import { createErrorEnvelope } from "../types/error.js";
import type { ErrorCode } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type MappedCode = Exclude<ErrorCode, "INTERNAL_ERROR">;

const STATUS_MAP: Readonly<Record<MappedCode, ContentfulStatusCode>> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  RATE_LIMITED: 429,

  // Caller input
  INVALID_PAYLOAD: 400,
  INVALID_TIMESTAMP: 400,
  TIMESTAMP_REGRESSION: 409,
  CAPACITY_EXCEEDED: 422,

  // Integrity
  CORRUPTION_DETECTED: 409,

  // Storage: the append did not commit and may be retried
  PERSISTENCE_FAILED: 503,
  UNCONFIRMED_WRITE: 503,
  APPEND_TIMEOUT: 503,
  RESYNC_FAILED: 503,

  // Ingestion
  MALFORMED_XML: 400,
  MISSING_ACT: 400,
  INVALID_AMENDMENT: 400,
};

function isMappedCode(code: string): code is MappedCode {
  return Object.hasOwn(STATUS_MAP, code);
}

function errorCode(err: Error): MappedCode | undefined {
  if ("code" in err && typeof err.code === "string" && isMappedCode(err.code)) {
    return err.code;
  }
  return undefined;
}

function errorDetails(err: Error): Record<string, unknown> | undefined {
  if (err instanceof CorruptionDetectedError) {
    return { verification: err.result };
  }
  if ("index" in err && typeof err.index === "number") {
    return { index: err.index };
  }
  if ("sequenceNumber" in err && typeof err.sequenceNumber === "number") {
    return { sequenceNumber: err.sequenceNumber };
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create the global error handler. Registered as Hono's onError handler.
 *
 * @param onInternalError - Called with every error answered with 500
 */
export function createErrorHandler(
  onInternalError?: (err: Error, c: Context) => void,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    if (err instanceof ZodError) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
          issues: formatZodErrors(err),
        }),
        400,
      );
    }

    const code = errorCode(err);

    if (code === undefined) {
      onInternalError?.(err, c);
      // Don't leak internal details
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    return c.json(createErrorEnvelope(code, err.message, errorDetails(err)), STATUS_MAP[code]);
  };
}

export const handleError = createErrorHandler();
