/**
 * Runtime Type Guards
 *
 * Narrowing functions for amendment types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized records, ingested documents).
 */

import type { AmendmentPayload, ChangeType } from "./amendment.js";

const CHANGE_TYPES = new Set<string>(["substantive", "editorial"]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export function isChangeType(value: unknown): value is ChangeType {
  return typeof value === "string" && CHANGE_TYPES.has(value);
}

export function isAmendmentPayload(value: unknown): value is AmendmentPayload {
  if (!isRecord(value)) return false;
  return (
    isNonEmptyString(value.actId) &&
    (value.actTitle === undefined || typeof value.actTitle === "string") &&
    isChangeType(value.changeType) &&
    isNonEmptyString(value.content) &&
    isNonEmptyString(value.author) &&
    typeof value.summary === "string" &&
    (value.previousContent === undefined ||
      typeof value.previousContent === "string")
  );
}
