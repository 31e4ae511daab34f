/**
 * @lexledger/ledger: Record model.
 *
 * A record hash is SHA-256 over the RFC 8785 (JCS) canonical form of
 * its four committed fields:
 *
 *   recordHash = sha256(canonicalize({ previousHash, payload, sequenceNumber, timestamp }))
 *
 * JCS sorts keys and escapes strings, so no two field tuples share a
 * preimage. Record 0 commits to GENESIS_HASH.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { isRecord } from "@lexledger/types";
import type { AmendmentRecord, ChainHead, RecordFields } from "./types.js";

/**
 * The `previousHash` of the first record in every chain.
 */
export const GENESIS_HASH = "0".repeat(64);

/**
 * Compute the hash a record with these fields must carry.
 *
 * @returns Hex-encoded SHA-256 hash
 */
export function computeRecordHash(fields: RecordFields): string {
  const preimage = canonicalize({
    previousHash: fields.previousHash,
    payload: fields.payload,
    sequenceNumber: fields.sequenceNumber,
    timestamp: fields.timestamp,
  });
  return createHash("sha256").update(preimage, "utf8").digest("hex");
}

/**
 * Build a frozen record with its hash. Ledger-internal.
 */
export function createRecord(fields: RecordFields): AmendmentRecord {
  return Object.freeze({
    sequenceNumber: fields.sequenceNumber,
    payload: fields.payload,
    timestamp: fields.timestamp,
    previousHash: fields.previousHash,
    recordHash: computeRecordHash(fields),
  });
}

export function headOf(record: AmendmentRecord): ChainHead {
  return {
    sequenceNumber: record.sequenceNumber,
    recordHash: record.recordHash,
    timestamp: record.timestamp,
  };
}

/**
 * Two records are equal when every field, including the hash, is equal.
 */
export function recordsEqual(a: AmendmentRecord, b: AmendmentRecord): boolean {
  return (
    a.sequenceNumber === b.sequenceNumber &&
    a.payload === b.payload &&
    a.timestamp === b.timestamp &&
    a.previousHash === b.previousHash &&
    a.recordHash === b.recordHash
  );
}

/**
 * Shape check for records read back from storage.
 *
 * Only the field types are checked here; whether the values are
 * consistent is for chain verification to decide.
 */
export function isAmendmentRecord(value: unknown): value is AmendmentRecord {
  if (!isRecord(value)) return false;
  return (
    typeof value.sequenceNumber === "number" &&
    Number.isInteger(value.sequenceNumber) &&
    typeof value.payload === "string" &&
    typeof value.timestamp === "number" &&
    Number.isInteger(value.timestamp) &&
    typeof value.previousHash === "string" &&
    typeof value.recordHash === "string"
  );
}
