/**
 * @lexledger/ledger: Hash chain verification.
 *
 * Walks records in order and stops at the first defect. Per record the
 * checks run in a fixed order:
 *
 *   1. sequenceGap     sequenceNumber !== index
 *   2. linkBroken      previousHash !== predecessor.recordHash (GENESIS_HASH at 0)
 *   3. timeRegression  timestamp < predecessor.timestamp
 *   4. hashMismatch    recordHash !== computeRecordHash(fields)
 *
 * Verification is a pure read: records are never modified or repaired.
 */

import { computeRecordHash, GENESIS_HASH } from "./record.js";
import type {
  AmendmentRecord,
  ChainDefect,
  ChainHead,
  VerificationMode,
  VerificationResult,
} from "./types.js";

export interface VerifyChainOptions {
  /** Index of the first record to check. Default: 0 */
  readonly startIndex?: number;

  /**
   * The already-verified record just before `startIndex`.
   * Required when startIndex > 0.
   */
  readonly anchor?: ChainHead;

  /** Reported back in the result. Default: "full" */
  readonly mode?: VerificationMode;
}

interface Defect {
  readonly defect: ChainDefect;
  readonly detail: string;
}

function checkRecord(
  record: AmendmentRecord,
  index: number,
  previous: ChainHead | undefined,
): Defect | undefined {
  if (record.sequenceNumber !== index) {
    return {
      defect: "sequenceGap",
      detail: `Expected sequence ${index}, found ${record.sequenceNumber}`,
    };
  }

  const expectedPrevious = previous?.recordHash ?? GENESIS_HASH;
  if (record.previousHash !== expectedPrevious) {
    return {
      defect: "linkBroken",
      detail: `previousHash mismatch at sequence ${index}: expected "${expectedPrevious}", got "${record.previousHash}"`,
    };
  }

  if (previous !== undefined && record.timestamp < previous.timestamp) {
    return {
      defect: "timeRegression",
      detail: `Timestamp ${record.timestamp} at sequence ${index} precedes ${previous.timestamp}`,
    };
  }

  const expectedHash = computeRecordHash(record);
  if (record.recordHash !== expectedHash) {
    return {
      defect: "hashMismatch",
      detail: `Hash mismatch at sequence ${index}: expected "${expectedHash}", got "${record.recordHash}"`,
    };
  }

  return undefined;
}

/**
 * Verify a record sequence in index order.
 *
 * @param records - Records in append order
 * @returns Validity, and on failure the first bad sequence and its defect
 */
export function verifyChain(
  records: readonly AmendmentRecord[],
  options: VerifyChainOptions = {},
): VerificationResult {
  const mode = options.mode ?? "full";
  const startIndex = options.startIndex ?? 0;

  if (startIndex > 0 && options.anchor === undefined) {
    throw new RangeError("An anchor is required when startIndex > 0");
  }

  let previous: ChainHead | undefined = startIndex > 0 ? options.anchor : undefined;
  let checkedCount = 0;

  for (let index = startIndex; index < records.length; index++) {
    const record = records[index];
    if (record === undefined) break;

    checkedCount++;
    const found = checkRecord(record, index, previous);
    if (found !== undefined) {
      return {
        valid: false,
        firstBadSequence: index,
        defect: found.defect,
        detail: found.detail,
        checkedCount,
        mode,
      };
    }

    previous = {
      sequenceNumber: record.sequenceNumber,
      recordHash: record.recordHash,
      timestamp: record.timestamp,
    };
  }

  return { valid: true, checkedCount, mode };
}
