/**
 * @lexledger/ingestion: Types.
 */

import type { ActRef, ChangeType } from "@lexledger/types";
import type { AmendmentRecord, LedgerErrorCode } from "@lexledger/ledger";

/**
 * One <Amendment> element, with defaults applied.
 */
export interface ParsedAmendment {
  /** Position within <Amendments>, from 0 */
  readonly index: number;

  /** <Version>, or the 1-based position when absent */
  readonly version: string;

  readonly content: string;

  /** <Author>, or "Unknown" */
  readonly author: string;

  /** <Type>, or "substantive" */
  readonly changeType: ChangeType;

  /** <Date> as ms since epoch; absent when the document gives none */
  readonly date?: number | undefined;

  /** <Summary>, when the document carries one */
  readonly summary?: string | undefined;
}

export interface ParsedDocument extends ActRef {
  readonly amendments: readonly ParsedAmendment[];
}

export interface ParseOptions {
  /** Used when the root element carries no `id` attribute */
  readonly fallbackAct?: ActRef;
}

/**
 * Line-level difference between two versions of a provision.
 */
export interface LineDiff {
  /** Lines present only in the newer version, in its order */
  readonly added: readonly string[];

  /** Lines present only in the older version, in its order */
  readonly removed: readonly string[];

  readonly totalChanges: number;
}

/**
 * The amendment that stopped an ingestion run.
 */
export interface IngestionFailure {
  readonly index: number;
  readonly code: LedgerErrorCode;
  readonly message: string;
}

export interface IngestionReport extends ActRef {
  /** Records appended, in document order */
  readonly appended: readonly AmendmentRecord[];

  /** Change against the previous amendment, one per appended record */
  readonly changes: readonly LineDiff[];

  /** Present when an append failed; later amendments were not attempted */
  readonly failed?: IngestionFailure | undefined;
}
