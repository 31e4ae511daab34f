/**
 * @lexledger/ledger: Core types.
 *
 * Defines the record model and the persistence contract for the
 * hash-chained amendment ledger.
 *
 * Design principles:
 * - Records are immutable after creation
 * - The chain is append-only (no UPDATE, no DELETE outside an audited reset)
 * - Sequence numbers are contiguous (0, 1, 2, ...) with no gaps
 * - Every record commits to its predecessor's hash
 */

// =============================================================================
// Amendment Record
// =============================================================================

/**
 * The four fields a record hash commits to.
 */
export interface RecordFields {
  /** Position in the chain (0-based, assigned by the ledger) */
  readonly sequenceNumber: number;

  /** Canonical encoding of the amendment payload */
  readonly payload: string;

  /** Append time, integer milliseconds since the Unix epoch */
  readonly timestamp: number;

  /** recordHash of the predecessor, or GENESIS_HASH for record 0 */
  readonly previousHash: string;
}

/**
 * A committed ledger record.
 *
 * Only the ledger creates these; callers never compute a record hash.
 */
export interface AmendmentRecord extends RecordFields {
  /** Hex SHA-256 over the canonical preimage of the four fields */
  readonly recordHash: string;
}

/**
 * The last record's position, hash and time.
 *
 * Derived from the chain, never persisted on its own.
 */
export interface ChainHead {
  readonly sequenceNumber: number;
  readonly recordHash: string;
  readonly timestamp: number;
}

// =============================================================================
// Verification
// =============================================================================

/**
 * Kinds of chain defect, in the order they are checked per record.
 */
export type ChainDefect =
  | "sequenceGap"
  | "linkBroken"
  | "timeRegression"
  | "hashMismatch";

export type VerificationMode = "full" | "incremental";

/**
 * Outcome of walking the chain.
 *
 * `firstBadSequence` is the index of the first offending record,
 * which is also the sequence number it should have carried.
 */
export interface VerificationResult {
  readonly valid: boolean;
  readonly firstBadSequence?: number | undefined;
  readonly defect?: ChainDefect | undefined;
  readonly detail?: string | undefined;

  /** Number of records whose checks ran */
  readonly checkedCount: number;

  readonly mode: VerificationMode;
}

export interface VerifyOptions {
  /** Default: "full" */
  readonly mode?: VerificationMode;
}

// =============================================================================
// Statistics
// =============================================================================

export interface ChainStats {
  readonly count: number;

  /** Absent on an empty ledger */
  readonly firstTimestamp?: number | undefined;
  readonly lastTimestamp?: number | undefined;
  readonly spanMs?: number | undefined;

  readonly head?: ChainHead | undefined;

  /** Head as of the last successful verification */
  readonly lastVerified?: ChainHead | undefined;
}

// =============================================================================
// Persistence Adapter
// =============================================================================

/**
 * What a store reports for one append.
 *
 * - committed: the record is durable and will be returned by loadAll
 * - failed: nothing was written
 * - unconfirmed: the write may or may not have landed
 */
export type PersistOutcome =
  | { readonly status: "committed" }
  | { readonly status: "failed"; readonly reason: string }
  | { readonly status: "unconfirmed"; readonly reason: string };

export interface PersistContext {
  /**
   * Aborted once the append is past its deadline. A store that sees it
   * before writing returns failed; once writing has started, the store
   * reports the real outcome and the engine honours it.
   */
  readonly signal: AbortSignal;
}

/**
 * Durable storage of the record sequence.
 *
 * Invariants:
 * - loadAll returns records in append order as an immutable snapshot
 * - Stored fields round-trip byte-for-byte (the payload string is never re-encoded)
 * - A thrown error is treated like an unconfirmed write
 */
export interface LedgerStore {
  /** All records in append order (empty on first use) */
  loadAll(): Promise<readonly AmendmentRecord[]>;

  /** Persist one record after the current last one */
  append(record: AmendmentRecord, context: PersistContext): Promise<PersistOutcome>;

  /** Discard every record (administrative reset only) */
  reset(): Promise<void>;
}

// =============================================================================
// Read / Reset
// =============================================================================

export interface ReadRecordsOptions {
  /** Start at this sequence number (inclusive). Default: 0 */
  readonly fromSequence?: number;

  /** Maximum number of records. Default: unlimited */
  readonly maxCount?: number;
}

export interface ResetRequest {
  /** Who requested the reset */
  readonly actor: string;

  /** Why the ledger is being reinitialized */
  readonly reason: string;
}

export interface ResetReceipt {
  readonly actor: string;
  readonly reason: string;
  readonly discardedCount: number;
  readonly discardedHead?: ChainHead | undefined;
  readonly resetAt: number;
}
