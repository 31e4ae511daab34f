/**
 * @lexledger/ledger: The amendment ledger engine.
 *
 * Owns the chain head for one store. Appends run one at a time inside
 * an exclusive section:
 *
 *   read head → assign sequence → resolve timestamp → hash → persist → advance head
 *
 * The head only advances after the store confirms the write, so a
 * failed or timed-out append leaves the ledger as it was. The timeout
 * covers the lock wait and the work before persistence; once a record
 * has been handed to the store, the store's outcome decides. Readers
 * (verify, read, get) work on snapshots from the store and never take
 * the append lock.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { PayloadCodec } from "./codec.js";
import {
  AppendError,
  CorruptionDetectedError,
  LedgerError,
  OrderingError,
} from "./errors.js";
import { verifyChain } from "./hash-chain.js";
import { Mutex } from "./mutex.js";
import { createRecord, GENESIS_HASH, headOf } from "./record.js";
import { TimeoutError, withTimeout } from "./timeout.js";
import type {
  AmendmentRecord,
  ChainHead,
  ChainStats,
  LedgerStore,
  PersistOutcome,
  ReadRecordsOptions,
  ResetReceipt,
  ResetRequest,
  VerificationResult,
  VerifyOptions,
} from "./types.js";

export const DEFAULT_APPEND_TIMEOUT_MS = 5_000;

export interface AmendmentLedgerOptions<T> {
  /** Turns payloads into the canonical string that is hashed and stored */
  readonly codec: PayloadCodec<T>;

  /** Source of engine-assigned timestamps. Default: Date.now */
  readonly clock?: () => number;

  /** Upper bound for one append, lock wait included. Default: 5000 */
  readonly appendTimeoutMs?: number;

  /** Refuse appends once the chain holds this many records */
  readonly maxRecords?: number;

  /** Verify the stored chain while opening and refuse a corrupt one */
  readonly verifyOnOpen?: boolean;

  /** Default: a silent pino logger */
  readonly logger?: Logger;
}

export interface AppendCallOptions {
  /** Overrides the ledger's appendTimeoutMs for this call */
  readonly timeoutMs?: number;
}

interface AppendAttempt {
  readonly signal: AbortSignal;
  readonly timeoutMessage: string;

  /** Set once the record has been handed to the store */
  persisting: boolean;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class AmendmentLedger<T> {
  private readonly _store: LedgerStore;
  private readonly _codec: PayloadCodec<T>;
  private readonly _clock: () => number;
  private readonly _appendTimeoutMs: number;
  private readonly _maxRecords: number | undefined;
  private readonly _logger: Logger;
  private readonly _lock = new Mutex();

  private _head: ChainHead | undefined;
  private _firstTimestamp: number | undefined;
  private _count = 0;
  private _lastVerified: ChainHead | undefined;

  /** Set when storage may hold a write the head does not reflect */
  private _resyncRequired = false;

  private constructor(store: LedgerStore, options: AmendmentLedgerOptions<T>) {
    this._store = store;
    this._codec = options.codec;
    this._clock = options.clock ?? Date.now;
    this._appendTimeoutMs = options.appendTimeoutMs ?? DEFAULT_APPEND_TIMEOUT_MS;
    this._maxRecords = options.maxRecords;
    this._logger = options.logger ?? pino({ level: "silent" });
  }

  /**
   * Load the stored chain and establish its head.
   *
   * @throws CorruptionDetectedError when verifyOnOpen is set and the chain is invalid
   */
  static async open<T>(
    store: LedgerStore,
    options: AmendmentLedgerOptions<T>,
  ): Promise<AmendmentLedger<T>> {
    const ledger = new AmendmentLedger(store, options);
    const records = await store.loadAll();
    ledger._adopt(records);

    if (options.verifyOnOpen === true) {
      const result = verifyChain(records);
      ledger._recordVerification(records, result);
      if (!result.valid) {
        throw new CorruptionDetectedError(result);
      }
    }

    ledger._logger.info(
      { event: "ledger.opened", count: ledger._count, head: ledger._head },
      "Ledger opened",
    );
    return ledger;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  /**
   * Append one amendment.
   *
   * @param payload - Encoded with the ledger's codec before hashing
   * @param timestamp - Integer ms since epoch; must not precede the head's. Default: clock()
   * @throws OrderingError if `timestamp` is earlier than the previous record's
   * @throws AppendError if the write failed, was unconfirmed, or timed out;
   *   an APPEND_TIMEOUT never leaves a record behind
   */
  async append(
    payload: T,
    timestamp?: number,
    options: AppendCallOptions = {},
  ): Promise<AmendmentRecord> {
    if (timestamp !== undefined && (!Number.isSafeInteger(timestamp) || timestamp < 0)) {
      throw new LedgerError(
        "INVALID_TIMESTAMP",
        `Timestamp must be a non-negative integer, got ${timestamp}`,
      );
    }

    const encoded = this._codec.encode(payload);
    const timeoutMs = options.timeoutMs ?? this._appendTimeoutMs;
    const controller = new AbortController();
    const attempt: AppendAttempt = {
      signal: controller.signal,
      timeoutMessage: `Ledger append timed out after ${timeoutMs}ms`,
      persisting: false,
    };

    const work = this._lock.runExclusive(() =>
      this._appendExclusive(encoded, timestamp, attempt),
    );

    try {
      return await withTimeout(work, timeoutMs, "Ledger append", () => {
        controller.abort();
        // A write already handed to the store settles the append itself
        return !attempt.persisting;
      });
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new AppendError("APPEND_TIMEOUT", err.message, undefined, {
          cause: err,
        });
      }
      throw err;
    }
  }

  private async _appendExclusive(
    payload: string,
    requestedTimestamp: number | undefined,
    attempt: AppendAttempt,
  ): Promise<AmendmentRecord> {
    if (attempt.signal.aborted) {
      throw new AppendError(
        "APPEND_TIMEOUT",
        "Append timed out while waiting for the previous append",
      );
    }

    if (this._resyncRequired) {
      await this._resync();
    }

    const head = this._head;
    const sequenceNumber = head === undefined ? 0 : head.sequenceNumber + 1;

    if (this._maxRecords !== undefined && this._count >= this._maxRecords) {
      throw new LedgerError(
        "CAPACITY_EXCEEDED",
        `Ledger is full (${this._maxRecords} records)`,
        sequenceNumber,
      );
    }

    const timestamp = this._resolveTimestamp(requestedTimestamp, head, sequenceNumber);
    const record = createRecord({
      sequenceNumber,
      payload,
      timestamp,
      previousHash: head?.recordHash ?? GENESIS_HASH,
    });

    if (attempt.signal.aborted) {
      throw new AppendError("APPEND_TIMEOUT", attempt.timeoutMessage, sequenceNumber);
    }

    let outcome: PersistOutcome;
    attempt.persisting = true;
    try {
      outcome = await this._store.append(record, { signal: attempt.signal });
    } catch (err) {
      this._resyncRequired = true;
      throw new AppendError(
        "PERSISTENCE_FAILED",
        `Store failed to persist sequence ${sequenceNumber}: ${describeError(err)}`,
        sequenceNumber,
        { cause: err },
      );
    }

    if (outcome.status === "failed") {
      if (attempt.signal.aborted) {
        throw new AppendError("APPEND_TIMEOUT", attempt.timeoutMessage, sequenceNumber);
      }
      throw new AppendError(
        "PERSISTENCE_FAILED",
        `Store failed to persist sequence ${sequenceNumber}: ${outcome.reason}`,
        sequenceNumber,
      );
    }

    if (outcome.status === "unconfirmed") {
      this._resyncRequired = true;
      throw new AppendError(
        "UNCONFIRMED_WRITE",
        `Store could not confirm sequence ${sequenceNumber}: ${outcome.reason}`,
        sequenceNumber,
      );
    }

    this._advance(record);

    if (attempt.signal.aborted) {
      this._logger.warn(
        { event: "ledger.late_commit", sequenceNumber, recordHash: record.recordHash },
        "Append committed after its deadline",
      );
    } else {
      this._logger.debug(
        { event: "ledger.appended", sequenceNumber, recordHash: record.recordHash },
        "Record appended",
      );
    }

    return record;
  }

  private _resolveTimestamp(
    requested: number | undefined,
    head: ChainHead | undefined,
    sequenceNumber: number,
  ): number {
    if (requested !== undefined) {
      if (head !== undefined && requested < head.timestamp) {
        throw new OrderingError(requested, head.timestamp, sequenceNumber);
      }
      return requested;
    }

    const now = Math.floor(this._clock());
    if (head !== undefined && now < head.timestamp) {
      this._logger.warn(
        { event: "ledger.clock_regression", now, headTimestamp: head.timestamp },
        "Clock is behind the chain head; reusing the head timestamp",
      );
      return head.timestamp;
    }
    return now;
  }

  private async _resync(): Promise<void> {
    let records: readonly AmendmentRecord[];
    try {
      records = await this._store.loadAll();
    } catch (err) {
      throw new AppendError(
        "RESYNC_FAILED",
        `Could not reload the chain head: ${describeError(err)}`,
        undefined,
        { cause: err },
      );
    }

    const previousHead = this._head;
    this._adopt(records);
    this._resyncRequired = false;

    this._logger.warn(
      { event: "ledger.resynced", previousHead, head: this._head },
      "Chain head reloaded from storage",
    );
  }

  private _adopt(records: readonly AmendmentRecord[]): void {
    const first = records[0];
    const last = records[records.length - 1];
    this._count = records.length;
    this._firstTimestamp = first?.timestamp;
    this._head = last !== undefined ? headOf(last) : undefined;
  }

  private _advance(record: AmendmentRecord): void {
    if (this._firstTimestamp === undefined) {
      this._firstTimestamp = record.timestamp;
    }
    this._head = headOf(record);
    this._count++;
  }

  // ─── Verify ─────────────────────────────────────────────────────────

  /**
   * Walk the stored chain and report the first defect, if any.
   *
   * Never throws on corruption and never modifies stored records.
   * In "incremental" mode only records after the last verified head are
   * checked, as long as the stored record at that head is unchanged;
   * otherwise a full walk runs.
   */
  async verify(options: VerifyOptions = {}): Promise<VerificationResult> {
    const records = await this._store.loadAll();
    const marker = this._lastVerified;

    let result: VerificationResult;
    if (
      options.mode === "incremental" &&
      marker !== undefined &&
      markerHolds(records, marker)
    ) {
      result = verifyChain(records, {
        startIndex: marker.sequenceNumber + 1,
        anchor: marker,
        mode: "incremental",
      });
    } else {
      result = verifyChain(records);
    }

    this._recordVerification(records, result);
    return result;
  }

  /**
   * Like verify(), but throws when the chain is invalid.
   *
   * @throws CorruptionDetectedError carrying the verification result
   */
  async verifyOrThrow(options: VerifyOptions = {}): Promise<VerificationResult> {
    const result = await this.verify(options);
    if (!result.valid) {
      throw new CorruptionDetectedError(result);
    }
    return result;
  }

  private _recordVerification(
    records: readonly AmendmentRecord[],
    result: VerificationResult,
  ): void {
    if (result.valid) {
      const last = records[records.length - 1];
      this._lastVerified = last !== undefined ? headOf(last) : undefined;
      this._logger.info(
        {
          event: "ledger.verified",
          mode: result.mode,
          checked: result.checkedCount,
          count: records.length,
        },
        "Chain verified",
      );
      return;
    }

    this._lastVerified = undefined;
    this._logger.error(
      {
        event: "ledger.corruption",
        firstBadSequence: result.firstBadSequence,
        defect: result.defect,
        detail: result.detail,
      },
      "Chain verification failed",
    );
  }

  // ─── Query ──────────────────────────────────────────────────────────

  /**
   * Count, time span, head and verification marker.
   *
   * Derived from the in-memory head; an empty ledger has no time span.
   */
  statistics(): ChainStats {
    const head = this._head;
    const first = this._firstTimestamp;
    if (head === undefined || first === undefined) {
      return { count: 0, lastVerified: this._lastVerified };
    }
    return {
      count: this._count,
      firstTimestamp: first,
      lastTimestamp: head.timestamp,
      spanMs: head.timestamp - first,
      head,
      lastVerified: this._lastVerified,
    };
  }

  head(): ChainHead | undefined {
    return this._head;
  }

  /**
   * Snapshot of stored records in sequence order.
   */
  async read(options: ReadRecordsOptions = {}): Promise<readonly AmendmentRecord[]> {
    const fromSequence = options.fromSequence ?? 0;
    const records = await this._store.loadAll();
    const selected = records.filter((r) => r.sequenceNumber >= fromSequence);
    if (options.maxCount !== undefined && options.maxCount >= 0) {
      return selected.slice(0, options.maxCount);
    }
    return selected;
  }

  async get(sequenceNumber: number): Promise<AmendmentRecord | undefined> {
    const records = await this._store.loadAll();
    return records.find((r) => r.sequenceNumber === sequenceNumber);
  }

  /**
   * Decode a record's payload with the ledger's codec.
   */
  decode(record: AmendmentRecord): T {
    return this._codec.decode(record.payload);
  }

  // ─── Administration ─────────────────────────────────────────────────

  /**
   * Discard the whole chain. Administrative only; always logged.
   *
   * Waits for in-flight appends and blocks new ones while it runs.
   */
  reset(request: ResetRequest): Promise<ResetReceipt> {
    return this._lock.runExclusive(async () => {
      const discardedHead = this._head;
      const discardedCount = this._count;

      try {
        await this._store.reset();
      } catch (err) {
        this._resyncRequired = true;
        throw err;
      }

      this._head = undefined;
      this._firstTimestamp = undefined;
      this._count = 0;
      this._lastVerified = undefined;
      this._resyncRequired = false;

      const receipt: ResetReceipt = {
        actor: request.actor,
        reason: request.reason,
        discardedCount,
        discardedHead,
        resetAt: this._clock(),
      };

      this._logger.warn({ event: "ledger.reset", ...receipt }, "Ledger reset");
      return receipt;
    });
  }
}

function markerHolds(records: readonly AmendmentRecord[], marker: ChainHead): boolean {
  const stored = records[marker.sequenceNumber];
  return (
    stored !== undefined &&
    stored.sequenceNumber === marker.sequenceNumber &&
    stored.recordHash === marker.recordHash &&
    stored.timestamp === marker.timestamp
  );
}
