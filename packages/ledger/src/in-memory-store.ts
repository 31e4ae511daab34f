/**
 * @lexledger/ledger: In-memory LedgerStore implementation.
 *
 * Stores records in a plain array. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 * - Loading an exported record sequence for offline verification
 *
 * Not suitable for production (all state lost on process exit).
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) loadAll (copy-on-read snapshot)
 * - No durability guarantees
 */

import type {
  AmendmentRecord,
  LedgerStore,
  PersistContext,
  PersistOutcome,
} from "./types.js";

export class InMemoryLedgerStore implements LedgerStore {
  private readonly _records: AmendmentRecord[] = [];

  /**
   * @param seed - Records to start with, kept as given (no verification)
   */
  constructor(seed: readonly AmendmentRecord[] = []) {
    for (const record of seed) {
      this._records.push(Object.freeze({ ...record }));
    }
  }

  async loadAll(): Promise<readonly AmendmentRecord[]> {
    return Object.freeze([...this._records]);
  }

  async append(
    record: AmendmentRecord,
    context: PersistContext,
  ): Promise<PersistOutcome> {
    if (context.signal.aborted) {
      return { status: "failed", reason: "append aborted before write" };
    }
    this._records.push(record);
    return { status: "committed" };
  }

  async reset(): Promise<void> {
    this._records.length = 0;
  }

  /** Number of stored records */
  get size(): number {
    return this._records.length;
  }
}
