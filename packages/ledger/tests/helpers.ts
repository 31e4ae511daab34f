/**
 * Test helpers for @lexledger/ledger.
 *
 * Stores with scripted behaviour and a pino destination that keeps
 * log lines in memory.
 */

import pino from "pino";
import type { Logger } from "pino";
import { InMemoryLedgerStore } from "../src/in-memory-store.js";
import type {
  AmendmentRecord,
  LedgerStore,
  PersistContext,
  PersistOutcome,
} from "../src/types.js";

/**
 * A store whose records tests can edit in place, to simulate tampering
 * with a ledger that stays open.
 */
export class MutableStore implements LedgerStore {
  readonly records: AmendmentRecord[] = [];

  async loadAll(): Promise<readonly AmendmentRecord[]> {
    return [...this.records];
  }

  async append(record: AmendmentRecord): Promise<PersistOutcome> {
    this.records.push(record);
    return { status: "committed" };
  }

  async reset(): Promise<void> {
    this.records.length = 0;
  }

  replace(index: number, change: Partial<AmendmentRecord>): void {
    const current = this.records[index];
    if (current === undefined) {
      throw new Error(`No record at ${index}`);
    }
    this.records[index] = { ...current, ...change };
  }
}

/**
 * In-memory store whose appends can be held until released.
 *
 * With `honorAbort: false` a held append still commits after its
 * caller timed out, like a backend that acknowledges late.
 */
export class GatedStore extends InMemoryLedgerStore {
  private _gate: Promise<void> | undefined;
  private _open: (() => void) | undefined;
  private readonly _honorAbort: boolean;

  constructor(options: { honorAbort?: boolean } = {}) {
    super();
    this._honorAbort = options.honorAbort ?? true;
  }

  hold(): void {
    this._gate = new Promise<void>((resolve) => {
      this._open = resolve;
    });
  }

  release(): void {
    this._open?.();
    this._gate = undefined;
    this._open = undefined;
  }

  override async append(
    record: AmendmentRecord,
    context: PersistContext,
  ): Promise<PersistOutcome> {
    const gate = this._gate;
    if (gate !== undefined) {
      await gate;
    }
    if (this._honorAbort) {
      return super.append(record, context);
    }
    return super.append(record, { signal: new AbortController().signal });
  }
}

/**
 * In-memory store that reports a scripted outcome for the next append.
 *
 * - "failed": nothing written
 * - "unconfirmed-written": written, but reported unconfirmed
 * - "unconfirmed-lost": not written, reported unconfirmed
 * - "throw": not written, rejects
 */
export type ScriptedOutcome =
  | "failed"
  | "unconfirmed-written"
  | "unconfirmed-lost"
  | "throw";

export class ScriptedStore extends InMemoryLedgerStore {
  private readonly _script: ScriptedOutcome[] = [];

  next(outcome: ScriptedOutcome): void {
    this._script.push(outcome);
  }

  override async append(
    record: AmendmentRecord,
    context: PersistContext,
  ): Promise<PersistOutcome> {
    const outcome = this._script.shift();
    switch (outcome) {
      case undefined:
        return super.append(record, context);
      case "failed":
        return { status: "failed", reason: "disk full" };
      case "unconfirmed-written":
        await super.append(record, context);
        return { status: "unconfirmed", reason: "ack lost" };
      case "unconfirmed-lost":
        return { status: "unconfirmed", reason: "ack lost" };
      case "throw":
        throw new Error("connection reset");
    }
  }
}

/**
 * A pino logger writing JSON lines into `lines`.
 */
export function captureLogger(): { logger: Logger; entries: () => Record<string, unknown>[] } {
  const lines: string[] = [];
  const logger = pino(
    { level: "trace" },
    {
      write(msg: string): void {
        lines.push(msg);
      },
    },
  );
  return {
    logger,
    entries: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

/**
 * A clock returning the given times in order, then repeating the last.
 */
export function scriptedClock(...times: number[]): () => number {
  let i = 0;
  return () => {
    const t = times[Math.min(i, times.length - 1)] ?? 0;
    i++;
    return t;
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
