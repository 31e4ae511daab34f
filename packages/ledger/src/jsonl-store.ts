/**
 * @lexledger/ledger: File-based JSONL LedgerStore implementation.
 *
 * Stores records as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append is a single write followed by fsync
 * - A line is committed only once its terminating newline is on disk;
 *   an unterminated last line (torn write) is ignored on load
 * - A torn tail is sealed with a newline before the next append
 * - Lines that do not parse as records are skipped and logged, so a
 *   damaged line shows up in verification as a sequence gap
 *
 * File format (field order is fixed):
 * {"sequenceNumber":0,"payload":"...","timestamp":100,"previousHash":"...","recordHash":"..."}
 *
 * The payload is stored as the exact canonical string the ledger
 * hashed; JSON string escaping round-trips it byte-for-byte.
 */

import { mkdirSync } from "node:fs";
import { open, readFile, writeFile } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import pino from "pino";
import type { Logger } from "pino";
import { isAmendmentRecord } from "./record.js";
import type {
  AmendmentRecord,
  LedgerStore,
  PersistContext,
  PersistOutcome,
} from "./types.js";

/**
 * Options for creating a JsonlLedgerStore.
 */
export interface JsonlLedgerStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;

  /** Default: a silent pino logger */
  readonly logger?: Logger;
}

const NEWLINE = 0x0a;

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Serialize a record as one JSONL line (without the newline).
 */
export function serializeRecord(record: AmendmentRecord): string {
  return JSON.stringify({
    sequenceNumber: record.sequenceNumber,
    payload: record.payload,
    timestamp: record.timestamp,
    previousHash: record.previousHash,
    recordHash: record.recordHash,
  });
}

/**
 * Parse one JSONL line, or undefined when it is not a record.
 */
export function parseRecordLine(line: string): AmendmentRecord | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isAmendmentRecord(parsed)) {
    return undefined;
  }
  return Object.freeze({
    sequenceNumber: parsed.sequenceNumber,
    payload: parsed.payload,
    timestamp: parsed.timestamp,
    previousHash: parsed.previousHash,
    recordHash: parsed.recordHash,
  });
}

/**
 * File-based JSONL ledger store.
 *
 * The file is the source of truth; every loadAll re-reads it.
 */
export class JsonlLedgerStore implements LedgerStore {
  private readonly _filePath: string;
  private readonly _logger: Logger;

  /**
   * Create a new JsonlLedgerStore.
   *
   * The file is created on first append; the parent directory is
   * created now if it doesn't exist.
   */
  constructor(options: JsonlLedgerStoreOptions) {
    this._filePath = options.filePath;
    this._logger = options.logger ?? pino({ level: "silent" });

    mkdirSync(dirname(this._filePath), { recursive: true });
  }

  // ─── Load ───────────────────────────────────────────────────────────

  async loadAll(): Promise<readonly AmendmentRecord[]> {
    let content: string;
    try {
      content = await readFile(this._filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        return Object.freeze([]);
      }
      throw err;
    }

    const lines = content.split("\n");
    // Whatever follows the last newline is not committed
    const tail = lines.pop() ?? "";
    if (tail.trim().length > 0) {
      this._logger.warn(
        { event: "store.torn_tail", filePath: this._filePath, bytes: tail.length },
        "Ignoring unterminated last line",
      );
    }

    const records: AmendmentRecord[] = [];
    lines.forEach((line, i) => {
      if (line.trim().length === 0) {
        return;
      }
      const record = parseRecordLine(line);
      if (record === undefined) {
        this._logger.warn(
          { event: "store.invalid_line", filePath: this._filePath, line: i + 1 },
          "Skipping line that is not a ledger record",
        );
        return;
      }
      records.push(record);
    });

    return Object.freeze(records);
  }

  // ─── Append ─────────────────────────────────────────────────────────

  async append(
    record: AmendmentRecord,
    context: PersistContext,
  ): Promise<PersistOutcome> {
    if (context.signal.aborted) {
      return { status: "failed", reason: "append aborted before write" };
    }

    let handle: FileHandle;
    try {
      handle = await open(this._filePath, "a+");
    } catch (err) {
      return {
        status: "failed",
        reason: `cannot open ${this._filePath}: ${describeError(err)}`,
      };
    }

    let outcome = await this._writeLine(handle, serializeRecord(record) + "\n", context.signal);

    try {
      await handle.close();
    } catch (err) {
      if (outcome.status === "committed") {
        outcome = { status: "unconfirmed", reason: `close failed: ${describeError(err)}` };
      }
    }

    return outcome;
  }

  /**
   * Write one line and fsync. Never throws.
   */
  private async _writeLine(
    handle: FileHandle,
    line: string,
    signal: AbortSignal,
  ): Promise<PersistOutcome> {
    let data = line;
    try {
      if (await endsWithTornLine(handle)) {
        data = "\n" + line;
      }
    } catch (err) {
      return { status: "failed", reason: `cannot inspect file: ${describeError(err)}` };
    }

    if (signal.aborted) {
      return { status: "failed", reason: "append aborted before write" };
    }

    try {
      await handle.appendFile(data, "utf-8");
    } catch (err) {
      return { status: "unconfirmed", reason: `write failed: ${describeError(err)}` };
    }

    try {
      await handle.sync();
    } catch (err) {
      return { status: "unconfirmed", reason: `fsync failed: ${describeError(err)}` };
    }

    return { status: "committed" };
  }

  // ─── Reset ──────────────────────────────────────────────────────────

  async reset(): Promise<void> {
    await writeFile(this._filePath, "", "utf-8");
  }

  // ─── File Path ──────────────────────────────────────────────────────

  /**
   * Get the file path this store writes to.
   */
  get filePath(): string {
    return this._filePath;
  }
}

async function endsWithTornLine(handle: FileHandle): Promise<boolean> {
  const { size } = await handle.stat();
  if (size === 0) {
    return false;
  }
  const last = Buffer.alloc(1);
  await handle.read(last, 0, 1, size - 1);
  return last[0] !== NEWLINE;
}
