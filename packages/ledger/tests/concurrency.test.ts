/**
 * Tests for append atomicity under concurrency, timeouts and store failures.
 */

import { describe, it, expect } from "vitest";
import { AmendmentLedger } from "../src/ledger.js";
import { jsonPayloadCodec } from "../src/codec.js";
import { AppendError } from "../src/errors.js";
import { InMemoryLedgerStore } from "../src/in-memory-store.js";
import { GENESIS_HASH } from "../src/record.js";
import type { AmendmentRecord, PersistContext, PersistOutcome } from "../src/types.js";
import { captureLogger, GatedStore, ScriptedStore, sleep } from "./helpers.js";

class SlowStore extends InMemoryLedgerStore {
  override async append(
    record: AmendmentRecord,
    context: PersistContext,
  ): Promise<PersistOutcome> {
    await sleep(1);
    return super.append(record, context);
  }
}

class FlakyLoadStore extends ScriptedStore {
  failLoad = false;

  override async loadAll(): Promise<readonly AmendmentRecord[]> {
    if (this.failLoad) {
      throw new Error("read error");
    }
    return super.loadAll();
  }
}

// =============================================================================
// Serialised appends
// =============================================================================

describe("concurrent appends", () => {
  it("assign distinct consecutive sequence numbers", async () => {
    const ledger = await AmendmentLedger.open(new SlowStore(), { codec: jsonPayloadCodec });

    const records = await Promise.all(
      Array.from({ length: 20 }, (_, i) => ledger.append({ n: i }, 1_000)),
    );

    const sequences = records.map((r) => r.sequenceNumber).sort((a, b) => a - b);
    expect(sequences).toEqual(Array.from({ length: 20 }, (_, i) => i));
    expect(ledger.statistics().count).toBe(20);
    expect((await ledger.verify()).valid).toBe(true);
  });

  it("link each record to the one committed before it", async () => {
    const ledger = await AmendmentLedger.open(new SlowStore(), { codec: jsonPayloadCodec });

    await Promise.all([
      ledger.append({ n: 1 }, 100),
      ledger.append({ n: 2 }, 100),
      ledger.append({ n: 3 }, 100),
    ]);

    const stored = await ledger.read();
    expect(stored[0]?.previousHash).toBe(GENESIS_HASH);
    expect(stored[1]?.previousHash).toBe(stored[0]?.recordHash);
    expect(stored[2]?.previousHash).toBe(stored[1]?.recordHash);
  });

  it("a rejected append does not disturb the ones queued behind it", async () => {
    const ledger = await AmendmentLedger.open(new SlowStore(), { codec: jsonPayloadCodec });
    await ledger.append({ n: 0 }, 500);

    const results = await Promise.allSettled([
      ledger.append({ n: 1 }, 600),
      ledger.append({ n: 2 }, 100),
      ledger.append({ n: 3 }, 700),
    ]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected", "fulfilled"]);
    expect(ledger.statistics().count).toBe(3);
    expect((await ledger.verify()).valid).toBe(true);
  });
});

// =============================================================================
// Timeouts
// =============================================================================

describe("append timeouts", () => {
  it("fail with APPEND_TIMEOUT and leave the head unchanged", async () => {
    const store = new GatedStore();
    const ledger = await AmendmentLedger.open(store, { codec: jsonPayloadCodec });
    store.hold();

    const pending = ledger.append({ n: 1 }, 100, { timeoutMs: 20 });
    await sleep(60);
    store.release();

    await expect(pending).rejects.toMatchObject({
      name: "AppendError",
      code: "APPEND_TIMEOUT",
      message: "Ledger append timed out after 20ms",
    });
    expect(ledger.head()).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("a timed-out append can be retried without a duplicate", async () => {
    const store = new GatedStore();
    const ledger = await AmendmentLedger.open(store, { codec: jsonPayloadCodec });
    store.hold();

    const pending = ledger.append({ act: "A1" }, 100, { timeoutMs: 20 });
    await sleep(60);
    store.release();
    await expect(pending).rejects.toMatchObject({ code: "APPEND_TIMEOUT" });

    const retry = await ledger.append({ act: "A1" }, 100);

    expect(retry.sequenceNumber).toBe(0);
    expect((await ledger.read()).map((r) => `${r.sequenceNumber}:${r.payload}`)).toEqual([
      '0:{"act":"A1"}',
    ]);
  });

  it("apply to the wait for the lock", async () => {
    const store = new GatedStore();
    const ledger = await AmendmentLedger.open(store, { codec: jsonPayloadCodec });
    store.hold();

    const first = ledger.append({ n: 1 }, 100, { timeoutMs: 1_000 });
    const second = ledger.append({ n: 2 }, 100, { timeoutMs: 20 });

    await expect(second).rejects.toMatchObject({
      code: "APPEND_TIMEOUT",
      message: "Ledger append timed out after 20ms",
    });
    store.release();

    expect((await first).sequenceNumber).toBe(0);
    const third = await ledger.append({ n: 3 }, 100);
    expect(third.sequenceNumber).toBe(1);
    expect(store.size).toBe(2);
  });

  it("return a write the store commits after the deadline", async () => {
    const { logger, entries } = captureLogger();
    const store = new GatedStore({ honorAbort: false });
    const ledger = await AmendmentLedger.open(store, { codec: jsonPayloadCodec, logger });
    store.hold();

    const pending = ledger.append({ act: "A1" }, 100, { timeoutMs: 20 });
    await sleep(60);
    store.release();

    const record = await pending;
    expect(record.sequenceNumber).toBe(0);
    expect(ledger.head()?.recordHash).toBe(record.recordHash);
    expect(store.size).toBe(1);

    const late = entries().find((e) => e.event === "ledger.late_commit");
    expect(late).toMatchObject({ level: 40, sequenceNumber: 0 });
  });

  it("use the ledger default when the call gives none", async () => {
    const store = new GatedStore();
    const ledger = await AmendmentLedger.open(store, {
      codec: jsonPayloadCodec,
      appendTimeoutMs: 15,
    });
    store.hold();

    const pending = ledger.append({ n: 1 }, 100);
    await sleep(50);
    store.release();

    await expect(pending).rejects.toMatchObject({
      message: "Ledger append timed out after 15ms",
    });
  });
});

// =============================================================================
// Store failures
// =============================================================================

describe("store failures", () => {
  it("a failed write raises PERSISTENCE_FAILED and commits nothing", async () => {
    const store = new ScriptedStore();
    const ledger = await AmendmentLedger.open(store, { codec: jsonPayloadCodec });
    store.next("failed");

    await expect(ledger.append({ n: 1 }, 100)).rejects.toMatchObject({
      code: "PERSISTENCE_FAILED",
      message: "Store failed to persist sequence 0: disk full",
      sequenceNumber: 0,
    });
    expect(ledger.head()).toBeUndefined();

    const retry = await ledger.append({ n: 1 }, 100);
    expect(retry.sequenceNumber).toBe(0);
  });

  it("a thrown store error raises PERSISTENCE_FAILED with its cause", async () => {
    const store = new ScriptedStore();
    const ledger = await AmendmentLedger.open(store, { codec: jsonPayloadCodec });
    store.next("throw");

    try {
      await ledger.append({ n: 1 }, 100);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AppendError);
      if (err instanceof AppendError) {
        expect(err.code).toBe("PERSISTENCE_FAILED");
        expect(err.message).toBe("Store failed to persist sequence 0: connection reset");
        expect(err.cause).toBeInstanceOf(Error);
      }
    }

    const retry = await ledger.append({ n: 1 }, 100);
    expect(retry.sequenceNumber).toBe(0);
  });

  it("an unconfirmed write that landed is picked up by the next append", async () => {
    const { logger, entries } = captureLogger();
    const store = new ScriptedStore();
    const ledger = await AmendmentLedger.open(store, { codec: jsonPayloadCodec, logger });
    store.next("unconfirmed-written");

    await expect(ledger.append({ n: 1 }, 100)).rejects.toMatchObject({
      code: "UNCONFIRMED_WRITE",
      message: "Store could not confirm sequence 0: ack lost",
    });
    expect(ledger.head()).toBeUndefined();

    const next = await ledger.append({ n: 2 }, 200);
    const stored = await ledger.read();
    expect(next.sequenceNumber).toBe(1);
    expect(next.previousHash).toBe(stored[0]?.recordHash);
    expect((await ledger.verify()).valid).toBe(true);
    expect(entries().some((e) => e.event === "ledger.resynced")).toBe(true);
  });

  it("an unconfirmed write that was lost is not assumed", async () => {
    const store = new ScriptedStore();
    const ledger = await AmendmentLedger.open(store, { codec: jsonPayloadCodec });
    store.next("unconfirmed-lost");

    await expect(ledger.append({ n: 1 }, 100)).rejects.toMatchObject({
      code: "UNCONFIRMED_WRITE",
    });

    const next = await ledger.append({ n: 2 }, 200);
    expect(next.sequenceNumber).toBe(0);
    expect(next.previousHash).toBe(GENESIS_HASH);
  });

  it("a failed reload raises RESYNC_FAILED until storage recovers", async () => {
    const store = new FlakyLoadStore();
    const ledger = await AmendmentLedger.open(store, { codec: jsonPayloadCodec });
    store.next("throw");
    await expect(ledger.append({ n: 1 }, 100)).rejects.toMatchObject({
      code: "PERSISTENCE_FAILED",
    });

    store.failLoad = true;
    await expect(ledger.append({ n: 1 }, 100)).rejects.toMatchObject({
      code: "RESYNC_FAILED",
      message: "Could not reload the chain head: read error",
    });

    store.failLoad = false;
    const record = await ledger.append({ n: 1 }, 100);
    expect(record.sequenceNumber).toBe(0);
  });
});
