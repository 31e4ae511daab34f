/**
 * @lexledger/ledger: Hash-chained amendment ledger.
 *
 * Provides:
 * - AmendmentLedger: append, verify, statistics over one chain
 * - Record model (canonical hashing, genesis anchor)
 * - LedgerStore contract with in-memory and JSONL implementations
 * - Payload codecs for canonical JSON
 *
 * @packageDocumentation
 */

// Core types
export type {
  RecordFields,
  AmendmentRecord,
  ChainHead,
  ChainDefect,
  VerificationMode,
  VerificationResult,
  VerifyOptions,
  ChainStats,
  PersistOutcome,
  PersistContext,
  LedgerStore,
  ReadRecordsOptions,
  ResetRequest,
  ResetReceipt,
} from "./types.js";

// Errors
export type { LedgerErrorCode, AppendErrorCode } from "./errors.js";
export {
  LedgerError,
  AppendError,
  OrderingError,
  CorruptionDetectedError,
} from "./errors.js";

// Record model
export {
  GENESIS_HASH,
  computeRecordHash,
  recordsEqual,
  headOf,
  isAmendmentRecord,
} from "./record.js";

// Codecs
export type { PayloadCodec } from "./codec.js";
export { createJsonCodec, jsonPayloadCodec, amendmentPayloadCodec } from "./codec.js";

// Verification
export { verifyChain } from "./hash-chain.js";
export type { VerifyChainOptions } from "./hash-chain.js";

// Engine
export { AmendmentLedger, DEFAULT_APPEND_TIMEOUT_MS } from "./ledger.js";
export type { AmendmentLedgerOptions, AppendCallOptions } from "./ledger.js";
export { Mutex } from "./mutex.js";

// Stores
export { InMemoryLedgerStore } from "./in-memory-store.js";
export { JsonlLedgerStore, serializeRecord, parseRecordLine } from "./jsonl-store.js";
export type { JsonlLedgerStoreOptions } from "./jsonl-store.js";
