/**
 * @lexledger/ingestion: XML ingestion for the amendment ledger.
 *
 * Provides:
 * - parseLegalDocument: act and amendments from XML
 * - PlainLanguageSummarizer: rule-based plain-language summaries
 * - diffLines: line-level change between versions
 * - IngestionPipeline: document → ledger appends
 *
 * @packageDocumentation
 */

export type {
  ParsedAmendment,
  ParsedDocument,
  ParseOptions,
  LineDiff,
  IngestionFailure,
  IngestionReport,
} from "./types.js";

export { IngestionError } from "./errors.js";
export type { IngestionErrorCode } from "./errors.js";

export { parseLegalDocument } from "./parser.js";

export {
  PlainLanguageSummarizer,
  loadPlainLanguageDictionary,
  DEFAULT_MAX_SUMMARY_LENGTH,
  EMPTY_SUMMARY,
} from "./summarizer.js";
export type { PlainLanguageDictionary, SummarizerOptions } from "./summarizer.js";

export { diffLines } from "./diff.js";

export { IngestionPipeline } from "./pipeline.js";
export type { AmendmentSink, IngestionPipelineOptions } from "./pipeline.js";
