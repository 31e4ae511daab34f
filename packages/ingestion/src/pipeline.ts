/**
 * @lexledger/ingestion: Ingestion pipeline.
 *
 * XML document → parsed amendments → payloads → ledger appends, in
 * document order. A failed append stops the run; amendments already
 * appended stay in the ledger.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AmendmentPayload } from "@lexledger/types";
import { LedgerError } from "@lexledger/ledger";
import type { AmendmentRecord } from "@lexledger/ledger";
import { diffLines } from "./diff.js";
import { parseLegalDocument } from "./parser.js";
import { PlainLanguageSummarizer } from "./summarizer.js";
import type {
  IngestionFailure,
  IngestionReport,
  LineDiff,
  ParseOptions,
  ParsedAmendment,
  ParsedDocument,
} from "./types.js";

/**
 * Where ingested amendments go. AmendmentLedger<AmendmentPayload> fits.
 */
export interface AmendmentSink {
  append(payload: AmendmentPayload, timestamp?: number): Promise<AmendmentRecord>;
}

export interface IngestionPipelineOptions {
  /** Summaries for amendments whose document gives none */
  readonly summarizer?: PlainLanguageSummarizer;

  /** Passed to the parser */
  readonly parse?: ParseOptions;

  /** Default: a silent pino logger */
  readonly logger?: Logger;
}

export class IngestionPipeline {
  private readonly _summarizer: PlainLanguageSummarizer;
  private readonly _parseOptions: ParseOptions;
  private readonly _logger: Logger;

  constructor(options: IngestionPipelineOptions = {}) {
    this._summarizer = options.summarizer ?? new PlainLanguageSummarizer();
    this._parseOptions = options.parse ?? {};
    this._logger = options.logger ?? pino({ level: "silent" });
  }

  /**
   * Build ledger payloads for every amendment in a parsed document.
   *
   * Each payload's previousContent is the content of the amendment
   * before it in the document.
   */
  toPayloads(document: ParsedDocument): AmendmentPayload[] {
    return document.amendments.map((amendment, i) =>
      this._toPayload(document, amendment, document.amendments[i - 1]),
    );
  }

  private _toPayload(
    document: ParsedDocument,
    amendment: ParsedAmendment,
    previous: ParsedAmendment | undefined,
  ): AmendmentPayload {
    return {
      actId: document.actId,
      actTitle: document.actTitle,
      changeType: amendment.changeType,
      content: amendment.content,
      author: amendment.author,
      summary: amendment.summary ?? this._summarizer.summarize(amendment.content),
      previousContent: previous?.content,
    };
  }

  /**
   * Parse `xml` and append its amendments to `sink`.
   *
   * Amendments with a <Date> are appended at that time; the others at
   * the sink's clock.
   *
   * @throws IngestionError when the document cannot be parsed (nothing is appended)
   * @throws Error other than LedgerError raised by the sink
   */
  async ingest(xml: string, sink: AmendmentSink): Promise<IngestionReport> {
    const document = parseLegalDocument(xml, this._parseOptions);
    const payloads = this.toPayloads(document);

    const appended: AmendmentRecord[] = [];
    const changes: LineDiff[] = [];
    let failed: IngestionFailure | undefined;

    for (const [i, payload] of payloads.entries()) {
      const amendment = document.amendments[i];
      try {
        const record = await sink.append(payload, amendment?.date);
        appended.push(record);
        changes.push(diffLines(payload.previousContent ?? "", payload.content));
      } catch (err) {
        if (!(err instanceof LedgerError)) {
          throw err;
        }
        failed = { index: i, code: err.code, message: err.message };
        this._logger.warn(
          { event: "ingestion.append_failed", actId: document.actId, index: i, code: err.code },
          "Ingestion stopped at a failed append",
        );
        break;
      }
    }

    this._logger.info(
      {
        event: "ingestion.completed",
        actId: document.actId,
        parsed: payloads.length,
        appended: appended.length,
      },
      "Document ingested",
    );

    return {
      actId: document.actId,
      actTitle: document.actTitle,
      appended,
      changes,
      failed,
    };
  }
}
