/**
 * AmendmentService: Composition root for the ledger and ingestion packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One service owns one ledger; every mutation it
 * performs is written to the audit log.
 *
 * A stored payload that no longer decodes is reported as corruption
 * (CORRUPTION_DETECTED) by the reads that need it; statistics skip it
 * and count it instead.
 */

import pino from "pino";
import type { Logger } from "pino";
import {
  AmendmentLedger,
  CorruptionDetectedError,
  LedgerError,
  Mutex,
  amendmentPayloadCodec,
} from "@lexledger/ledger";
import type {
  AmendmentRecord,
  ChainHead,
  ChainStats,
  LedgerStore,
  ResetReceipt,
  ResetRequest,
  VerificationMode,
  VerificationResult,
} from "@lexledger/ledger";
import {
  IngestionPipeline,
  PlainLanguageSummarizer,
  diffLines,
} from "@lexledger/ingestion";
import type { IngestionReport, LineDiff } from "@lexledger/ingestion";
import type { ActRef, AmendmentPayload, ChangeType } from "@lexledger/types";
import type { AmendmentView, RecordAmendmentDto } from "../types/dto.js";
import { AuditLog } from "./audit-log.js";

// =============================================================================
// Configuration
// =============================================================================

export interface AmendmentServiceOptions {
  readonly store: LedgerStore;

  /** Act used when a request or document names none */
  readonly act: ActRef;

  readonly appendTimeoutMs?: number;
  readonly maxRecords?: number;
  readonly verifyOnOpen?: boolean;

  /** Default: the bundled plain-language dictionary */
  readonly summarizer?: PlainLanguageSummarizer;

  /** Default: a silent pino logger */
  readonly logger?: Logger;

  /** Default: Date.now */
  readonly clock?: () => number;
}

// =============================================================================
// Results
// =============================================================================

export interface AmendmentFilter {
  readonly author?: string | undefined;
  readonly changeType?: ChangeType | undefined;
  readonly actId?: string | undefined;
}

export interface AmendmentDiff {
  readonly sequenceNumber: number;
  readonly actId: string;
  readonly diff: LineDiff;
}

export interface AmendmentStatistics extends ChainStats {
  readonly act: ActRef;
  readonly byChangeType: Readonly<Record<ChangeType, number>>;
  readonly byAuthor: Readonly<Record<string, number>>;

  /** Stored records whose payload does not decode; left out of the counts above */
  readonly undecodable: number;
}

export interface LedgerExport {
  readonly act: ActRef;
  readonly exportedAt: string;
  readonly head: ChainHead | null;
  readonly verification: VerificationResult;
  readonly records: readonly AmendmentRecord[];
}

export type Readiness =
  | { readonly ready: true; readonly verification: VerificationResult }
  | { readonly ready: false; readonly verification?: VerificationResult; readonly reason: string };

export function toView(record: AmendmentRecord, amendment: AmendmentPayload): AmendmentView {
  return {
    sequenceNumber: record.sequenceNumber,
    timestamp: record.timestamp,
    recordedAt: new Date(record.timestamp).toISOString(),
    previousHash: record.previousHash,
    recordHash: record.recordHash,
    amendment,
  };
}

// =============================================================================
// Service
// =============================================================================

export class AmendmentService {
  readonly ledger: AmendmentLedger<AmendmentPayload>;
  readonly audit: AuditLog;
  readonly act: ActRef;

  private readonly _summarizer: PlainLanguageSummarizer;
  private readonly _pipeline: IngestionPipeline;
  private readonly _logger: Logger;
  private readonly _clock: () => number;

  /** Serialises recordAmendment and ingest */
  private readonly _writeLock = new Mutex();

  private constructor(
    ledger: AmendmentLedger<AmendmentPayload>,
    options: AmendmentServiceOptions,
    logger: Logger,
  ) {
    this.ledger = ledger;
    this.act = options.act;
    this._clock = options.clock ?? Date.now;
    this._logger = logger;
    this.audit = new AuditLog(this._clock);
    this._summarizer = options.summarizer ?? new PlainLanguageSummarizer();
    this._pipeline = new IngestionPipeline({
      summarizer: this._summarizer,
      parse: { fallbackAct: options.act },
      logger: logger.child({ component: "ingestion" }),
    });
  }

  /**
   * Open the ledger behind `options.store` and build the service.
   *
   * @throws CorruptionDetectedError when verifyOnOpen is set and the stored chain is invalid
   */
  static async open(options: AmendmentServiceOptions): Promise<AmendmentService> {
    const logger = options.logger ?? pino({ level: "silent" });
    const ledger = await AmendmentLedger.open(options.store, {
      codec: amendmentPayloadCodec,
      clock: options.clock,
      appendTimeoutMs: options.appendTimeoutMs,
      maxRecords: options.maxRecords,
      verifyOnOpen: options.verifyOnOpen,
      logger: logger.child({ component: "ledger" }),
    });
    return new AmendmentService(ledger, options, logger);
  }

  // ─── Amendments ────────────────────────────────────────────────────

  /**
   * Append one amendment.
   *
   * The summary defaults to a plain-language rendering of the content,
   * and previousContent to the content of the act's latest amendment.
   * Writes through the service run one at a time, so that lookup sees
   * every amendment appended before this one.
   */
  recordAmendment(input: RecordAmendmentDto): Promise<AmendmentView> {
    return this._writeLock.runExclusive(() => this._record(input));
  }

  private async _record(input: RecordAmendmentDto): Promise<AmendmentView> {
    const actId = input.actId ?? this.act.actId;
    const actTitle = input.actTitle ?? (input.actId === undefined ? this.act.actTitle : undefined);
    const previousContent = input.previousContent ?? (await this._latestFor(actId))?.content;

    const payload: AmendmentPayload = {
      actId,
      actTitle,
      changeType: input.changeType,
      content: input.content,
      author: input.author,
      summary: input.summary ?? this._summarizer.summarize(input.content),
      previousContent,
    };

    const record = await this.ledger.append(payload, input.timestamp);
    this.audit.append({
      action: "record",
      resourceType: "amendment",
      resourceId: String(record.sequenceNumber),
      actor: input.author,
      detail: actId,
    });
    return toView(record, this.ledger.decode(record));
  }

  async listAmendments(filter: AmendmentFilter = {}): Promise<AmendmentView[]> {
    const views = await this._views();
    return views.filter(
      ({ amendment }) =>
        (filter.author === undefined || amendment.author === filter.author) &&
        (filter.changeType === undefined || amendment.changeType === filter.changeType) &&
        (filter.actId === undefined || amendment.actId === filter.actId),
    );
  }

  async getAmendment(sequenceNumber: number): Promise<AmendmentView | undefined> {
    const record = await this.ledger.get(sequenceNumber);
    return record === undefined ? undefined : toView(record, await this._decode(record));
  }

  /**
   * Line-level change an amendment made against its previous content.
   */
  async diff(sequenceNumber: number): Promise<AmendmentDiff | undefined> {
    const view = await this.getAmendment(sequenceNumber);
    if (view === undefined) return undefined;
    const { amendment } = view;
    return {
      sequenceNumber,
      actId: amendment.actId,
      diff: diffLines(amendment.previousContent ?? "", amendment.content),
    };
  }

  /**
   * Case-insensitive substring search over content and summary.
   */
  async search(query: string, limit?: number): Promise<AmendmentView[]> {
    const needle = query.toLowerCase();
    const matches = (await this._views()).filter(
      ({ amendment }) =>
        amendment.content.toLowerCase().includes(needle) ||
        amendment.summary.toLowerCase().includes(needle),
    );
    return limit === undefined ? matches : matches.slice(0, limit);
  }

  // ─── Verification & Statistics ─────────────────────────────────────

  verify(mode: VerificationMode = "full"): Promise<VerificationResult> {
    return this.ledger.verify({ mode });
  }

  async statistics(): Promise<AmendmentStatistics> {
    const byChangeType: Record<ChangeType, number> = { substantive: 0, editorial: 0 };
    const byAuthor = new Map<string, number>();
    let undecodable = 0;

    for (const record of await this.ledger.read()) {
      let amendment: AmendmentPayload;
      try {
        amendment = this.ledger.decode(record);
      } catch (err) {
        if (!(err instanceof LedgerError)) throw err;
        undecodable += 1;
        continue;
      }
      byChangeType[amendment.changeType] += 1;
      byAuthor.set(amendment.author, (byAuthor.get(amendment.author) ?? 0) + 1);
    }

    if (undecodable > 0) {
      this._logger.warn(
        { event: "service.undecodable_records", undecodable },
        "Statistics skipped stored payloads that do not decode",
      );
    }

    return {
      ...this.ledger.statistics(),
      act: this.act,
      byChangeType,
      byAuthor: Object.fromEntries(byAuthor),
      undecodable,
    };
  }

  // ─── Export ────────────────────────────────────────────────────────

  /**
   * Every stored record as written, with a full verification.
   */
  async exportLedger(): Promise<LedgerExport> {
    const records = await this.ledger.read();
    const verification = await this.ledger.verify({ mode: "full" });
    return {
      act: this.act,
      exportedAt: new Date(this._clock()).toISOString(),
      head: this.ledger.head() ?? null,
      verification,
      records,
    };
  }

  // ─── Ingestion ─────────────────────────────────────────────────────

  /**
   * Parse an XML document and append its amendments.
   *
   * @throws IngestionError when the document cannot be parsed
   */
  async ingest(xml: string): Promise<IngestionReport> {
    const report = await this._writeLock.runExclusive(() =>
      this._pipeline.ingest(xml, this.ledger),
    );
    this.audit.append({
      action: "ingest",
      resourceType: "act",
      resourceId: report.actId,
      actor: "ingestion",
      detail:
        report.failed === undefined
          ? `${report.appended.length} appended`
          : `${report.appended.length} appended, stopped at amendment ${report.failed.index}`,
    });
    return report;
  }

  // ─── Administration ────────────────────────────────────────────────

  async reset(request: ResetRequest): Promise<ResetReceipt> {
    const receipt = await this.ledger.reset(request);
    this.audit.append({
      action: "reset",
      resourceType: "ledger",
      resourceId: this.act.actId,
      actor: request.actor,
      detail: request.reason,
    });
    return receipt;
  }

  // ─── Health ────────────────────────────────────────────────────────

  /**
   * Ready while an incremental verification passes.
   */
  async readiness(): Promise<Readiness> {
    let verification: VerificationResult;
    try {
      verification = await this.ledger.verify({ mode: "incremental" });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this._logger.warn({ event: "service.readiness_failed", reason }, "Readiness check failed");
      return { ready: false, reason };
    }
    if (!verification.valid) {
      return { ready: false, verification, reason: verification.detail ?? "Chain is invalid" };
    }
    return { ready: true, verification };
  }

  // ─── Internals ─────────────────────────────────────────────────────

  /**
   * Decode a stored payload. One the codec refuses was altered in storage.
   *
   * @throws CorruptionDetectedError when a full verification finds the defect
   * @throws LedgerError CORRUPTION_DETECTED when the chain verifies regardless
   */
  private async _decode(record: AmendmentRecord): Promise<AmendmentPayload> {
    try {
      return this.ledger.decode(record);
    } catch (err) {
      if (!(err instanceof LedgerError) || err.code !== "INVALID_PAYLOAD") {
        throw err;
      }
      const verification = await this.ledger.verify({ mode: "full" });
      if (!verification.valid) {
        throw new CorruptionDetectedError(verification);
      }
      throw new LedgerError(
        "CORRUPTION_DETECTED",
        `Stored payload at sequence ${record.sequenceNumber} does not decode: ${err.message}`,
        record.sequenceNumber,
        { cause: err },
      );
    }
  }

  private async _views(): Promise<AmendmentView[]> {
    const views: AmendmentView[] = [];
    for (const record of await this.ledger.read()) {
      views.push(toView(record, await this._decode(record)));
    }
    return views;
  }

  private async _latestFor(actId: string): Promise<AmendmentPayload | undefined> {
    const records = await this.ledger.read();
    for (let i = records.length - 1; i >= 0; i--) {
      const record = records[i];
      if (record === undefined) continue;
      const amendment = await this._decode(record);
      if (amendment.actId === actId) return amendment;
    }
    return undefined;
  }
}
