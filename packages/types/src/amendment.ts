/**
 * Amendment Types
 *
 * The payload recorded for each change to a legal act.
 *
 * Rules:
 * - One payload per logical amendment event
 * - Payloads are plain JSON values (canonically encodable)
 * - The ledger never interprets these fields; meaning lives here
 */

/**
 * Kind of change an amendment makes to an act.
 *
 * - substantive: changes rights, duties or sanctions
 * - editorial: wording, numbering or formatting only
 */
export type ChangeType = "substantive" | "editorial";

/**
 * Identifies the legal act an amendment belongs to.
 */
export interface ActRef {
  /** Stable identifier, e.g. "DU-2024-1234" */
  readonly actId: string;

  /** Human-readable title, when known */
  readonly actTitle?: string;
}

/**
 * A single amendment to a legal act, as handed to the ledger.
 */
export interface AmendmentPayload extends ActRef {
  readonly changeType: ChangeType;

  /** Normalized text of the amended provision */
  readonly content: string;

  /** Who enacted or submitted the change */
  readonly author: string;

  /** Plain-language summary of the change */
  readonly summary: string;

  /** Text of the provision before this amendment, if the source had one */
  readonly previousContent?: string;
}
