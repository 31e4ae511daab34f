/**
 * @lexledger/types: Shared amendment types for the lexledger stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in the ledger; meaning lives here
 */

export type { ChangeType, ActRef, AmendmentPayload } from "./amendment.js";

export { isRecord, isChangeType, isAmendmentPayload } from "./guards.js";
