/**
 * @lexledger/ledger: Payload codecs.
 *
 * The ledger stores and hashes the encoded payload string, never the
 * caller's value, so the hash does not depend on payload structure.
 * A codec must be deterministic: equal values encode to equal strings.
 */

import { canonicalize } from "json-canonicalize";
import { isAmendmentPayload } from "@lexledger/types";
import type { AmendmentPayload } from "@lexledger/types";
import { LedgerError } from "./errors.js";

export interface PayloadCodec<T> {
  encode(value: T): string;
  decode(encoded: string): T;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function constructorName(value: object): string {
  return typeof value.constructor === "function" && value.constructor.name !== ""
    ? value.constructor.name
    : "object";
}

/**
 * Copy a value into plain JSON, dropping object members set to undefined.
 *
 * Anything JSON cannot represent (functions, symbols, bigints, NaN,
 * Infinity, undefined array items, objects other than plain ones such
 * as Date, Map or class instances) is rejected rather than coerced,
 * since coercion would let two different values hash alike.
 */
function toJsonValue(value: unknown, path: string): unknown {
  if (value === null) return null;
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      if (!Number.isFinite(value)) {
        throw new LedgerError("INVALID_PAYLOAD", `Non-finite number at ${path}`);
      }
      return value;
    case "object": {
      if (Array.isArray(value)) {
        return value.map((item: unknown, i) => toJsonValue(item, `${path}[${i}]`));
      }
      if (!isPlainObject(value)) {
        throw new LedgerError(
          "INVALID_PAYLOAD",
          `Object of type ${constructorName(value)} at ${path} cannot be encoded`,
        );
      }
      // fromEntries keeps a "__proto__" key as an own member
      return Object.fromEntries(
        Object.entries(value)
          .filter(([, item]) => item !== undefined)
          .map(([key, item]) => [key, toJsonValue(item, `${path}.${key}`)]),
      );
    }
    default:
      throw new LedgerError(
        "INVALID_PAYLOAD",
        `Value of type ${typeof value} at ${path} cannot be encoded`,
      );
  }
}

/**
 * RFC 8785 canonical JSON codec. `validate` narrows decoded values.
 */
export function createJsonCodec<T>(
  validate: (value: unknown) => value is T,
): PayloadCodec<T> {
  return {
    encode(value: T): string {
      return canonicalize(toJsonValue(value, "$"));
    },
    decode(encoded: string): T {
      let parsed: unknown;
      try {
        parsed = JSON.parse(encoded);
      } catch (err) {
        throw new LedgerError("INVALID_PAYLOAD", "Payload is not valid JSON", undefined, {
          cause: err,
        });
      }
      if (!validate(parsed)) {
        throw new LedgerError("INVALID_PAYLOAD", "Payload failed validation");
      }
      return parsed;
    },
  };
}

/**
 * Default codec for untyped JSON payloads.
 */
export const jsonPayloadCodec: PayloadCodec<unknown> = createJsonCodec(
  (value: unknown): value is unknown => true,
);

/**
 * Codec for amendment payloads; decode checks the payload shape.
 */
export const amendmentPayloadCodec: PayloadCodec<AmendmentPayload> =
  createJsonCodec(isAmendmentPayload);
