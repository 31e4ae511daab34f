/**
 * @lexledger/ingestion: Legal document parser.
 *
 * Reads one act and its amendments from XML:
 *
 *   <LegalAct id="DU-2024-17" title="...">
 *     <Amendments>
 *       <Amendment>
 *         <Version>2</Version>
 *         <Content>...</Content>
 *         <Author>...</Author>
 *         <Date>2024-03-01</Date>
 *         <Type>substantive|editorial</Type>
 *         <Summary>...</Summary>
 *       </Amendment>
 *     </Amendments>
 *   </LegalAct>
 *
 * `<Act>` is accepted as the root as well. Every child of <Amendment>
 * except <Content> is optional.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { isChangeType, isRecord } from "@lexledger/types";
import type { ChangeType } from "@lexledger/types";
import { IngestionError } from "./errors.js";
import type { ParseOptions, ParsedAmendment, ParsedDocument } from "./types.js";

const ROOT_ELEMENTS = ["LegalAct", "Act"] as const;

const DEFAULT_AUTHOR = "Unknown";
const DEFAULT_CHANGE_TYPE: ChangeType = "substantive";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (tagName) => tagName === "Amendment",
});

/**
 * Text of a parsed element: a plain string, or the #text of an element
 * that also carries attributes. Repeated elements have no single text.
 */
function textOf(node: unknown): string | undefined {
  if (typeof node === "string") return node;
  if (typeof node === "number" || typeof node === "boolean") return String(node);
  if (isRecord(node)) return textOf(node["#text"]);
  return undefined;
}

function optionalText(node: unknown): string | undefined {
  const text = textOf(node)?.trim();
  return text === undefined || text.length === 0 ? undefined : text;
}

function findRoot(document: unknown): Record<string, unknown> | undefined {
  if (!isRecord(document)) return undefined;
  for (const name of ROOT_ELEMENTS) {
    const root = document[name];
    if (isRecord(root)) return root;
    // An empty root parses as ""
    if (root === "") return {};
  }
  return undefined;
}

function parseDate(raw: string | undefined, index: number): number | undefined {
  if (raw === undefined) return undefined;
  const ms = Date.parse(raw);
  if (Number.isNaN(ms)) {
    throw new IngestionError(
      "INVALID_AMENDMENT",
      `Amendment ${index} has an unreadable date "${raw}"`,
      index,
    );
  }
  // Ledger timestamps count from the epoch
  if (ms < 0) {
    throw new IngestionError(
      "INVALID_AMENDMENT",
      `Amendment ${index} has a date before 1970-01-01 "${raw}"`,
      index,
    );
  }
  return ms;
}

function parseAmendment(node: unknown, index: number): ParsedAmendment {
  if (!isRecord(node)) {
    throw new IngestionError("INVALID_AMENDMENT", `Amendment ${index} has no content`, index);
  }

  const content = optionalText(node.Content);
  if (content === undefined) {
    throw new IngestionError("INVALID_AMENDMENT", `Amendment ${index} has no content`, index);
  }

  const rawType = optionalText(node.Type)?.toLowerCase() ?? DEFAULT_CHANGE_TYPE;
  if (!isChangeType(rawType)) {
    throw new IngestionError(
      "INVALID_AMENDMENT",
      `Amendment ${index} has unknown type "${rawType}"`,
      index,
    );
  }

  return {
    index,
    version: optionalText(node.Version) ?? String(index + 1),
    content,
    author: optionalText(node.Author) ?? DEFAULT_AUTHOR,
    changeType: rawType,
    date: parseDate(optionalText(node.Date), index),
    summary: optionalText(node.Summary),
  };
}

/**
 * Parse an XML legal document.
 *
 * @throws IngestionError MALFORMED_XML when the text is not well-formed XML
 * @throws IngestionError MISSING_ACT when there is no act root or act id
 * @throws IngestionError INVALID_AMENDMENT for an amendment without content,
 *   with an unknown type, an unreadable date or one before 1970
 */
export function parseLegalDocument(xml: string, options: ParseOptions = {}): ParsedDocument {
  if (xml.trim().length === 0) {
    throw new IngestionError("MALFORMED_XML", "Document is empty");
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { line, msg } = validation.err;
    throw new IngestionError("MALFORMED_XML", `Malformed XML at line ${line}: ${msg}`);
  }

  const document: unknown = parser.parse(xml);
  const root = findRoot(document);
  if (root === undefined) {
    throw new IngestionError("MISSING_ACT", "Document root must be <LegalAct> or <Act>");
  }

  const actId = optionalText(root["@_id"]) ?? options.fallbackAct?.actId;
  if (actId === undefined) {
    throw new IngestionError("MISSING_ACT", "Act has no id attribute");
  }
  const actTitle =
    optionalText(root["@_title"]) ?? optionalText(root.Title) ?? options.fallbackAct?.actTitle;

  const container = root.Amendments;
  const nodes: unknown[] = isRecord(container) && Array.isArray(container.Amendment)
    ? container.Amendment
    : [];

  return {
    actId,
    actTitle,
    amendments: nodes.map((node, index) => parseAmendment(node, index)),
  };
}
