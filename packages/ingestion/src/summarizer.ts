/**
 * @lexledger/ingestion: Plain-language summaries.
 *
 * Rule-based: legal phrases are swapped for everyday words from a
 * dictionary, shouted headings are put in title case, and the result
 * is cut to a readable length. No remote calls.
 *
 * Replacement is a single pass that prefers the longest phrase at each
 * position and only matches whole words, so a replacement is never
 * itself rewritten.
 */

import { readFileSync } from "node:fs";
import { isRecord } from "@lexledger/types";

export const DEFAULT_MAX_SUMMARY_LENGTH = 200;

export const EMPTY_SUMMARY = "No content";

export interface PlainLanguageDictionary {
  /** Legal phrase → plain phrase; lower-case phrases also match capitalised */
  readonly replacements: Readonly<Record<string, string>>;

  /** Upper-case headings and their normal form, matched exactly */
  readonly headings: Readonly<Record<string, string>>;
}

export interface SummarizerOptions {
  /** Default: data/plain-language.json shipped with this package */
  readonly dictionary?: PlainLanguageDictionary;

  /** Default: 200 */
  readonly maxLength?: number;
}

const DEFAULT_DICTIONARY_URL = new URL("../data/plain-language.json", import.meta.url);

function isStringMap(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === "string");
}

/**
 * Read a dictionary file.
 *
 * @throws Error when the file does not hold `replacements` and `headings` string maps
 */
export function loadPlainLanguageDictionary(
  path: string | URL = DEFAULT_DICTIONARY_URL,
): PlainLanguageDictionary {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (!isRecord(parsed) || !isStringMap(parsed.replacements) || !isStringMap(parsed.headings)) {
    throw new Error(`Invalid plain-language dictionary: ${String(path)}`);
  }
  return { replacements: parsed.replacements, headings: parsed.headings };
}

function capitalize(text: string): string {
  const [first = "", ...rest] = Array.from(text);
  return first.toUpperCase() + rest.join("");
}

function isLowerCaseStart(text: string): boolean {
  const first = Array.from(text)[0] ?? "";
  return first !== first.toUpperCase();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function truncate(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) return text;
  const cut = chars.slice(0, maxLength).join("");
  const lastSpace = cut.lastIndexOf(" ");
  return (lastSpace > 0 ? cut.slice(0, lastSpace) : cut) + "...";
}

export class PlainLanguageSummarizer {
  private readonly _terms = new Map<string, string>();
  private readonly _pattern: RegExp | undefined;
  private readonly _maxLength: number;

  constructor(options: SummarizerOptions = {}) {
    const dictionary = options.dictionary ?? loadPlainLanguageDictionary();
    this._maxLength = options.maxLength ?? DEFAULT_MAX_SUMMARY_LENGTH;

    for (const [legal, plain] of Object.entries(dictionary.replacements)) {
      if (legal.length === 0 || legal === plain) continue;
      this._terms.set(legal, plain);
    }
    // Capitalised variants never override an explicit entry
    for (const [legal, plain] of Object.entries(dictionary.replacements)) {
      if (!isLowerCaseStart(legal)) continue;
      const variant = capitalize(legal);
      if (!this._terms.has(variant)) {
        this._terms.set(variant, capitalize(plain));
      }
    }
    for (const [heading, normal] of Object.entries(dictionary.headings)) {
      this._terms.set(heading, normal);
    }

    const alternatives = [...this._terms.keys()]
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp);
    this._pattern =
      alternatives.length > 0
        ? new RegExp(`(?<![\\p{L}\\p{N}])(?:${alternatives.join("|")})(?![\\p{L}\\p{N}])`, "gu")
        : undefined;
  }

  /**
   * Plain-language version of `text`, on one line.
   *
   * Blank input gives "No content".
   */
  summarize(text: string): string {
    const normalized = text.replace(/\s+/g, " ").trim();
    if (normalized.length === 0) return EMPTY_SUMMARY;

    const simple =
      this._pattern === undefined
        ? normalized
        : normalized.replace(this._pattern, (match) => this._terms.get(match) ?? match);

    return truncate(simple, this._maxLength);
  }
}
