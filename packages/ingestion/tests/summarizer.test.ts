import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  loadPlainLanguageDictionary,
  PlainLanguageSummarizer,
} from "../src/summarizer.js";

describe("PlainLanguageSummarizer with the bundled dictionary", () => {
  const summarizer = new PlainLanguageSummarizer();

  it("replaces legal phrases with plain ones", () => {
    expect(summarizer.summarize("Obywatel powinien zawiadomić urząd zgodnie z artykułem 5.")).toBe(
      "Obywatel musi powiadomić urząd według artykułu 5.",
    );
  });

  it("replaces capitalised phrases with capitalised plain ones", () => {
    expect(summarizer.summarize("Grzywna wynosi 500 zł.")).toBe("Kara pieniężna wynosi 500 zł.");
  });

  it("normalises shouted headings", () => {
    expect(summarizer.summarize("ARTYKUŁ 5. Ustawa wchodzi w życie")).toBe(
      "Artykuł 5. Prawo zaczyna obowiązywać",
    );
  });

  it("prefers the longest phrase", () => {
    expect(summarizer.summarize("Kierowca nie powinien zwalniać.")).toBe(
      "Kierowca nie może zwalniać.",
    );
  });

  it("matches whole words only", () => {
    expect(summarizer.summarize("Zobaczył jegomość i jego psa.")).toBe(
      "Zobaczył jegomość i tego psa.",
    );
  });

  it("does not rewrite a replacement", () => {
    // wyznaczona → określona, and określona is itself a dictionary phrase
    expect(summarizer.summarize("Osoba wyznaczona oraz zastępca.")).toBe(
      "Osoba określona i zastępca.",
    );
  });

  it("puts the text on one line", () => {
    expect(summarizer.summarize("  Art.\n\n 5  ")).toBe("Art. 5");
  });

  it("gives a fixed text for blank input", () => {
    expect(summarizer.summarize(" \n\t")).toBe("No content");
  });

  it("cuts long text at a word boundary", () => {
    const summary = summarizer.summarize("abcd ".repeat(60));
    expect(summary).toBe(Array.from({ length: 40 }, () => "abcd").join(" ") + "...");
  });
});

describe("PlainLanguageSummarizer with a custom dictionary", () => {
  it("uses the given phrases", () => {
    const summarizer = new PlainLanguageSummarizer({
      dictionary: { replacements: { shall: "must" }, headings: {} },
    });
    expect(summarizer.summarize("The tenant shall pay. Shall the tenant")).toBe(
      "The tenant must pay. Must the tenant",
    );
  });

  it("truncates to the given length", () => {
    const summarizer = new PlainLanguageSummarizer({
      dictionary: { replacements: {}, headings: {} },
      maxLength: 10,
    });
    expect(summarizer.summarize("alpha beta gamma")).toBe("alpha...");
    expect(summarizer.summarize("abcdefghijkl")).toBe("abcdefghij...");
    expect(summarizer.summarize("alpha beta")).toBe("alpha beta");
  });
});

describe("loadPlainLanguageDictionary", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "lexledger-dict-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads the bundled dictionary", () => {
    const dictionary = loadPlainLanguageDictionary();
    expect(dictionary.replacements["grzywna"]).toBe("kara pieniężna");
    expect(dictionary.headings["USTAWA"]).toBe("Ustawa");
  });

  it("rejects a file with non-string entries", () => {
    const path = join(dir, "bad.json");
    writeFileSync(path, JSON.stringify({ replacements: { a: 1 }, headings: {} }));
    expect(() => loadPlainLanguageDictionary(path)).toThrow(
      `Invalid plain-language dictionary: ${path}`,
    );
  });
});
