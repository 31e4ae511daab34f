/**
 * @lexledger/ingestion: Line diff.
 *
 * Set semantics over lines: a line that appears in both versions is
 * unchanged wherever it sits. Trailing whitespace is ignored and blank
 * lines never count as changes.
 */

import type { LineDiff } from "./types.js";

function lineSet(text: string): string[] {
  const seen = new Set<string>();
  for (const raw of text.split("\n")) {
    const line = raw.trimEnd();
    if (line.length > 0) seen.add(line);
  }
  return [...seen];
}

export function diffLines(previous: string, next: string): LineDiff {
  const before = lineSet(previous);
  const after = lineSet(next);
  const beforeSet = new Set(before);
  const afterSet = new Set(after);

  const added = after.filter((line) => !beforeSet.has(line));
  const removed = before.filter((line) => !afterSet.has(line));

  return { added, removed, totalChanges: added.length + removed.length };
}
