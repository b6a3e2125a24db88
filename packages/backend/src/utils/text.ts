import { createHash } from "node:crypto";

const typographicReplacements: ReadonlyArray<[RegExp, string]> = [
  [/[«»„“”]/g, "\""],
  [/[—–‒]/g, "-"],
  [/…/g, "..."]
];

/** Collapses whitespace and folds typographic quotes, dashes and ellipses to ASCII. */
export function cleanText(text: string): string {
  let cleaned = text.replace(/\s+/g, " ");
  for (const [pattern, replacement] of typographicReplacements) {
    cleaned = cleaned.replace(pattern, replacement);
  }
  return cleaned.trim();
}

export function contentHash(text: string, length = 16): string {
  const normalized = text.trim().toLowerCase().split(/\s+/).join(" ");
  return createHash("sha1").update(normalized).digest("hex").slice(0, length);
}

export function trimSnippet(content: string, maxLength: number): string {
  const normalized = content.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxLength) {
    return normalized;
  }
  return `${normalized.slice(0, maxLength)}...`;
}

/** Plain code-unit ordering, independent of locale. */
export function compareIds(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

export function byScoreThenId<T extends { chunkId: string; score: number }>(a: T, b: T): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  return compareIds(a.chunkId, b.chunkId);
}
