import type { Chunk, ChunkingOptions, CorpusDocument } from "@siteqa/shared";
import { InvalidConfigError } from "../errors.js";
import { contentHash } from "../utils/text.js";

/** Boundaries tried in order, from paragraph down to word. */
const separators = ["\n\n", "\n", ". ", "! ", "? ", "; ", ": ", ", ", " "] as const;

export const defaultChunkingOptions: ChunkingOptions = {
  maxSize: 1000,
  overlap: 200,
  includeTitle: true,
  maxTitleLength: 100
};

export type ChunkSpan = [start: number, end: number];

export function validateChunkingOptions(options: ChunkingOptions): void {
  if (!Number.isInteger(options.maxSize) || options.maxSize <= 0) {
    throw new InvalidConfigError(`Chunk max size must be a positive integer, got ${options.maxSize}`);
  }
  if (!Number.isInteger(options.overlap) || options.overlap < 0) {
    throw new InvalidConfigError(`Chunk overlap must be a non-negative integer, got ${options.overlap}`);
  }
  if (options.overlap >= options.maxSize) {
    throw new InvalidConfigError(
      `Chunk overlap (${options.overlap}) must be smaller than the max chunk size (${options.maxSize})`
    );
  }
  if (!Number.isInteger(options.maxTitleLength) || options.maxTitleLength < 0) {
    throw new InvalidConfigError(
      `Max title length must be a non-negative integer, got ${options.maxTitleLength}`
    );
  }
}

export function formatTitlePrefix(title: string, maxTitleLength: number): string {
  const trimmed = title.trim();
  if (trimmed.length === 0 || maxTitleLength === 0) {
    return "";
  }

  let shown = trimmed;
  if (shown.length > maxTitleLength) {
    shown = maxTitleLength > 3
      ? `${shown.slice(0, maxTitleLength - 3)}...`
      : shown.slice(0, maxTitleLength);
  }
  return `[${shown}] `;
}

/**
 * Splits `text` into spans of at most `budget` characters. Each span after the first
 * starts exactly `overlap` characters before the previous one ended, or one unit
 * earlier where that would separate the halves of a surrogate pair.
 */
export function splitIntoSpans(text: string, budget: number, overlap: number): ChunkSpan[] {
  const spans: ChunkSpan[] = [];
  if (text.length === 0) {
    return spans;
  }

  let start = 0;
  while (text.length - start > budget) {
    const end = findCut(text, start, budget, overlap);
    spans.push([start, end]);
    let next = end - overlap;
    if (splitsSurrogatePair(text, next) && next - 1 > start) {
      next -= 1;
    }
    start = next;
  }
  spans.push([start, text.length]);

  return spans;
}

function findCut(text: string, start: number, budget: number, overlap: number): number {
  const hardEnd = start + budget;
  // a soft cut has to keep at least half the budget and clear the overlap window
  const minEnd = start + Math.max(overlap + 1, Math.ceil(budget / 2));

  for (const separator of separators) {
    const at = text.lastIndexOf(separator, hardEnd - separator.length);
    if (at === -1) {
      continue;
    }
    const end = at + separator.length;
    if (end >= minEnd) {
      return end;
    }
  }

  return splitsSurrogatePair(text, hardEnd) && hardEnd - 1 > start + overlap ? hardEnd - 1 : hardEnd;
}

function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) {
    return false;
  }
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

export class Chunker {
  readonly options: ChunkingOptions;

  constructor(options: Partial<ChunkingOptions> = {}) {
    this.options = {
      ...defaultChunkingOptions,
      ...options
    };
    validateChunkingOptions(this.options);
  }

  chunk(document: CorpusDocument): Chunk[] {
    const prefix = this.options.includeTitle
      ? formatTitlePrefix(document.title, this.options.maxTitleLength)
      : "";
    const budget = this.options.maxSize - prefix.length;
    if (budget <= this.options.overlap) {
      throw new InvalidConfigError(
        `Title prefix of ${prefix.length} characters leaves ${budget} characters per chunk, ` +
          `which does not exceed the overlap of ${this.options.overlap}`
      );
    }

    return splitIntoSpans(document.text, budget, this.options.overlap).map(([start, end], position) => {
      const text = prefix + document.text.slice(start, end);
      const chunk: Chunk = {
        id: `${document.id}:${start}`,
        documentId: document.id,
        documentTitle: document.title,
        text,
        startOffset: start,
        endOffset: end,
        position,
        hash: contentHash(text)
      };
      if (document.url !== undefined) {
        chunk.documentUrl = document.url;
      }
      return chunk;
    });
  }
}

export function chunkDocument(document: CorpusDocument, options: Partial<ChunkingOptions> = {}): Chunk[] {
  return new Chunker(options).chunk(document);
}
