import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
const stopwordsPath = resolve(__dirname, "../../resources/stopwords.json");

const stopwordsSchema = z.record(z.string(), z.array(z.string()));

const MIN_TOKEN_LENGTH = 3;
const lettersOnly = /^\p{L}+$/u;
const tokenSplitter = /[^\p{L}\p{N}]+/u;

let cachedStopwords: ReadonlySet<string> | null = null;

export function loadStopwords(path: string = stopwordsPath): ReadonlySet<string> {
  const parsed = stopwordsSchema.parse(JSON.parse(readFileSync(path, "utf8")));
  const words = new Set<string>();
  for (const list of Object.values(parsed)) {
    for (const word of list) {
      words.add(word.normalize("NFKC").toLowerCase());
    }
  }
  return words;
}

export function getStopwords(): ReadonlySet<string> {
  if (!cachedStopwords) {
    cachedStopwords = loadStopwords();
  }
  return cachedStopwords;
}

/**
 * Lowercased, letters-only terms of three or more characters, English and Russian
 * stop words removed. No stemming.
 */
export function tokenize(text: string, stopwords: ReadonlySet<string> = getStopwords()): string[] {
  return text
    .normalize("NFKC")
    .toLowerCase()
    .split(tokenSplitter)
    .filter(
      (token) => token.length >= MIN_TOKEN_LENGTH && lettersOnly.test(token) && !stopwords.has(token)
    );
}
