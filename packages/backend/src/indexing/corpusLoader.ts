import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { CorpusDocument } from "@siteqa/shared";
import { CorpusError, describeError } from "../errors.js";
import { logger } from "../utils/logger.js";
import { cleanText, contentHash } from "../utils/text.js";

const crawledPageSchema = z.object({
  url: z.string().min(1),
  title: z.string().nullish(),
  content: z.string().nullish(),
  id: z.string().min(1).optional(),
  state: z.string().optional()
});

const corpusSchema = z.array(crawledPageSchema);

export type CrawledPage = z.infer<typeof crawledPageSchema>;

export interface LoadCorpusOptions {
  /** Pages whose cleaned content is shorter than this are skipped. */
  minLength?: number;
}

export function toCorpusDocuments(pages: readonly CrawledPage[], options: LoadCorpusOptions = {}): CorpusDocument[] {
  const minLength = options.minLength ?? 50;
  const documents: CorpusDocument[] = [];
  const seen = new Set<string>();

  for (const page of pages) {
    const text = cleanText(page.content ?? "");
    if (text.length < minLength) {
      logger.debug({ url: page.url, length: text.length }, "Skipping page with too little content");
      continue;
    }

    const id = page.id ?? contentHash(page.url);
    if (seen.has(id)) {
      throw new CorpusError(`Duplicate document id in corpus: ${id} (${page.url})`);
    }
    seen.add(id);

    const title = cleanText(page.title ?? "");
    documents.push({
      id,
      title: title.length > 0 ? title : "Untitled",
      url: page.url,
      text
    });
  }

  return documents;
}

export async function loadCorpus(path: string, options: LoadCorpusOptions = {}): Promise<CorpusDocument[]> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new CorpusError(`Cannot read corpus file ${path}: ${describeError(error)}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new CorpusError(`Corpus file ${path} is not valid JSON: ${describeError(error)}`, { cause: error });
  }

  const parsed = corpusSchema.safeParse(json);
  if (!parsed.success) {
    throw new CorpusError(`Corpus file ${path} has an unexpected shape`, { cause: parsed.error });
  }

  const documents = toCorpusDocuments(parsed.data, options);
  logger.info({ path, pages: parsed.data.length, documents: documents.length }, "Corpus loaded");
  return documents;
}
