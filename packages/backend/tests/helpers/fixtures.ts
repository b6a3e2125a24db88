import type { CorpusDocument, SessionTurn } from "@siteqa/shared";
import type { EmbeddingProvider } from "../../src/services/llmTypes.js";
import { IndexSnapshot, IndexSnapshotHolder } from "../../src/retrieval/IndexSnapshot.js";
import { LexicalIndex } from "../../src/retrieval/LexicalIndex.js";
import { VectorIndex } from "../../src/retrieval/VectorIndex.js";
import { Chunker } from "../../src/retrieval/Chunker.js";

export const scenarioDocuments: CorpusDocument[] = [
  {
    id: "doc-expertise",
    title: "Expertise",
    url: "https://example.test/expertise",
    text: "We build machine learning solutions for banks and insurers."
  },
  {
    id: "doc-pricing",
    title: "Pricing",
    url: "https://example.test/pricing",
    text: "Our plans start at 500 dollars per month. Contact sales for volume pricing."
  },
  {
    id: "doc-office",
    title: "Office",
    text: "Our main office is located in Berlin near the central station."
  }
];

export async function buildScenarioSnapshot(embedder: EmbeddingProvider): Promise<IndexSnapshot> {
  const chunker = new Chunker({ maxSize: 1000, overlap: 200 });
  const chunks = scenarioDocuments.flatMap((document) => chunker.chunk(document));
  const { index, entries } = await VectorIndex.build(chunks, embedder);
  return new IndexSnapshot(chunks, LexicalIndex.build(chunks), index, {
    builtAt: new Date("2026-01-01T00:00:00.000Z"),
    embeddingModel: "concept-test",
    dimension: entries[0]?.vector.length ?? 0,
    documentCount: scenarioDocuments.length,
    chunking: chunker.options
  });
}

export async function buildScenarioHolder(embedder: EmbeddingProvider): Promise<IndexSnapshotHolder> {
  return new IndexSnapshotHolder(await buildScenarioSnapshot(embedder));
}

export function makeTurn(question: string, answer: string, overrides: Partial<SessionTurn> = {}): SessionTurn {
  return {
    question,
    answer,
    timestamp: new Date("2026-01-01T00:00:00.000Z"),
    label: "in_domain",
    degraded: false,
    ...overrides
  };
}
