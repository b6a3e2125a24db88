import { describe, expect, it } from "vitest";
import type { CorpusDocument } from "@siteqa/shared";
import { CorpusError, IndexNotBuiltError } from "../../../src/errors.js";
import { IndexBuilder, loadSnapshot, type IndexBuilderOptions } from "../../../src/indexing/IndexBuilder.js";
import { defaultBm25Params } from "../../../src/retrieval/LexicalIndex.js";
import { ConceptEmbedder } from "../../helpers/ConceptEmbedder.js";
import { scenarioDocuments } from "../../helpers/fixtures.js";
import { InMemoryIndexStore } from "../../helpers/InMemoryIndexStore.js";

const options: IndexBuilderOptions = {
  chunking: { maxSize: 1000, overlap: 200, includeTitle: true, maxTitleLength: 100 },
  bm25: defaultBm25Params,
  embeddingConcurrency: 2,
  embeddingModel: "concept-test"
};

describe("IndexBuilder", () => {
  it("chunks, embeds and persists the corpus", async () => {
    const store = new InMemoryIndexStore();
    const embedder = new ConceptEmbedder();

    const { snapshot, stats } = await new IndexBuilder(store, embedder, options).build(scenarioDocuments);

    expect(stats).toMatchObject({
      documentCount: 3,
      chunkCount: 3,
      duplicateChunks: 0,
      reusedEmbeddings: 0,
      embeddedChunks: 3,
      dimension: 5
    });
    expect(embedder.calls).toHaveLength(3);
    expect(store.replaceCalls).toBe(1);
    expect(snapshot.getChunk("doc-office:0")?.documentTitle).toBe("Office");
    expect((await store.loadMeta())?.embeddingModel).toBe("concept-test");
  });

  it("reuses vectors of unchanged chunks on rebuild", async () => {
    const store = new InMemoryIndexStore();
    const embedder = new ConceptEmbedder();
    const builder = new IndexBuilder(store, embedder, options);
    await builder.build(scenarioDocuments);

    const unchanged = await builder.build(scenarioDocuments);
    expect(unchanged.stats).toMatchObject({ reusedEmbeddings: 3, embeddedChunks: 0 });
    expect(embedder.calls).toHaveLength(3);

    const edited: CorpusDocument[] = scenarioDocuments.map((document) =>
      document.id === "doc-office" ? { ...document, text: "Our office moved to Hamburg." } : document
    );
    const partial = await builder.build(edited);
    expect(partial.stats).toMatchObject({ reusedEmbeddings: 2, embeddedChunks: 1 });
    expect(embedder.calls.at(-1)).toBe("[Office] Our office moved to Hamburg.");
  });

  it("re-embeds everything when the embedding model changes", async () => {
    const store = new InMemoryIndexStore();
    const embedder = new ConceptEmbedder();
    await new IndexBuilder(store, embedder, options).build(scenarioDocuments);

    const rebuilt = await new IndexBuilder(store, embedder, { ...options, embeddingModel: "other-model" }).build(
      scenarioDocuments
    );

    expect(rebuilt.stats.reusedEmbeddings).toBe(0);
    expect(embedder.calls).toHaveLength(6);
  });

  it("re-embeds chunks whose text changed only in case", async () => {
    const store = new InMemoryIndexStore();
    const embedder = new ConceptEmbedder();
    const builder = new IndexBuilder(store, embedder, options);
    await builder.build(scenarioDocuments);

    const recased: CorpusDocument[] = scenarioDocuments.map((document) =>
      document.id === "doc-office" ? { ...document, text: document.text.toLowerCase() } : document
    );
    const { stats } = await builder.build(recased);

    expect(stats).toMatchObject({ reusedEmbeddings: 2, embeddedChunks: 1 });
    expect(embedder.calls.at(-1)).toBe("[Office] our main office is located in berlin near the central station.");
  });

  it("re-embeds everything when the requested dimensions change", async () => {
    const store = new InMemoryIndexStore();
    const embedder = new ConceptEmbedder();
    await new IndexBuilder(store, embedder, { ...options, embeddingDimensions: 5 }).build(scenarioDocuments);

    const same = await new IndexBuilder(store, embedder, { ...options, embeddingDimensions: 5 }).build(
      scenarioDocuments
    );
    expect(same.stats.reusedEmbeddings).toBe(3);

    const resized = await new IndexBuilder(store, embedder, { ...options, embeddingDimensions: 8 }).build(
      scenarioDocuments
    );
    expect(resized.stats.reusedEmbeddings).toBe(0);
    expect(embedder.calls).toHaveLength(6);
  });

  it("drops chunks whose content repeats another document", async () => {
    const store = new InMemoryIndexStore();
    const copy = { id: "doc-pricing-copy", title: "Pricing", text: scenarioDocuments[1]?.text ?? "" };

    const { stats } = await new IndexBuilder(store, new ConceptEmbedder(), options).build([
      ...scenarioDocuments,
      copy
    ]);

    expect(stats).toMatchObject({ documentCount: 4, chunkCount: 3, duplicateChunks: 1 });
  });

  it("refuses to build an empty index", async () => {
    const builder = new IndexBuilder(new InMemoryIndexStore(), new ConceptEmbedder(), options);
    await expect(builder.build([])).rejects.toBeInstanceOf(CorpusError);
  });
});

describe("loadSnapshot", () => {
  it("fails until an index has been built", async () => {
    const store = new InMemoryIndexStore();
    await expect(loadSnapshot(store, defaultBm25Params)).rejects.toBeInstanceOf(IndexNotBuiltError);

    await new IndexBuilder(store, new ConceptEmbedder(), options).build(scenarioDocuments);
    const snapshot = await loadSnapshot(store, defaultBm25Params);

    expect(snapshot.stats()).toMatchObject({
      ready: true,
      chunkCount: 3,
      documentCount: 3,
      dimension: 5,
      embeddingModel: "concept-test"
    });
  });
});
