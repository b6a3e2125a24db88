import type { Bm25Params, ChunkingOptions, IndexStore } from "@siteqa/shared";
import { appConfig } from "../config.js";
import { IndexBuilder, loadSnapshot, type IndexBuilderOptions } from "../indexing/IndexBuilder.js";
import { HybridRetriever, type HybridRetrieverOptions } from "../retrieval/HybridRetriever.js";
import { IndexSnapshotHolder, type IndexSnapshot } from "../retrieval/IndexSnapshot.js";
import { InMemorySessionStore } from "../services/InMemorySessionStore.js";
import { LLMService } from "../services/LLMService.js";
import { QaService } from "../services/QaService.js";
import { QueryClassifier } from "../services/QueryClassifier.js";
import { SessionMemory } from "../services/SessionMemory.js";
import { SessionStore } from "../services/SessionStore.js";
import type { SessionStoreLike } from "../services/sessionStoreTypes.js";
import { SqliteIndexStore } from "../store/SqliteIndexStore.js";
import { logger } from "../utils/logger.js";

let llmServiceSingleton: LLMService | null = null;
let indexStoreSingleton: IndexStore | null = null;
let sessionMemorySingleton: SessionMemory | null = null;
let qaServiceSingleton: QaService | null = null;
let loadPromise: Promise<IndexSnapshot> | null = null;
const snapshotHolder = new IndexSnapshotHolder();

export function chunkingOptionsFromConfig(): ChunkingOptions {
  return {
    maxSize: appConfig.CHUNK_SIZE,
    overlap: appConfig.CHUNK_OVERLAP,
    includeTitle: appConfig.CHUNK_INCLUDE_TITLE,
    maxTitleLength: appConfig.CHUNK_MAX_TITLE_LENGTH
  };
}

export function bm25ParamsFromConfig(): Bm25Params {
  return { k1: appConfig.BM25_K1, b: appConfig.BM25_B };
}

export function getLLMServiceSingleton(): LLMService {
  if (!llmServiceSingleton) {
    llmServiceSingleton = LLMService.fromEnv();
  }
  return llmServiceSingleton;
}

export function getIndexStoreSingleton(): IndexStore {
  if (!indexStoreSingleton) {
    indexStoreSingleton = new SqliteIndexStore({ dbPath: appConfig.INDEX_DB_PATH });
  }
  return indexStoreSingleton;
}

export function getSnapshotHolder(): IndexSnapshotHolder {
  return snapshotHolder;
}

export function createIndexBuilder(store: IndexStore = getIndexStoreSingleton()): IndexBuilder {
  const llm = getLLMServiceSingleton();
  const options: IndexBuilderOptions = {
    chunking: chunkingOptionsFromConfig(),
    bm25: bm25ParamsFromConfig(),
    embeddingConcurrency: appConfig.EMBEDDING_CONCURRENCY,
    embeddingModel: llm.embeddingModel
  };
  if (appConfig.EMBEDDING_DIMENSIONS !== undefined) {
    options.embeddingDimensions = appConfig.EMBEDDING_DIMENSIONS;
  }
  return new IndexBuilder(store, llm, options);
}

/** Loads the persisted index into the shared holder once; a failed load can be retried. */
export function ensureIndexLoaded(): Promise<IndexSnapshot> {
  if (loadPromise) {
    return loadPromise;
  }

  loadPromise = reloadIndex().catch((error: unknown) => {
    loadPromise = null;
    throw error;
  });

  return loadPromise;
}

export async function reloadIndex(): Promise<IndexSnapshot> {
  const snapshot = await loadSnapshot(getIndexStoreSingleton(), bm25ParamsFromConfig());
  snapshotHolder.swap(snapshot);
  logger.info(snapshot.stats(), "Retrieval index loaded");
  return snapshot;
}

function createSessionStore(): SessionStoreLike {
  try {
    return new SessionStore({ dbPath: appConfig.SESSION_DB_PATH });
  } catch (error) {
    logger.warn(
      {
        error: error instanceof Error ? error.message : String(error)
      },
      "SQLite SessionStore unavailable, falling back to in-memory store"
    );
    return new InMemorySessionStore();
  }
}

export function getSessionMemorySingleton(): SessionMemory {
  if (!sessionMemorySingleton) {
    sessionMemorySingleton = new SessionMemory(createSessionStore(), {
      maxTurns: appConfig.SESSION_MAX_TURNS,
      ttlMs: appConfig.SESSION_TTL_HOURS * 60 * 60 * 1000
    });
  }
  return sessionMemorySingleton;
}

export function getQaServiceSingleton(): QaService {
  if (!qaServiceSingleton) {
    const llm = getLLMServiceSingleton();
    const organization = {
      name: appConfig.ORGANIZATION_NAME,
      profile: appConfig.ORGANIZATION_PROFILE
    };
    const retrieverOptions: Partial<HybridRetrieverOptions> = {
      topK: appConfig.RETRIEVAL_TOP_K,
      overfetchFactor: appConfig.OVERFETCH_FACTOR,
      rrfConstant: appConfig.RRF_K
    };
    if (appConfig.LEXICAL_TOP_K !== undefined) {
      retrieverOptions.lexicalTopK = appConfig.LEXICAL_TOP_K;
    }
    if (appConfig.VECTOR_TOP_K !== undefined) {
      retrieverOptions.vectorTopK = appConfig.VECTOR_TOP_K;
    }

    qaServiceSingleton = new QaService(
      new QueryClassifier(llm, { enabled: appConfig.CLASSIFIER_ENABLED, organization }),
      new HybridRetriever(snapshotHolder, llm, retrieverOptions),
      getSessionMemorySingleton(),
      llm,
      {
        organization,
        generationHistoryTurns: appConfig.GENERATION_HISTORY_TURNS,
        classifierHistoryTurns: appConfig.CLASSIFIER_HISTORY_TURNS,
        maxChunkContextLength: appConfig.MAX_CHUNK_CONTEXT_LENGTH,
        snippetLength: appConfig.SOURCE_SNIPPET_LENGTH
      }
    );
  }
  return qaServiceSingleton;
}
