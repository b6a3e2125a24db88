import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import type { Chunk, EmbeddingEntry, IndexMeta, IndexStore, PersistedIndex } from "@siteqa/shared";

export interface SqliteIndexStoreOptions {
  dbPath?: string;
}

interface ChunkRow {
  id: string;
  document_id: string;
  document_title: string;
  document_url: string | null;
  text: string;
  start_offset: number;
  end_offset: number;
  position: number;
  hash: string;
}

interface EmbeddingRow {
  chunk_id: string;
  dimension: number;
  vector: Buffer;
}

const indexMetaSchema = z.object({
  builtAt: z.coerce.date(),
  embeddingModel: z.string(),
  dimension: z.number().int().min(0),
  documentCount: z.number().int().min(0),
  chunking: z.object({
    maxSize: z.number().int(),
    overlap: z.number().int(),
    includeTitle: z.boolean(),
    maxTitleLength: z.number().int()
  })
});

const META_KEY = "current";

function encodeVector(vector: readonly number[]): Buffer {
  const floats = Float32Array.from(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

function decodeVector(blob: Buffer, dimension: number): number[] {
  const copy = new Uint8Array(blob.byteLength);
  copy.set(blob);
  return Array.from(new Float32Array(copy.buffer, 0, dimension));
}

function mapChunkRow(row: ChunkRow): Chunk {
  const chunk: Chunk = {
    id: row.id,
    documentId: row.document_id,
    documentTitle: row.document_title,
    text: row.text,
    startOffset: row.start_offset,
    endOffset: row.end_offset,
    position: row.position,
    hash: row.hash
  };
  if (row.document_url !== null) {
    chunk.documentUrl = row.document_url;
  }
  return chunk;
}

/** Chunks, Float32 embedding blobs and build metadata in one SQLite file. */
export class SqliteIndexStore implements IndexStore {
  private readonly db: Database.Database;

  constructor(options: SqliteIndexStoreOptions = {}) {
    const dbPath = resolve(options.dbPath ?? "data/index.db");
    mkdirSync(dirname(dbPath), { recursive: true });

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");

    this.initializeSchema();
  }

  close(): void {
    this.db.close();
  }

  async replace(index: PersistedIndex): Promise<void> {
    const insertChunk = this.db.prepare(
      `
      INSERT INTO chunks (id, document_id, document_title, document_url, text, start_offset, end_offset, position, hash)
      VALUES (@id, @document_id, @document_title, @document_url, @text, @start_offset, @end_offset, @position, @hash)
      `
    );
    const insertEmbedding = this.db.prepare(
      "INSERT INTO embeddings (chunk_id, dimension, vector) VALUES (?, ?, ?)"
    );
    const upsertMeta = this.db.prepare(
      `
      INSERT INTO index_meta (key, value) VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value
      `
    );

    this.db.transaction(() => {
      this.db.exec("DELETE FROM embeddings; DELETE FROM chunks;");
      for (const chunk of index.chunks) {
        insertChunk.run({
          id: chunk.id,
          document_id: chunk.documentId,
          document_title: chunk.documentTitle,
          document_url: chunk.documentUrl ?? null,
          text: chunk.text,
          start_offset: chunk.startOffset,
          end_offset: chunk.endOffset,
          position: chunk.position,
          hash: chunk.hash
        });
      }
      for (const entry of index.embeddings) {
        insertEmbedding.run(entry.chunkId, entry.vector.length, encodeVector(entry.vector));
      }
      upsertMeta.run(
        META_KEY,
        JSON.stringify({ ...index.meta, builtAt: index.meta.builtAt.toISOString() })
      );
    })();
  }

  async loadChunks(): Promise<Chunk[]> {
    return this.db
      .prepare<[], ChunkRow>(
        `
        SELECT id, document_id, document_title, document_url, text, start_offset, end_offset, position, hash
        FROM chunks
        ORDER BY rowid ASC
        `
      )
      .all()
      .map(mapChunkRow);
  }

  async loadEmbeddings(): Promise<EmbeddingEntry[]> {
    return this.db
      .prepare<[], EmbeddingRow>("SELECT chunk_id, dimension, vector FROM embeddings ORDER BY rowid ASC")
      .all()
      .map((row) => ({ chunkId: row.chunk_id, vector: decodeVector(row.vector, row.dimension) }));
  }

  async loadMeta(): Promise<IndexMeta | null> {
    const row = this.db
      .prepare<[string], { value: string }>("SELECT value FROM index_meta WHERE key = ?")
      .get(META_KEY);
    if (!row) {
      return null;
    }
    return indexMetaSchema.parse(JSON.parse(row.value));
  }

  async load(): Promise<PersistedIndex | null> {
    const meta = await this.loadMeta();
    if (!meta) {
      return null;
    }
    return {
      chunks: await this.loadChunks(),
      embeddings: await this.loadEmbeddings(),
      meta
    };
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chunks (
        id TEXT PRIMARY KEY,
        document_id TEXT NOT NULL,
        document_title TEXT NOT NULL,
        document_url TEXT,
        text TEXT NOT NULL,
        start_offset INTEGER NOT NULL,
        end_offset INTEGER NOT NULL,
        position INTEGER NOT NULL,
        hash TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS embeddings (
        chunk_id TEXT PRIMARY KEY REFERENCES chunks(id) ON DELETE CASCADE,
        dimension INTEGER NOT NULL,
        vector BLOB NOT NULL
      );

      CREATE TABLE IF NOT EXISTS index_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_chunks_document
      ON chunks(document_id);
    `);
  }
}
