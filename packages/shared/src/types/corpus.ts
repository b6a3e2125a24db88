export interface CorpusDocument {
  id: string;
  title: string;
  url?: string;
  text: string;
}

export interface ChunkingOptions {
  maxSize: number;
  overlap: number;
  includeTitle: boolean;
  maxTitleLength: number;
}

/**
 * A contiguous slice of one document's text. `startOffset`/`endOffset` index the
 * source text (end exclusive); `text` may carry a title prefix on top of that slice.
 */
export interface Chunk {
  id: string;
  documentId: string;
  documentTitle: string;
  documentUrl?: string;
  text: string;
  startOffset: number;
  endOffset: number;
  position: number;
  hash: string;
}
