import type { FilterExpr } from './vector-filter';
import type { IndexedChunk, ScoredChunk } from './types';

export interface VectorIndex {
  /** Embeds and stores the chunks; an empty list is a no-op. */
  index(chunks: IndexedChunk[]): Promise<void>;
  /** Up to `k` chunks matching `filter`, best match first. */
  search(query: string, k: number, filter: FilterExpr): Promise<ScoredChunk[]>;
  /**
   * Removes every vector of the document. Resolves without error when the
   * backing store cannot delete by metadata (logged as a warning).
   */
  deleteByDocument(documentId: string): Promise<void>;
}

export function compareChunks(a: ScoredChunk, b: ScoredChunk): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  if (a.metadata.documentId !== b.metadata.documentId) {
    return a.metadata.documentId < b.metadata.documentId ? -1 : 1;
  }
  return a.metadata.chunkIndex - b.metadata.chunkIndex;
}

/** Similarity descending; equal scores fall back to document id, then chunk index. */
export function rankChunks(chunks: ScoredChunk[]): ScoredChunk[] {
  return [...chunks].sort(compareChunks);
}
