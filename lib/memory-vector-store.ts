import { cosineSimilarity, type Embedder } from './embeddings';
import { matchesFilter, type FilterExpr } from './vector-filter';
import { rankChunks, type VectorIndex } from './vector-store';
import type { IndexedChunk, ScoredChunk } from './types';

interface StoredVector {
  chunk: IndexedChunk;
  embedding: number[];
}

export interface MemoryVectorStoreOptions {
  /** When false, deletion behaves like a store without metadata-filtered deletes. */
  supportsFilteredDelete?: boolean;
}

export class MemoryVectorStore implements VectorIndex {
  private readonly vectors = new Map<string, StoredVector>();
  private readonly supportsFilteredDelete: boolean;

  constructor(
    private readonly embedder: Embedder,
    options: MemoryVectorStoreOptions = {},
  ) {
    this.supportsFilteredDelete = options.supportsFilteredDelete ?? true;
  }

  get size(): number {
    return this.vectors.size;
  }

  async index(chunks: IndexedChunk[]): Promise<void> {
    if (chunks.length === 0) return;

    const embeddings = await this.embedder.embedDocuments(chunks.map(chunk => chunk.content));
    chunks.forEach((chunk, i) => {
      this.vectors.set(chunk.id, { chunk: structuredClone(chunk), embedding: embeddings[i] });
    });
    console.log(`[VECTORS] Indexed ${chunks.length} chunks (${this.vectors.size} total)`);
  }

  async search(query: string, k: number, filter: FilterExpr): Promise<ScoredChunk[]> {
    const candidates = [...this.vectors.values()].filter(({ chunk }) => matchesFilter(filter, chunk.metadata));
    if (candidates.length === 0 || k <= 0) {
      return [];
    }

    const queryEmbedding = await this.embedder.embedQuery(query);
    const scored = candidates.map(({ chunk, embedding }) => ({
      ...structuredClone(chunk),
      score: cosineSimilarity(queryEmbedding, embedding),
    }));
    return rankChunks(scored).slice(0, k);
  }

  async deleteByDocument(documentId: string): Promise<void> {
    if (!this.supportsFilteredDelete) {
      console.warn(`[VECTORS] Filtered deletion unsupported; vectors for document ${documentId} were left in place`);
      return;
    }

    let removed = 0;
    for (const [id, { chunk }] of this.vectors) {
      if (chunk.metadata.documentId === documentId) {
        this.vectors.delete(id);
        removed++;
      }
    }
    console.log(`[VECTORS] Deleted ${removed} vectors for document ${documentId}`);
  }
}
