import type { Index, RecordMetadata, ScoredPineconeRecord } from '@pinecone-database/pinecone';
import type { Embedder } from './embeddings';
import { IndexWriteError, VectorDeleteUnsupportedError, errorMessage } from './errors';
import { toPineconeFilter, type FilterExpr } from './vector-filter';
import { rankChunks, type VectorIndex } from './vector-store';
import type { ChunkMetadata, IndexedChunk, ScoredChunk } from './types';

const BATCH_SIZE = 100;

export type PineconeIndex = Pick<Index, 'upsert' | 'query' | 'deleteMany' | 'listPaginated'>;

function isUnsupportedOperation(error: unknown): boolean {
  return /not support|unsupported/i.test(errorMessage(error));
}

function toRecordMetadata(chunk: IndexedChunk): RecordMetadata {
  const { projectId, documentId, documentName, chunkIndex, chunkId, pageNumber } = chunk.metadata;
  const metadata: RecordMetadata = { content: chunk.content, projectId, documentId, documentName, chunkIndex, chunkId };
  if (pageNumber !== undefined) {
    metadata.pageNumber = pageNumber;
  }
  return metadata;
}

function toScoredChunk(match: ScoredPineconeRecord<RecordMetadata>): ScoredChunk | null {
  const metadata = match.metadata;
  if (!metadata) return null;

  const { content, projectId, documentId, documentName, chunkIndex, chunkId, pageNumber } = metadata;
  if (
    typeof content !== 'string' ||
    typeof projectId !== 'string' ||
    typeof documentId !== 'string' ||
    typeof documentName !== 'string' ||
    typeof chunkIndex !== 'number' ||
    typeof chunkId !== 'string'
  ) {
    return null;
  }

  const chunkMetadata: ChunkMetadata = { projectId, documentId, documentName, chunkIndex, chunkId };
  if (typeof pageNumber === 'number') {
    chunkMetadata.pageNumber = pageNumber;
  }
  return { id: match.id, content, metadata: chunkMetadata, score: match.score ?? 0 };
}

export class PineconeVectorStore implements VectorIndex {
  constructor(
    private readonly pinecone: PineconeIndex,
    private readonly embedder: Embedder,
  ) {}

  async index(chunks: IndexedChunk[]): Promise<void> {
    if (chunks.length === 0) return;

    const embeddings = await this.embedder.embedDocuments(chunks.map(chunk => chunk.content));
    const records = chunks.map((chunk, i) => ({
      id: chunk.id,
      values: embeddings[i],
      metadata: toRecordMetadata(chunk),
    }));

    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);
      try {
        await this.pinecone.upsert(batch);
      } catch (error) {
        console.error(`[PINECONE] Upsert failed for records ${i + 1} to ${i + batch.length}:`, error);
        throw new IndexWriteError(`Pinecone upsert failed: ${errorMessage(error)}`, error);
      }
      console.log(`[PINECONE] Upserted records ${i + 1} to ${i + batch.length} of ${records.length}`);
    }
  }

  async search(query: string, k: number, filter: FilterExpr): Promise<ScoredChunk[]> {
    if (k <= 0) return [];

    const vector = await this.embedder.embedQuery(query);
    const results = await this.pinecone.query({
      vector,
      topK: k,
      filter: toPineconeFilter(filter),
      includeMetadata: true,
    });

    const chunks: ScoredChunk[] = [];
    for (const match of results.matches) {
      const chunk = toScoredChunk(match);
      if (chunk) {
        chunks.push(chunk);
      } else {
        console.warn(`[PINECONE] Skipping match ${match.id} with malformed metadata`);
      }
    }
    console.log(`[PINECONE] Found ${chunks.length} matches, top score: ${chunks[0]?.score}`);
    return rankChunks(chunks);
  }

  async deleteByDocument(documentId: string): Promise<void> {
    try {
      await this.deleteVectors(documentId);
    } catch (error) {
      if (!(error instanceof VectorDeleteUnsupportedError)) throw error;
      console.warn(`[PINECONE] ${error.message}; vectors for document ${documentId} remain indexed`);
    }
  }

  private async deleteVectors(documentId: string): Promise<void> {
    try {
      await this.pinecone.deleteMany({ documentId: { $eq: documentId } });
      console.log(`[PINECONE] Deleted vectors for document ${documentId} by metadata filter`);
      return;
    } catch (error) {
      if (!isUnsupportedOperation(error)) {
        throw new IndexWriteError(`Pinecone delete failed for document ${documentId}: ${errorMessage(error)}`, error);
      }
      console.log('[PINECONE] Metadata-filtered delete unavailable, falling back to id prefix listing');
    }

    try {
      const removed = await this.deleteByIdPrefix(`${documentId}:`);
      console.log(`[PINECONE] Deleted ${removed} vectors for document ${documentId} by id prefix`);
    } catch (error) {
      if (!isUnsupportedOperation(error)) {
        throw new IndexWriteError(`Pinecone delete failed for document ${documentId}: ${errorMessage(error)}`, error);
      }
      throw new VectorDeleteUnsupportedError('Index supports neither metadata-filtered nor prefix deletion', error);
    }
  }

  private async deleteByIdPrefix(prefix: string): Promise<number> {
    let removed = 0;
    let paginationToken: string | undefined;
    do {
      const page = await this.pinecone.listPaginated({ prefix, paginationToken });
      const ids = (page.vectors ?? []).flatMap(vector => (vector.id ? [vector.id] : []));
      for (let i = 0; i < ids.length; i += BATCH_SIZE) {
        await this.pinecone.deleteMany(ids.slice(i, i + BATCH_SIZE));
      }
      removed += ids.length;
      paginationToken = page.pagination?.next;
    } while (paginationToken);
    return removed;
  }
}
