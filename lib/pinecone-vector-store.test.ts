import { afterEach, describe, expect, it, vi } from 'vitest';
import { IndexWriteError } from './errors';
import { PineconeVectorStore, type PineconeIndex } from './pinecone-vector-store';
import { HashingEmbedder } from './testing/fakes';
import type { IndexedChunk } from './types';
import { scopeFilter } from './vector-filter';

function fakeIndex() {
  const upsert = vi.fn<PineconeIndex['upsert']>(async () => {});
  const query = vi.fn<PineconeIndex['query']>(async () => ({ matches: [], namespace: '' }));
  const deleteMany = vi.fn<PineconeIndex['deleteMany']>(async () => {});
  const listPaginated = vi.fn<PineconeIndex['listPaginated']>(async () => ({ vectors: [] }));
  const index: PineconeIndex = { upsert, query, deleteMany, listPaginated };
  return { index, upsert, query, deleteMany, listPaginated };
}

const chunk: IndexedChunk = {
  id: 'doc-1:1',
  content: 'Refunds are processed within five days.',
  metadata: {
    projectId: 'proj-1',
    documentId: 'doc-1',
    documentName: 'policy.pdf',
    chunkIndex: 1,
    chunkId: 'doc-1:1',
    pageNumber: 2,
  },
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('PineconeVectorStore', () => {
  it('upserts chunk text and identity as metadata', async () => {
    const { index, upsert } = fakeIndex();
    const store = new PineconeVectorStore(index, new HashingEmbedder());

    await store.index([chunk]);

    expect(upsert).toHaveBeenCalledTimes(1);
    const [records] = upsert.mock.calls[0];
    expect(records[0].id).toBe('doc-1:1');
    expect(records[0].metadata).toEqual({
      content: 'Refunds are processed within five days.',
      projectId: 'proj-1',
      documentId: 'doc-1',
      documentName: 'policy.pdf',
      chunkIndex: 1,
      chunkId: 'doc-1:1',
      pageNumber: 2,
    });
  });

  it('splits large upserts into batches of 100', async () => {
    const { index, upsert } = fakeIndex();
    const store = new PineconeVectorStore(index, new HashingEmbedder());
    const many = Array.from({ length: 250 }, (_, i): IndexedChunk => ({
      ...chunk,
      id: `doc-1:${i + 1}`,
      metadata: { ...chunk.metadata, chunkIndex: i + 1, chunkId: `doc-1:${i + 1}` },
    }));

    await store.index(many);

    expect(upsert.mock.calls.map(([records]) => records.length)).toEqual([100, 100, 50]);
  });

  it('reports upsert failures as index write errors', async () => {
    const { index, upsert } = fakeIndex();
    upsert.mockRejectedValue(new Error('503 Service Unavailable'));
    const store = new PineconeVectorStore(index, new HashingEmbedder());

    await expect(store.index([chunk])).rejects.toBeInstanceOf(IndexWriteError);
  });

  it('queries with the compiled filter and skips malformed matches', async () => {
    const { index, query } = fakeIndex();
    query.mockResolvedValue({
      namespace: '',
      matches: [
        { id: 'doc-1:1', score: 0.4, metadata: { ...chunk.metadata, content: chunk.content } },
        { id: 'broken', score: 0.9, metadata: { projectId: 'proj-1' } },
      ],
    });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = new PineconeVectorStore(index, new HashingEmbedder());

    const results = await store.search('refunds', 3, scopeFilter('proj-1', ['doc-1']));

    expect(query).toHaveBeenCalledWith(
      expect.objectContaining({
        topK: 3,
        includeMetadata: true,
        filter: { $and: [{ projectId: { $eq: 'proj-1' } }, { documentId: { $in: ['doc-1'] } }] },
      }),
    );
    expect(results).toEqual([{ ...chunk, score: 0.4 }]);
  });

  it('deletes by metadata filter', async () => {
    const { index, deleteMany, listPaginated } = fakeIndex();
    const store = new PineconeVectorStore(index, new HashingEmbedder());

    await store.deleteByDocument('doc-1');

    expect(deleteMany).toHaveBeenCalledWith({ documentId: { $eq: 'doc-1' } });
    expect(listPaginated).not.toHaveBeenCalled();
  });

  it('falls back to listing ids by prefix', async () => {
    const { index, deleteMany, listPaginated } = fakeIndex();
    deleteMany.mockRejectedValueOnce(new Error('Delete by metadata is not supported by serverless indexes'));
    listPaginated
      .mockResolvedValueOnce({ vectors: [{ id: 'doc-1:1' }, { id: 'doc-1:2' }], pagination: { next: 'page-2' } })
      .mockResolvedValueOnce({ vectors: [{ id: 'doc-1:3' }] });
    const store = new PineconeVectorStore(index, new HashingEmbedder());

    await store.deleteByDocument('doc-1');

    expect(listPaginated.mock.calls).toEqual([
      [{ prefix: 'doc-1:', paginationToken: undefined }],
      [{ prefix: 'doc-1:', paginationToken: 'page-2' }],
    ]);
    expect(deleteMany.mock.calls.slice(1)).toEqual([[['doc-1:1', 'doc-1:2']], [['doc-1:3']]]);
  });

  it('warns instead of failing when the index supports neither deletion mode', async () => {
    const { index, deleteMany, listPaginated } = fakeIndex();
    deleteMany.mockRejectedValue(new Error('Delete by metadata is not supported'));
    listPaginated.mockRejectedValue(new Error('List is unsupported for pod-based indexes'));
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = new PineconeVectorStore(index, new HashingEmbedder());

    await expect(store.deleteByDocument('doc-1')).resolves.toBeUndefined();

    expect(warn).toHaveBeenCalledWith(
      '[PINECONE] Index supports neither metadata-filtered nor prefix deletion; vectors for document doc-1 remain indexed',
    );
  });

  it('raises other deletion failures', async () => {
    const { index, deleteMany } = fakeIndex();
    deleteMany.mockRejectedValue(new Error('connection reset'));
    const store = new PineconeVectorStore(index, new HashingEmbedder());

    await expect(store.deleteByDocument('doc-1')).rejects.toThrow(
      'Pinecone delete failed for document doc-1: connection reset',
    );
  });
});
