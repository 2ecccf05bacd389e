import { describe, expect, it } from 'vitest';
import { MemoryBlobStorage, VercelBlobStorage } from './blob-storage';
import type { RagConfig } from './config';
import { createRagServices } from './container';
import { MemoryVectorStore } from './memory-vector-store';
import { PineconeVectorStore } from './pinecone-vector-store';
import { HashingEmbedder, ScriptedChatModel } from './testing/fakes';

const memoryConfig: RagConfig = {
  llmProvider: 'openai',
  openaiApiKey: 'test-openai-key',
  chatModel: 'gpt-4o',
  embeddingModel: 'text-embedding-3-small',
  vectorStore: 'memory',
  blobStorage: 'memory',
  maxFileSizeMb: 50,
  ingestion: { concurrency: 1, maxAttempts: 2, retryDelayMs: 0 },
};

describe('createRagServices', () => {
  it('wires an in-memory stack end to end', async () => {
    const model = new ScriptedChatModel();
    const services = createRagServices(memoryConfig, { embedder: new HashingEmbedder(), chatModel: model });
    expect(services.vectorIndex).toBeInstanceOf(MemoryVectorStore);
    expect(services.blobStorage).toBeInstanceOf(MemoryBlobStorage);

    const project = await services.projects.createProject({ name: 'Onboarding' });
    const document = await services.documents.ingestDocument(
      project.id,
      'welcome.md',
      'md',
      new TextEncoder().encode('# Welcome\n\nBadges are collected at the front desk.'),
    );
    await services.queue.onIdle();

    const chat = await services.chats.createChat(project.id);
    const turn = await services.chats.askQuestion(chat.id, 'Where do I collect my badge?');

    expect(turn.citations).toEqual({ 1: { documentId: document.id, documentTitle: 'welcome.md' } });
    expect(turn.chat.name).toBe('Scripted Title');
  });

  it('builds the Pinecone and Vercel Blob adapters from configuration', () => {
    const services = createRagServices({
      ...memoryConfig,
      vectorStore: 'pinecone',
      pinecone: { apiKey: 'test-pinecone-key', indexName: 'knowledge', namespace: 'tenant-a' },
      blobStorage: 'vercel',
      blobToken: 'test-blob-token',
    });

    expect(services.vectorIndex).toBeInstanceOf(PineconeVectorStore);
    expect(services.blobStorage).toBeInstanceOf(VercelBlobStorage);
  });

  it('fails fast when adapter settings are missing', () => {
    expect(() => createRagServices({ ...memoryConfig, vectorStore: 'pinecone' })).toThrow(
      'Pinecone settings are missing',
    );
  });
});
