import { Pinecone } from '@pinecone-database/pinecone';
import OpenAI from 'openai';
import { AI_CONFIG } from './ai-config';
import { AnswerSynthesizer } from './answer-synthesizer';
import { MemoryBlobStorage, VercelBlobStorage, type BlobStorage } from './blob-storage';
import { ChatService } from './chat-service';
import { OpenAIChatModel, type ChatModel } from './chat-model';
import type { RagConfig } from './config';
import { DocumentService } from './document-service';
import { OpenAIEmbeddings, type Embedder } from './embeddings';
import { ConfigurationError } from './errors';
import { IngestionQueue } from './ingestion-queue';
import { KeyedMutex } from './keyed-mutex';
import { MemoryDatabase } from './memory-database';
import { MemoryVectorStore } from './memory-vector-store';
import { OpenRouterClient } from './openrouter-client';
import { PineconeVectorStore } from './pinecone-vector-store';
import { ProjectService } from './project-service';
import type { Database } from './repositories';
import { DocumentRetriever } from './retriever';
import { TextExtractor } from './text-extraction';
import { RecursiveTextSplitter } from './text-splitter';
import type { VectorIndex } from './vector-store';

/** Collaborators that can be swapped out, mainly by tests. */
export interface RagOverrides {
  embedder?: Embedder;
  chatModel?: ChatModel;
  vectorIndex?: VectorIndex;
  blobStorage?: BlobStorage;
  db?: Database;
  extractor?: TextExtractor;
  splitter?: RecursiveTextSplitter;
}

export interface RagServices {
  db: Database;
  vectorIndex: VectorIndex;
  blobStorage: BlobStorage;
  queue: IngestionQueue;
  retriever: DocumentRetriever;
  synthesizer: AnswerSynthesizer;
  documents: DocumentService;
  chats: ChatService;
  projects: ProjectService;
}

function createChatModel(config: RagConfig, client: () => OpenAI): ChatModel {
  if (config.llmProvider === 'openrouter') {
    if (!config.openrouter) {
      throw new ConfigurationError('OpenRouter settings are missing');
    }
    return new OpenRouterClient({ apiKey: config.openrouter.apiKey, model: config.openrouter.model });
  }
  return new OpenAIChatModel({ client: client(), model: config.chatModel });
}

function createVectorIndex(config: RagConfig, embedder: Embedder): VectorIndex {
  if (config.vectorStore === 'memory') {
    return new MemoryVectorStore(embedder);
  }
  if (!config.pinecone) {
    throw new ConfigurationError('Pinecone settings are missing');
  }
  const { apiKey, indexName, namespace } = config.pinecone;
  const index = new Pinecone({ apiKey }).index(indexName);
  console.log(`[PINECONE] Using index ${indexName}${namespace ? ` (namespace ${namespace})` : ''}`);
  return new PineconeVectorStore(namespace ? index.namespace(namespace) : index, embedder);
}

function createBlobStorage(config: RagConfig): BlobStorage {
  if (config.blobStorage === 'memory') {
    return new MemoryBlobStorage();
  }
  if (!config.blobToken) {
    throw new ConfigurationError('BLOB_READ_WRITE_TOKEN environment variable is not set');
  }
  return new VercelBlobStorage(config.blobToken);
}

/** Builds every collaborator once and wires them together. */
export function createRagServices(config: RagConfig, overrides: RagOverrides = {}): RagServices {
  let openai: OpenAI | undefined;
  const client = () => (openai ??= new OpenAI({ apiKey: config.openaiApiKey }));

  const embedder = overrides.embedder ?? new OpenAIEmbeddings({ client: client(), model: config.embeddingModel });
  const chatModel = overrides.chatModel ?? createChatModel(config, client);
  const vectorIndex = overrides.vectorIndex ?? createVectorIndex(config, embedder);
  const blobStorage = overrides.blobStorage ?? createBlobStorage(config);
  const db = overrides.db ?? new MemoryDatabase();

  const queue = new IngestionQueue(config.ingestion.concurrency);
  const retriever = new DocumentRetriever(vectorIndex, AI_CONFIG.retrievalK);
  const synthesizer = new AnswerSynthesizer(chatModel, AI_CONFIG.historyWindow);

  const documents = new DocumentService({
    db,
    vectorIndex,
    blobStorage,
    queue,
    extractor: overrides.extractor ?? new TextExtractor(),
    splitter: overrides.splitter ?? new RecursiveTextSplitter(AI_CONFIG.chunking),
    maxFileSizeMb: config.maxFileSizeMb,
    retry: { attempts: config.ingestion.maxAttempts, delayMs: config.ingestion.retryDelayMs },
  });
  const chats = new ChatService({ db, retriever, synthesizer, locks: new KeyedMutex() });
  const projects = new ProjectService(db, documents);

  return { db, vectorIndex, blobStorage, queue, retriever, synthesizer, documents, chats, projects };
}
