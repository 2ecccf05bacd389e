export { loadConfig } from './config';
export type { BlobStorageKind, LlmProvider, RagConfig, VectorStoreKind } from './config';
export { createRagServices } from './container';
export type { RagOverrides, RagServices } from './container';

export { AI_CONFIG, DEFAULT_CHAT_NAME, INSUFFICIENT_INFORMATION_ANSWER } from './ai-config';
export * from './errors';

export { ChatService } from './chat-service';
export type { ChatDetails, ChatTurn } from './chat-service';
export { DocumentService } from './document-service';
export { ProjectService } from './project-service';
export type { ProjectSummary } from './project-service';
export type { IngestionJob, IngestionStage } from './ingestion-queue';

export type { BlobStorage } from './blob-storage';
export type { ChatModel } from './chat-model';
export type { Embedder } from './embeddings';
export type { Database } from './repositories';
export type { VectorIndex } from './vector-store';

export type {
  Chat,
  CitationMap,
  CitationSource,
  Document,
  DocumentStatus,
  FileType,
  Message,
  Page,
  Project,
} from './types';
