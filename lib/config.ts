import { AI_CONFIG } from './ai-config';
import { ConfigurationError } from './errors';

export type LlmProvider = 'openai' | 'openrouter';
export type VectorStoreKind = 'pinecone' | 'memory';
export type BlobStorageKind = 'vercel' | 'memory';

export interface RagConfig {
  llmProvider: LlmProvider;
  openaiApiKey: string;
  openrouter?: {
    apiKey: string;
    model: string;
  };
  chatModel: string;
  embeddingModel: string;
  vectorStore: VectorStoreKind;
  pinecone?: {
    apiKey: string;
    indexName: string;
    namespace?: string;
  };
  blobStorage: BlobStorageKind;
  blobToken?: string;
  maxFileSizeMb: number;
  ingestion: {
    concurrency: number;
    maxAttempts: number;
    retryDelayMs: number;
  };
}

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(`${name} environment variable is not set`);
  }
  return value;
}

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function positiveInt(env: Env, name: string, fallback: number, min = 1): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const match = allowed.find(value => value === raw.toLowerCase());
  if (!match) {
    throw new ConfigurationError(`${name} must be one of ${allowed.join(', ')}, got '${raw}'`);
  }
  return match;
}

export function loadConfig(env: Env = process.env): RagConfig {
  const llmProvider = oneOf<LlmProvider>(env, 'LLM_PROVIDER', ['openai', 'openrouter'], 'openai');
  const vectorStore = oneOf<VectorStoreKind>(env, 'VECTOR_STORE', ['pinecone', 'memory'], 'pinecone');
  const blobStorage = oneOf<BlobStorageKind>(env, 'BLOB_STORAGE', ['vercel', 'memory'], 'vercel');

  return {
    llmProvider,
    // Embeddings go through OpenAI whichever provider answers questions.
    openaiApiKey: required(env, 'OPENAI_API_KEY'),
    openrouter:
      llmProvider === 'openrouter'
        ? {
            apiKey: required(env, 'OPENROUTER_API_KEY'),
            model: optional(env, 'OPENROUTER_MODEL') ?? AI_CONFIG.openRouterModel,
          }
        : undefined,
    chatModel: optional(env, 'CHAT_MODEL') ?? AI_CONFIG.model,
    embeddingModel: optional(env, 'EMBEDDING_MODEL') ?? AI_CONFIG.embeddingModel,
    vectorStore,
    pinecone:
      vectorStore === 'pinecone'
        ? {
            apiKey: required(env, 'PINECONE_API_KEY'),
            indexName: required(env, 'PINECONE_INDEX'),
            namespace: optional(env, 'PINECONE_NAMESPACE'),
          }
        : undefined,
    blobStorage,
    blobToken: blobStorage === 'vercel' ? required(env, 'BLOB_READ_WRITE_TOKEN') : undefined,
    maxFileSizeMb: positiveInt(env, 'MAX_FILE_SIZE_MB', 50),
    ingestion: {
      concurrency: positiveInt(env, 'INGESTION_CONCURRENCY', 2),
      maxAttempts: positiveInt(env, 'INGESTION_MAX_ATTEMPTS', 3),
      retryDelayMs: positiveInt(env, 'INGESTION_RETRY_DELAY_MS', 500, 0),
    },
  };
}
