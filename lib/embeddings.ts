import type OpenAI from 'openai';
import { AI_CONFIG } from './ai-config';
import { EmbeddingProviderError, errorMessage } from './errors';

export interface Embedder {
  embedDocuments(texts: string[]): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
}

export interface OpenAIEmbeddingsOptions {
  client: OpenAI;
  model?: string;
  batchSize?: number;
}

export class OpenAIEmbeddings implements Embedder {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly batchSize: number;

  constructor({ client, model = AI_CONFIG.embeddingModel, batchSize = AI_CONFIG.embeddingBatchSize }: OpenAIEmbeddingsOptions) {
    this.client = client;
    this.model = model;
    this.batchSize = batchSize;
  }

  async embedQuery(text: string): Promise<number[]> {
    const [embedding] = await this.request([text]);
    return embedding;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    const results: number[][] = [];
    // Batches go out one at a time to stay under provider rate limits.
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      console.log(
        `[EMBED] Processing batch ${Math.floor(i / this.batchSize) + 1}, texts ${i + 1} to ${i + batch.length}`,
      );
      results.push(...(await this.request(batch)));
    }
    return results;
  }

  private async request(input: string[]): Promise<number[][]> {
    const response = await this.client.embeddings
      .create({ model: this.model, input, encoding_format: 'float' })
      .catch((error: unknown) => {
        console.error('[EMBED] Error generating embeddings:', error);
        throw new EmbeddingProviderError(`Embedding request failed: ${errorMessage(error)}`, error);
      });

    if (response.data.length !== input.length) {
      throw new EmbeddingProviderError(
        `Embedding provider returned ${response.data.length} vectors for ${input.length} inputs`,
      );
    }
    return [...response.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vectors must have same length (${a.length} vs ${b.length})`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}
