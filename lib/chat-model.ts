import type OpenAI from 'openai';
import { AI_CONFIG } from './ai-config';
import { LanguageModelError, errorMessage } from './errors';
import type { ChatMessage } from './types';

export interface ChatModel {
  complete(messages: ChatMessage[]): Promise<string>;
}

export interface OpenAIChatModelOptions {
  client: OpenAI;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export class OpenAIChatModel implements ChatModel {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor({
    client,
    model = AI_CONFIG.model,
    temperature = AI_CONFIG.temperature,
    maxTokens = AI_CONFIG.max_tokens,
  }: OpenAIChatModelOptions) {
    this.client = client;
    this.model = model;
    this.temperature = temperature;
    this.maxTokens = maxTokens;
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    const response = await this.client.chat.completions
      .create({
        model: this.model,
        messages,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      })
      .catch((error: unknown) => {
        console.error('[LLM] OpenAI completion error:', error);
        throw new LanguageModelError(`OpenAI completion failed: ${errorMessage(error)}`, error);
      });

    return response.choices[0]?.message?.content ?? '';
  }
}
