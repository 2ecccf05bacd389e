import { AI_CONFIG } from './ai-config';
import type { ChatModel } from './chat-model';
import { LanguageModelError, errorMessage } from './errors';
import type { ChatMessage } from './types';

interface OpenRouterCompletionResponse {
  choices?: {
    message?: {
      content?: string | null;
    };
    text?: string;
    finish_reason?: string;
  }[];
}

export interface OpenRouterClientOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  timeoutMs?: number;
  appTitle?: string;
  fetch?: typeof fetch;
}

export class OpenRouterClient implements ChatModel {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;
  private readonly appTitle: string;
  private readonly fetchImpl: typeof fetch;
  private baseURL = 'https://openrouter.ai/api/v1';

  constructor({
    apiKey,
    model = AI_CONFIG.openRouterModel,
    maxTokens = AI_CONFIG.max_tokens,
    timeoutMs = 60000,
    appTitle = 'Knowledge Chat',
    fetch: fetchImpl = fetch,
  }: OpenRouterClientOptions) {
    this.apiKey = apiKey;
    this.model = model;
    this.maxTokens = maxTokens;
    this.timeoutMs = timeoutMs;
    this.appTitle = appTitle;
    this.fetchImpl = fetchImpl;
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    const validMessages = messages.filter(msg => msg.content.trim().length > 0);
    if (validMessages.length === 0) {
      throw new LanguageModelError('No valid messages to send');
    }

    const abortController = new AbortController();
    const timeout = setTimeout(() => abortController.abort(), this.timeoutMs);
    try {
      return await this.send(validMessages, abortController.signal);
    } finally {
      // Covers reading the body as well as the request.
      clearTimeout(timeout);
    }
  }

  private async send(messages: ChatMessage[], signal: AbortSignal): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseURL}/chat/completions`, {
        signal,
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey.replace(/^(Bearer\s+)?/, '')}`,
          'Content-Type': 'application/json',
          'X-Title': this.appTitle,
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          max_tokens: this.maxTokens,
          temperature: AI_CONFIG.temperature,
          stream: false,
        }),
      });
    } catch (error) {
      console.error('[OPENROUTER] Request failed:', error);
      throw new LanguageModelError(`OpenRouter request failed: ${errorMessage(error)}`, error);
    }

    if (!response.ok) {
      const errorBody = await response.text().catch(() => '');
      console.error('[OPENROUTER] API error:', { status: response.status, statusText: response.statusText, errorBody });
      throw new LanguageModelError(`OpenRouter API error: ${response.status} ${response.statusText}`);
    }

    let data: OpenRouterCompletionResponse;
    try {
      data = (await response.json()) as OpenRouterCompletionResponse;
    } catch (error) {
      if (signal.aborted) {
        throw new LanguageModelError('OpenRouter response timed out', error);
      }
      throw new LanguageModelError('OpenRouter returned a malformed response body', error);
    }

    const choice = data.choices?.[0];
    return choice?.message?.content ?? choice?.text ?? '';
  }
}
