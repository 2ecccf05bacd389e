import { AI_CONFIG, DEFAULT_CHAT_NAME, INSUFFICIENT_INFORMATION_ANSWER } from './ai-config';
import type { ChatModel } from './chat-model';
import { TitleGenerationError, errorMessage } from './errors';
import type { ChatMessage, CitationMap, HistoryTurn, IndexedChunk } from './types';

export interface SynthesizedAnswer {
  answer: string;
  citations: CitationMap;
}

export interface CitationIndex {
  citations: CitationMap;
  /** Citation number per retrieved chunk, same order as the input. */
  numbers: number[];
}

export const CONTEXT_SEPARATOR = '\n\n---\n\n';

const citationKey = (chunk: IndexedChunk) => chunk.metadata.documentId || chunk.metadata.documentName;

/**
 * Numbers source documents in order of first appearance. Every chunk of a
 * document shares that document's number.
 */
export function buildCitationIndex(chunks: IndexedChunk[]): CitationIndex {
  const citations: CitationMap = {};
  const byDocument = new Map<string, number>();
  const numbers = chunks.map(chunk => {
    const key = citationKey(chunk);
    let number = byDocument.get(key);
    if (number === undefined) {
      number = byDocument.size + 1;
      byDocument.set(key, number);
      citations[number] = {
        documentId: chunk.metadata.documentId,
        documentTitle: chunk.metadata.documentName,
      };
    }
    return number;
  });
  return { citations, numbers };
}

export function buildContext(chunks: IndexedChunk[], numbers: number[]): string {
  return chunks
    .map((chunk, i) => `[${numbers[i]}] ${chunk.metadata.documentName}\n${chunk.content}`)
    .join(CONTEXT_SEPARATOR);
}

export function buildSystemPrompt(context: string): string {
  return AI_CONFIG.systemPrompt.replace('{context}', () => context);
}

export function sanitizeTitle(raw: string): string {
  const title = raw.trim().replace(/^["']+|["']+$/g, '').trim();
  if (!title) {
    return DEFAULT_CHAT_NAME;
  }
  if (title.length > AI_CONFIG.titleMaxLength) {
    return `${title.slice(0, AI_CONFIG.titleMaxLength - 3)}...`;
  }
  return title;
}

export class AnswerSynthesizer {
  constructor(
    private readonly model: ChatModel,
    private readonly historyWindow: number = AI_CONFIG.historyWindow,
  ) {}

  async answer(question: string, chunks: IndexedChunk[], history: HistoryTurn[] = []): Promise<SynthesizedAnswer> {
    if (chunks.length === 0) {
      console.log('[SYNTHESIZE] No chunks retrieved, skipping model call');
      return { answer: INSUFFICIENT_INFORMATION_ANSWER, citations: {} };
    }

    const { citations, numbers } = buildCitationIndex(chunks);
    const messages = this.buildMessages(question, buildContext(chunks, numbers), history);

    console.log(
      `[SYNTHESIZE] Answering from ${chunks.length} chunks across ${Object.keys(citations).length} documents ` +
        `with ${messages.length - 2} history turns`,
    );
    const answer = await this.model.complete(messages);
    return { answer, citations };
  }

  buildMessages(question: string, context: string, history: HistoryTurn[] = []): ChatMessage[] {
    const recent = this.historyWindow > 0 ? history.slice(-this.historyWindow) : [];
    return [
      { role: 'system', content: buildSystemPrompt(context) },
      ...recent.map((turn): ChatMessage => ({
        role: turn.role === 'human' ? 'user' : 'assistant',
        content: turn.content,
      })),
      { role: 'user', content: question },
    ];
  }

  /** Never throws: any failure falls back to the default chat name. */
  async generateTitle(firstMessage: string): Promise<string> {
    const prompt = AI_CONFIG.titlePrompt.replace('{message}', () => firstMessage.slice(0, AI_CONFIG.titleInputLimit));
    try {
      const raw = await this.model.complete([{ role: 'user', content: prompt }]).catch((error: unknown) => {
        throw new TitleGenerationError(`Title generation failed: ${errorMessage(error)}`, error);
      });
      const title = sanitizeTitle(raw);
      console.log(`[TITLE] Generated chat title "${title}"`);
      return title;
    } catch (error) {
      console.warn(`[TITLE] ${errorMessage(error)}; keeping "${DEFAULT_CHAT_NAME}"`);
      return DEFAULT_CHAT_NAME;
    }
  }
}
