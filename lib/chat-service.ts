import { AI_CONFIG, DEFAULT_CHAT_NAME } from './ai-config';
import type { AnswerSynthesizer } from './answer-synthesizer';
import { NotFoundError, ValidationError } from './errors';
import type { KeyedMutex } from './keyed-mutex';
import type { Database } from './repositories';
import type { DocumentRetriever } from './retriever';
import type { Chat, CitationMap, HistoryTurn, Message, Page } from './types';

export interface ChatServiceOptions {
  db: Database;
  retriever: DocumentRetriever;
  synthesizer: AnswerSynthesizer;
  locks: KeyedMutex;
  retrievalK?: number;
  autoTitle?: boolean;
}

export interface ChatDetails {
  chat: Chat;
  documentIds: string[];
  messageCount: number;
}

export interface ChatTurn {
  humanMessage: Message;
  aiMessage: Message;
  citations: CitationMap;
  chat: Chat;
}

export class ChatService {
  private readonly db: Database;
  private readonly retriever: DocumentRetriever;
  private readonly synthesizer: AnswerSynthesizer;
  private readonly locks: KeyedMutex;
  private readonly retrievalK: number;
  private readonly autoTitle: boolean;

  constructor(options: ChatServiceOptions) {
    this.db = options.db;
    this.retriever = options.retriever;
    this.synthesizer = options.synthesizer;
    this.locks = options.locks;
    this.retrievalK = options.retrievalK ?? AI_CONFIG.retrievalK;
    this.autoTitle = options.autoTitle ?? true;
  }

  async createChat(projectId: string, input: { name?: string; documentIds?: string[] } = {}): Promise<Chat> {
    const project = await this.db.projects.getById(projectId);
    if (!project) {
      throw new NotFoundError('Project', projectId);
    }
    const documentIds = [...new Set(input.documentIds ?? [])];
    await this.assertDocumentsInProject(projectId, documentIds);

    const chat = await this.db.chats.create({
      projectId,
      name: input.name?.trim() || DEFAULT_CHAT_NAME,
      documentIds,
    });
    console.log(`[CHAT] Created chat ${chat.id} in project ${projectId} with ${documentIds.length} documents`);
    return chat;
  }

  async getChat(chatId: string): Promise<ChatDetails> {
    const chat = await this.requireChat(chatId);
    const [documentIds, messageCount] = await Promise.all([
      this.db.chats.getDocumentIds(chatId),
      this.db.messages.countByChat(chatId),
    ]);
    return { chat, documentIds, messageCount };
  }

  async listChats(projectId: string, page: Page = {}): Promise<{ chats: Chat[]; total: number }> {
    const [chats, total] = await Promise.all([
      this.db.chats.listByProject(projectId, page),
      this.db.chats.countByProject(projectId),
    ]);
    return { chats, total };
  }

  async renameChat(chatId: string, name: string): Promise<Chat> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError('Chat name must not be empty');
    }
    await this.requireChat(chatId);
    return this.db.chats.update(chatId, { name: trimmed });
  }

  async deleteChat(chatId: string): Promise<void> {
    await this.requireChat(chatId);
    await this.db.chats.delete(chatId);
    console.log(`[CHAT] Deleted chat ${chatId}`);
  }

  async addDocumentsToChat(chatId: string, documentIds: string[]): Promise<string[]> {
    const chat = await this.requireChat(chatId);
    await this.assertDocumentsInProject(chat.projectId, documentIds);
    await this.db.chats.addDocuments(chatId, documentIds);
    return this.db.chats.getDocumentIds(chatId);
  }

  async listMessages(chatId: string, page?: Page): Promise<Message[]> {
    await this.requireChat(chatId);
    return this.db.messages.listByChat(chatId, page);
  }

  async countMessages(chatId: string): Promise<number> {
    await this.requireChat(chatId);
    return this.db.messages.countByChat(chatId);
  }

  /**
   * Runs one question/answer turn. Turns in the same chat are serialized.
   *
   * The question is stored before anything else so it survives a retrieval or
   * model failure; the answer, the activity timestamp and any generated title
   * are committed together.
   */
  askQuestion(chatId: string, content: string): Promise<ChatTurn> {
    return this.locks.runExclusive(chatId, () => this.runTurn(chatId, content));
  }

  async listAnswerSources(messageId: string): Promise<CitationMap> {
    const message = await this.db.messages.getById(messageId);
    if (!message) {
      throw new NotFoundError('Message', messageId);
    }
    return message.senderType === 'ai' ? (message.sources ?? {}) : {};
  }

  private async runTurn(chatId: string, content: string): Promise<ChatTurn> {
    const question = content.trim();
    if (!question) {
      throw new ValidationError('Message content must not be empty');
    }
    const chat = await this.requireChat(chatId);

    const prior = await this.db.messages.listByChat(chatId);
    const humanMessage = await this.db.messages.create({ chatId, senderType: 'human', content: question });

    const documentIds = await this.db.chats.getDocumentIds(chatId);
    const chunks = await this.retriever.search({
      query: question,
      projectId: chat.projectId,
      documentIds,
      k: this.retrievalK,
    });

    const history = prior.map((message): HistoryTurn => ({ role: message.senderType, content: message.content }));
    const { answer, citations } = await this.synthesizer.answer(question, chunks, history);

    const title =
      this.autoTitle && !prior.some(message => message.senderType === 'ai') && chat.name === DEFAULT_CHAT_NAME
        ? await this.synthesizer.generateTitle(question)
        : undefined;

    const { aiMessage, updated } = await this.db.transaction(async repositories => {
      const aiMessage = await repositories.messages.create({
        chatId,
        senderType: 'ai',
        content: answer,
        sources: citations,
      });
      const updated = await repositories.chats.update(chatId, {
        ...(title !== undefined && title !== DEFAULT_CHAT_NAME && { name: title }),
        updatedAt: aiMessage.createdAt,
      });
      return { aiMessage, updated };
    });

    console.log(
      `[CHAT] Answered in chat ${chatId} with ${Object.keys(citations).length} cited documents` +
        (updated.name !== chat.name ? `, renamed to "${updated.name}"` : ''),
    );
    return { humanMessage, aiMessage, citations, chat: updated };
  }

  private async requireChat(chatId: string): Promise<Chat> {
    const chat = await this.db.chats.getById(chatId);
    if (!chat) {
      throw new NotFoundError('Chat', chatId);
    }
    return chat;
  }

  private async assertDocumentsInProject(projectId: string, documentIds: string[]): Promise<void> {
    for (const documentId of documentIds) {
      const document = await this.db.documents.getById(documentId);
      if (!document || document.projectId !== projectId) {
        throw new ValidationError(`Document ${documentId} does not belong to project ${projectId}`);
      }
    }
  }
}
