import type { Chat, CitationMap, Document, DocumentStatus, FileType, Message, Page, Project, SenderType } from './types';

export interface ProjectRepository {
  create(input: { name: string; description?: string }): Promise<Project>;
  getById(id: string): Promise<Project | null>;
  /** Newest first. */
  list(page?: Page): Promise<Project[]>;
  count(): Promise<number>;
  update(id: string, changes: { name?: string; description?: string }): Promise<Project>;
  /** Cascades to the project's documents, chats and messages. */
  delete(id: string): Promise<void>;
}

export interface DocumentRepository {
  create(input: {
    projectId: string;
    name: string;
    fileType: FileType;
    fileSize: number;
    status?: DocumentStatus;
  }): Promise<Document>;
  getById(id: string): Promise<Document | null>;
  /** Newest first. */
  listByProject(projectId: string, page?: Page): Promise<Document[]>;
  countByProject(projectId: string): Promise<number>;
  update(id: string, changes: { status?: DocumentStatus; chunkCount?: number; error?: string | null }): Promise<Document>;
  /** Also drops the document from every chat it was attached to. */
  delete(id: string): Promise<void>;
}

export interface ChatRepository {
  create(input: { projectId: string; name: string; documentIds?: string[] }): Promise<Chat>;
  getById(id: string): Promise<Chat | null>;
  /** Most recently updated first. */
  listByProject(projectId: string, page?: Page): Promise<Chat[]>;
  countByProject(projectId: string): Promise<number>;
  update(id: string, changes: { name?: string; updatedAt?: Date }): Promise<Chat>;
  /** Cascades to the chat's messages and document associations. */
  delete(id: string): Promise<void>;
  getDocumentIds(chatId: string): Promise<string[]>;
  /** Ignores documents already attached. */
  addDocuments(chatId: string, documentIds: string[]): Promise<void>;
}

export interface MessageRepository {
  create(input: { chatId: string; senderType: SenderType; content: string; sources?: CitationMap }): Promise<Message>;
  getById(id: string): Promise<Message | null>;
  /** Oldest first. */
  listByChat(chatId: string, page?: Page): Promise<Message[]>;
  countByChat(chatId: string): Promise<number>;
}

export interface Repositories {
  projects: ProjectRepository;
  documents: DocumentRepository;
  chats: ChatRepository;
  messages: MessageRepository;
}

export interface UnitOfWork {
  /** Runs `work` against transactional repositories; a rejection discards all of its writes. */
  transaction<T>(work: (repositories: Repositories) => Promise<T>): Promise<T>;
}

export interface Database extends Repositories, UnitOfWork {}
