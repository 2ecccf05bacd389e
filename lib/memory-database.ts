import { randomUUID } from 'node:crypto';
import { NotFoundError } from './errors';
import type {
  ChatRepository,
  Database,
  DocumentRepository,
  MessageRepository,
  ProjectRepository,
  Repositories,
} from './repositories';
import type { Chat, Document, Message, Page, Project } from './types';

interface Row<T> {
  value: T;
  seq: number;
}

type Table<T> = Map<string, Row<T>>;

/** Inverse operations recorded by a transaction, replayed in reverse on rollback. */
type UndoLog = (() => void)[] | null;

const DEFAULT_LIMIT = 100;

function paginate<T>(items: T[], page?: Page): T[] {
  if (!page) return items;
  const { skip = 0, limit = DEFAULT_LIMIT } = page;
  return items.slice(skip, skip + limit);
}

/**
 * In-process implementation of the persistence interfaces. Values are cloned on
 * the way in and out so callers never share state with the store.
 */
export class MemoryDatabase implements Database {
  readonly projects: ProjectRepository;
  readonly documents: DocumentRepository;
  readonly chats: ChatRepository;
  readonly messages: MessageRepository;

  private readonly projectRows: Table<Project> = new Map();
  private readonly documentRows: Table<Document> = new Map();
  private readonly chatRows: Table<Chat> = new Map();
  private readonly messageRows: Table<Message> = new Map();
  private readonly chatDocuments = new Map<string, Set<string>>();
  private seq = 0;

  constructor(private readonly now: () => Date = () => new Date()) {
    const repositories = this.createRepositories(null);
    this.projects = repositories.projects;
    this.documents = repositories.documents;
    this.chats = repositories.chats;
    this.messages = repositories.messages;
  }

  async transaction<T>(work: (repositories: Repositories) => Promise<T>): Promise<T> {
    const log: (() => void)[] = [];
    try {
      return await work(this.createRepositories(log));
    } catch (error) {
      for (const undo of log.reverse()) {
        undo();
      }
      throw error;
    }
  }

  private createRepositories(log: UndoLog): Repositories {
    return {
      projects: this.projectRepository(log),
      documents: this.documentRepository(log),
      chats: this.chatRepository(log),
      messages: this.messageRepository(log),
    };
  }

  private put<T>(table: Table<T>, id: string, value: T, log: UndoLog): void {
    const previous = table.get(id);
    table.set(id, { value: structuredClone(value), seq: previous?.seq ?? ++this.seq });
    log?.push(() => (previous ? table.set(id, previous) : table.delete(id)));
  }

  private remove<T>(table: Table<T>, id: string, log: UndoLog): void {
    const previous = table.get(id);
    if (!previous) return;
    table.delete(id);
    log?.push(() => table.set(id, previous));
  }

  private setLinks(chatId: string, documentIds: Set<string> | null, log: UndoLog): void {
    const previous = this.chatDocuments.get(chatId);
    if (documentIds) {
      this.chatDocuments.set(chatId, documentIds);
    } else {
      this.chatDocuments.delete(chatId);
    }
    log?.push(() => (previous ? this.chatDocuments.set(chatId, previous) : this.chatDocuments.delete(chatId)));
  }

  private read<T>(table: Table<T>, id: string): T | null {
    const row = table.get(id);
    return row ? structuredClone(row.value) : null;
  }

  private getOrThrow<T>(table: Table<T>, entity: string, id: string): T {
    const value = this.read(table, id);
    if (!value) {
      throw new NotFoundError(entity, id);
    }
    return value;
  }

  private select<T>(table: Table<T>, predicate: (value: T) => boolean, order: 'asc' | 'desc'): T[] {
    const rows = [...table.values()].filter(row => predicate(row.value));
    rows.sort((a, b) => (order === 'asc' ? a.seq - b.seq : b.seq - a.seq));
    return rows.map(row => structuredClone(row.value));
  }

  private deleteChatCascade(chatId: string, log: UndoLog): void {
    for (const [id, row] of [...this.messageRows]) {
      if (row.value.chatId === chatId) this.remove(this.messageRows, id, log);
    }
    this.setLinks(chatId, null, log);
    this.remove(this.chatRows, chatId, log);
  }

  private deleteDocumentCascade(documentId: string, log: UndoLog): void {
    for (const [chatId, documentIds] of [...this.chatDocuments]) {
      if (documentIds.has(documentId)) {
        const next = new Set(documentIds);
        next.delete(documentId);
        this.setLinks(chatId, next, log);
      }
    }
    this.remove(this.documentRows, documentId, log);
  }

  private projectRepository(log: UndoLog): ProjectRepository {
    return {
      create: async ({ name, description }) => {
        const timestamp = this.now();
        const project: Project = {
          id: randomUUID(),
          name,
          ...(description !== undefined && { description }),
          createdAt: timestamp,
          updatedAt: timestamp,
        };
        this.put(this.projectRows, project.id, project, log);
        return structuredClone(project);
      },
      getById: async id => this.read(this.projectRows, id),
      list: async page => paginate(this.select(this.projectRows, () => true, 'desc'), page),
      count: async () => this.projectRows.size,
      update: async (id, changes) => {
        const project = this.getOrThrow(this.projectRows, 'Project', id);
        if (changes.name !== undefined) project.name = changes.name;
        if (changes.description !== undefined) project.description = changes.description;
        project.updatedAt = this.now();
        this.put(this.projectRows, id, project, log);
        return project;
      },
      delete: async id => {
        for (const [documentId, row] of [...this.documentRows]) {
          if (row.value.projectId === id) this.deleteDocumentCascade(documentId, log);
        }
        for (const [chatId, row] of [...this.chatRows]) {
          if (row.value.projectId === id) this.deleteChatCascade(chatId, log);
        }
        this.remove(this.projectRows, id, log);
      },
    };
  }

  private documentRepository(log: UndoLog): DocumentRepository {
    return {
      create: async ({ projectId, name, fileType, fileSize, status = 'Pending' }) => {
        this.getOrThrow(this.projectRows, 'Project', projectId);
        const document: Document = {
          id: randomUUID(),
          projectId,
          name,
          fileType,
          fileSize,
          chunkCount: 0,
          status,
          createdAt: this.now(),
        };
        this.put(this.documentRows, document.id, document, log);
        return structuredClone(document);
      },
      getById: async id => this.read(this.documentRows, id),
      listByProject: async (projectId, page) =>
        paginate(this.select(this.documentRows, document => document.projectId === projectId, 'desc'), page),
      countByProject: async projectId =>
        [...this.documentRows.values()].filter(row => row.value.projectId === projectId).length,
      update: async (id, changes) => {
        const document = this.getOrThrow(this.documentRows, 'Document', id);
        if (changes.status !== undefined) document.status = changes.status;
        if (changes.chunkCount !== undefined) document.chunkCount = changes.chunkCount;
        if (changes.error === null) {
          delete document.error;
        } else if (changes.error !== undefined) {
          document.error = changes.error;
        }
        this.put(this.documentRows, id, document, log);
        return document;
      },
      delete: async id => {
        this.deleteDocumentCascade(id, log);
      },
    };
  }

  private chatRepository(log: UndoLog): ChatRepository {
    return {
      create: async ({ projectId, name, documentIds = [] }) => {
        this.getOrThrow(this.projectRows, 'Project', projectId);
        const timestamp = this.now();
        const chat: Chat = { id: randomUUID(), projectId, name, createdAt: timestamp, updatedAt: timestamp };
        this.put(this.chatRows, chat.id, chat, log);
        this.setLinks(chat.id, new Set(documentIds), log);
        return structuredClone(chat);
      },
      getById: async id => this.read(this.chatRows, id),
      listByProject: async (projectId, page) => {
        const chats = this.select(this.chatRows, chat => chat.projectId === projectId, 'desc');
        // Stable sort keeps newest-created first among equal timestamps.
        chats.sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
        return paginate(chats, page);
      },
      countByProject: async projectId =>
        [...this.chatRows.values()].filter(row => row.value.projectId === projectId).length,
      update: async (id, changes) => {
        const chat = this.getOrThrow(this.chatRows, 'Chat', id);
        if (changes.name !== undefined) chat.name = changes.name;
        chat.updatedAt = changes.updatedAt ?? this.now();
        this.put(this.chatRows, id, chat, log);
        return chat;
      },
      delete: async id => {
        this.deleteChatCascade(id, log);
      },
      getDocumentIds: async chatId => [...(this.chatDocuments.get(chatId) ?? [])],
      addDocuments: async (chatId, documentIds) => {
        this.getOrThrow(this.chatRows, 'Chat', chatId);
        const next = new Set(this.chatDocuments.get(chatId));
        documentIds.forEach(documentId => next.add(documentId));
        this.setLinks(chatId, next, log);
      },
    };
  }

  private messageRepository(log: UndoLog): MessageRepository {
    return {
      create: async ({ chatId, senderType, content, sources }) => {
        this.getOrThrow(this.chatRows, 'Chat', chatId);
        const message: Message = {
          id: randomUUID(),
          chatId,
          senderType,
          content,
          ...(sources !== undefined && { sources }),
          createdAt: this.now(),
        };
        this.put(this.messageRows, message.id, message, log);
        return structuredClone(message);
      },
      getById: async id => this.read(this.messageRows, id),
      listByChat: async (chatId, page) =>
        paginate(this.select(this.messageRows, message => message.chatId === chatId, 'asc'), page),
      countByChat: async chatId => [...this.messageRows.values()].filter(row => row.value.chatId === chatId).length,
    };
  }
}
