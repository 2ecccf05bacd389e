export const SUPPORTED_FILE_TYPES = ['pdf', 'txt', 'md'] as const;

export type FileType = (typeof SUPPORTED_FILE_TYPES)[number];

export type DocumentStatus = 'Pending' | 'In progress' | 'Successful' | 'Failed';

export type SenderType = 'human' | 'ai';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface HistoryTurn {
  role: SenderType;
  content: string;
}

export interface Project {
  id: string;
  name: string;
  description?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Document {
  id: string;
  projectId: string;
  name: string;
  fileType: FileType;
  fileSize: number;
  chunkCount: number;
  status: DocumentStatus;
  error?: string;
  createdAt: Date;
}

export interface Chat {
  id: string;
  projectId: string;
  name: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface CitationSource {
  documentId: string;
  documentTitle: string;
}

/** Citation number (1-based, order of first appearance) to the document it denotes. */
export type CitationMap = Record<number, CitationSource>;

export interface Message {
  id: string;
  chatId: string;
  senderType: SenderType;
  content: string;
  sources?: CitationMap;
  createdAt: Date;
}

export interface TextUnit {
  text: string;
  pageNumber?: number;
}

/** A slice of a unit's text; `start`/`end` are offsets into that unit. */
export interface TextChunk {
  text: string;
  start: number;
  end: number;
  pageNumber?: number;
}

export interface ChunkMetadata {
  projectId: string;
  documentId: string;
  documentName: string;
  chunkIndex: number;
  chunkId: string;
  pageNumber?: number;
}

export interface IndexedChunk {
  id: string;
  content: string;
  metadata: ChunkMetadata;
}

export interface ScoredChunk extends IndexedChunk {
  score: number;
}

export interface Page {
  skip?: number;
  limit?: number;
}
