import type { BlobStorage } from './blob-storage';
import { contentTypeFor } from './blob-storage';
import { assertFileSize, blobKey, tagChunks } from './document-processing';
import {
  DocumentDeletionError,
  ExtractionFailedError,
  NotFoundError,
  UnsupportedFileTypeError,
  errorMessage,
  isRetryableIngestionError,
} from './errors';
import type { IngestionJob, IngestionQueue, ProgressReporter } from './ingestion-queue';
import type { Database } from './repositories';
import { withRetry } from './retry';
import { isSupportedFileType, type TextExtractor } from './text-extraction';
import type { RecursiveTextSplitter } from './text-splitter';
import { SUPPORTED_FILE_TYPES, type Document, type Page } from './types';
import type { VectorIndex } from './vector-store';

export interface DocumentServiceOptions {
  db: Database;
  vectorIndex: VectorIndex;
  blobStorage: BlobStorage;
  queue: IngestionQueue;
  extractor: TextExtractor;
  splitter: RecursiveTextSplitter;
  maxFileSizeMb: number;
  retry: {
    attempts: number;
    delayMs: number;
  };
}

export class DocumentService {
  private readonly db: Database;
  private readonly vectorIndex: VectorIndex;
  private readonly blobStorage: BlobStorage;
  private readonly queue: IngestionQueue;
  private readonly extractor: TextExtractor;
  private readonly splitter: RecursiveTextSplitter;
  private readonly maxFileSizeMb: number;
  private readonly retry: DocumentServiceOptions['retry'];

  constructor(options: DocumentServiceOptions) {
    this.db = options.db;
    this.vectorIndex = options.vectorIndex;
    this.blobStorage = options.blobStorage;
    this.queue = options.queue;
    this.extractor = options.extractor;
    this.splitter = options.splitter;
    this.maxFileSizeMb = options.maxFileSizeMb;
    this.retry = options.retry;
  }

  /**
   * Records the document and schedules its processing. The returned document
   * is still `Pending`; poll `getDocument` or `getIngestionStatus` for the
   * outcome.
   */
  async ingestDocument(projectId: string, fileName: string, fileType: string, bytes: Uint8Array): Promise<Document> {
    const type = fileType.toLowerCase();
    if (!isSupportedFileType(type)) {
      throw new UnsupportedFileTypeError(fileType, SUPPORTED_FILE_TYPES);
    }
    assertFileSize(bytes.byteLength, this.maxFileSizeMb);

    const project = await this.db.projects.getById(projectId);
    if (!project) {
      throw new NotFoundError('Project', projectId);
    }

    const document = await this.db.documents.create({
      projectId,
      name: fileName,
      fileType: type,
      fileSize: bytes.byteLength,
      status: 'Pending',
    });
    console.log(`[INGEST] Created document ${document.id} (${fileName}, ${bytes.byteLength} bytes)`);

    const key = blobKey(projectId, document.id, type);
    try {
      await this.blobStorage.put(key, bytes, contentTypeFor(type));
    } catch (error) {
      // The text can still be indexed without the original file.
      console.error(`[INGEST] Failed to store original file ${key}, continuing with indexing:`, error);
    }

    const content = new Uint8Array(bytes);
    this.queue.enqueue(document.id, progress => this.processDocument(document.id, content, progress));
    return document;
  }

  /** Extract, chunk, tag and index one document; runs on the ingestion queue. */
  async processDocument(documentId: string, bytes: Uint8Array, progress: ProgressReporter = () => {}): Promise<number> {
    try {
      const document = await this.db.documents.getById(documentId);
      if (!document) {
        throw new NotFoundError('Document', documentId);
      }
      await this.db.documents.update(documentId, { status: 'In progress' });

      progress('extracting');
      const units = await this.extractor.extract(bytes, document.fileType, document.name);

      progress('chunking');
      const chunks = tagChunks(document, this.splitter.splitUnits(units));
      if (chunks.length === 0) {
        throw new ExtractionFailedError(`No content extracted from ${document.name}`);
      }

      progress('embedding');
      await withRetry(() => this.vectorIndex.index(chunks), {
        attempts: this.retry.attempts,
        delayMs: this.retry.delayMs,
        retryIf: isRetryableIngestionError,
        label: `Indexing ${document.name}`,
      });

      await this.db.documents.update(documentId, { status: 'Successful', chunkCount: chunks.length, error: null });
      console.log(`[INGEST] Indexed ${chunks.length} chunks for document ${documentId}`);
      return chunks.length;
    } catch (error) {
      await this.markFailed(documentId, error);
      throw error;
    }
  }

  async deleteDocument(documentId: string): Promise<void> {
    const document = await this.db.documents.getById(documentId);
    if (!document) {
      throw new NotFoundError('Document', documentId);
    }

    try {
      await this.vectorIndex.deleteByDocument(documentId);
    } catch (error) {
      console.error(`[DELETE] Failed to delete vectors for document ${documentId}:`, error);
      throw new DocumentDeletionError(documentId, 'vectors', error);
    }

    const key = blobKey(document.projectId, documentId, document.fileType);
    try {
      await this.blobStorage.delete(key);
    } catch (error) {
      console.warn(`[DELETE] Could not delete original file ${key}: ${errorMessage(error)}`);
    }

    try {
      await this.db.documents.delete(documentId);
    } catch (error) {
      console.error(`[DELETE] Vectors removed but metadata deletion failed for document ${documentId}:`, error);
      throw new DocumentDeletionError(documentId, 'metadata', error);
    }
    this.queue.forget(documentId);
    console.log(`[DELETE] Deleted document ${documentId}`);
  }

  async getDocument(documentId: string, projectId?: string): Promise<Document> {
    const document = await this.db.documents.getById(documentId);
    if (!document || (projectId !== undefined && document.projectId !== projectId)) {
      throw new NotFoundError('Document', documentId);
    }
    return document;
  }

  async listDocuments(projectId: string, page: Page = {}): Promise<{ documents: Document[]; total: number }> {
    const [documents, total] = await Promise.all([
      this.db.documents.listByProject(projectId, page),
      this.db.documents.countByProject(projectId),
    ]);
    return { documents, total };
  }

  async downloadDocument(documentId: string): Promise<Uint8Array> {
    const document = await this.getDocument(documentId);
    return this.blobStorage.get(blobKey(document.projectId, document.id, document.fileType));
  }

  getIngestionStatus(documentId: string): IngestionJob | undefined {
    return this.queue.getJob(documentId);
  }

  waitForIngestion(documentId: string): Promise<IngestionJob> {
    return this.queue.waitFor(documentId);
  }

  private async markFailed(documentId: string, cause: unknown): Promise<void> {
    console.error(`[INGEST] Processing failed for document ${documentId}:`, cause);
    try {
      // A retry exhausted mid-batch can leave some chunks written.
      await this.vectorIndex.deleteByDocument(documentId);
    } catch (error) {
      console.error(`[INGEST] Could not remove partial vectors for document ${documentId}:`, error);
    }
    try {
      await this.db.documents.update(documentId, { status: 'Failed', chunkCount: 0, error: errorMessage(cause) });
    } catch (error) {
      console.error(`[INGEST] Could not mark document ${documentId} as failed:`, error);
    }
  }
}
