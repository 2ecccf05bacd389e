import { FileTooLargeError, UnsupportedFileTypeError } from './errors';
import { isSupportedFileType } from './text-extraction';
import { SUPPORTED_FILE_TYPES, type Document, type FileType, type IndexedChunk, type TextChunk } from './types';

const BYTES_PER_MB = 1024 * 1024;

export function chunkId(documentId: string, chunkIndex: number): string {
  return `${documentId}:${chunkIndex}`;
}

/**
 * Attach the identifiers used for filtered retrieval and deletion. Must run
 * before the chunks reach the vector store; nothing downstream infers them.
 */
export function tagChunks(document: Document, chunks: TextChunk[]): IndexedChunk[] {
  return chunks.map((chunk, position) => {
    const chunkIndex = position + 1;
    const id = chunkId(document.id, chunkIndex);
    return {
      id,
      content: chunk.text,
      metadata: {
        projectId: document.projectId,
        documentId: document.id,
        documentName: document.name,
        chunkIndex,
        chunkId: id,
        ...(chunk.pageNumber !== undefined && { pageNumber: chunk.pageNumber }),
      },
    };
  });
}

export function resolveFileType(fileName: string): FileType {
  const dot = fileName.lastIndexOf('.');
  const extension = dot === -1 ? '' : fileName.slice(dot + 1).toLowerCase();
  if (!isSupportedFileType(extension)) {
    throw new UnsupportedFileTypeError(extension, SUPPORTED_FILE_TYPES);
  }
  return extension;
}

export function assertFileSize(size: number, maxSizeMb: number): void {
  if (size > maxSizeMb * BYTES_PER_MB) {
    throw new FileTooLargeError(maxSizeMb);
  }
}

export function blobKey(projectId: string, documentId: string, fileType: FileType): string {
  return `${projectId}/${documentId}.${fileType}`;
}
