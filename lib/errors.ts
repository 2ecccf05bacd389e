export class RagError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class ConfigurationError extends RagError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500);
  }
}

export class ValidationError extends RagError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

export class NotFoundError extends RagError {
  constructor(entity: string, id: string) {
    super(`${entity} with ID ${id} not found`, 'NOT_FOUND', 404);
  }
}

export class UnsupportedFileTypeError extends RagError {
  readonly fileType: string;

  constructor(fileType: string, allowed: readonly string[]) {
    super(
      `File type '${fileType}' not allowed. Allowed types: ${allowed.join(', ')}`,
      'UNSUPPORTED_FILE_TYPE',
      400,
    );
    this.fileType = fileType;
  }
}

export class FileTooLargeError extends RagError {
  constructor(maxSizeMb: number) {
    super(`File too large. Maximum size: ${maxSizeMb}MB`, 'FILE_TOO_LARGE', 400);
  }
}

export class ExtractionFailedError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'EXTRACTION_FAILED', 422, { cause });
  }
}

export class EmbeddingProviderError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'EMBEDDING_PROVIDER_ERROR', 502, { cause });
  }
}

export class IndexWriteError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INDEX_WRITE_ERROR', 502, { cause });
  }
}

export class VectorDeleteUnsupportedError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'VECTOR_DELETE_UNSUPPORTED', 501, { cause });
  }
}

export class LanguageModelError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'LANGUAGE_MODEL_ERROR', 502, { cause });
  }
}

export class TitleGenerationError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TITLE_GENERATION_ERROR', 502, { cause });
  }
}

export type DeletionStage = 'vectors' | 'metadata';

export class DocumentDeletionError extends RagError {
  readonly stage: DeletionStage;

  constructor(documentId: string, stage: DeletionStage, cause: unknown) {
    const detail =
      stage === 'vectors'
        ? 'indexed vectors could not be removed; document metadata was kept'
        : 'indexed vectors were removed but document metadata could not be deleted';
    super(`Failed to delete document ${documentId}: ${detail}`, 'DOCUMENT_DELETION_FAILED', 500, { cause });
    this.stage = stage;
  }
}

export function isRetryableIngestionError(error: unknown): boolean {
  return error instanceof EmbeddingProviderError || error instanceof IndexWriteError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
