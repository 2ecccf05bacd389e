import { AI_CONFIG } from './ai-config';
import { matchesFilter, scopeFilter } from './vector-filter';
import type { VectorIndex } from './vector-store';
import type { ScoredChunk } from './types';

export interface RetrievalQuery {
  query: string;
  projectId: string;
  /** Narrows the project scope when non-empty. */
  documentIds?: readonly string[];
  k?: number;
}

export class DocumentRetriever {
  constructor(
    private readonly vectorIndex: VectorIndex,
    private readonly defaultK: number = AI_CONFIG.retrievalK,
  ) {}

  async search({ query, projectId, documentIds, k = this.defaultK }: RetrievalQuery): Promise<ScoredChunk[]> {
    if (k <= 0) return [];

    const filter = scopeFilter(projectId, documentIds);
    const results = await this.vectorIndex.search(query, k, filter);
    const scoped = results.filter(chunk => matchesFilter(filter, chunk.metadata)).slice(0, k);

    if (scoped.length !== results.length) {
      console.warn(`[RETRIEVE] Dropped ${results.length - scoped.length} results outside project ${projectId} scope`);
    }
    console.log(
      `[RETRIEVE] ${scoped.length} chunks for project ${projectId}` +
        (documentIds?.length ? ` (limited to ${documentIds.length} documents)` : ''),
    );
    return scoped;
  }
}
