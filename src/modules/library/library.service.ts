import type { RankedActivity } from '../../core/@types';
import { plannerContainer } from '../../container';
import type { SimilaritySearchEngine } from '../../core/search/similaritySearch';
import type { SearchLibraryQuery } from './library.schema';

export interface LibrarySearchResponse {
  query: string;
  k: number;
  results: RankedActivity[];
}

export class LibraryService {
  public constructor(
    private readonly search: SimilaritySearchEngine,
    private readonly defaultTopK: number,
  ) {}

  public async searchActivities(query: SearchLibraryQuery): Promise<LibrarySearchResponse> {
    const k = query.k ?? this.defaultTopK;
    const results = await this.search.findTopK(query.q, k);
    return { query: query.q, k, results };
  }
}

export const libraryService = new LibraryService(plannerContainer.search, plannerContainer.config.search.topK);
