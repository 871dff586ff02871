import type { RankedActivity } from '../@types';
import type { SimilaritySearchEngine } from '../search/similaritySearch';
import { logger } from '../shared/logger';
import type { RequestAnalysis } from './analystStage';

export const runResearcherStage = async (
  search: SimilaritySearchEngine,
  analysis: RequestAnalysis,
  topK: number,
): Promise<RankedActivity[]> => {
  const references = await search.findTopK(analysis.requestText, topK);

  logger.info('references_selected', {
    requested: topK,
    found: references.length,
    top: references.map(({ activity, score }) => ({ id: activity.id, score: Number(score.toFixed(4)) })),
  });

  return references;
};
