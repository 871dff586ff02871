import type { ActivityRecord, RankedActivity } from '../@types';
import type { EmbeddingCacheStore } from '../embeddings/embeddingCacheStore';
import type { ActivityLibrary } from '../library/activityLibrary';
import { AppError } from '../shared/errors/app-error';
import { EmbeddingUnavailableError } from '../shared/errors/planner-errors';
import { describeError, logger } from '../shared/logger';
import { DEFAULT_BOOST_MAGNITUDES, evaluateBoosts, type BoostMagnitudes } from './boostTable';
import { DEFAULT_SYNONYM_TABLE, normalizeRequest, type SynonymRule } from './requestNormalizer';

export interface SimilaritySearchOptions {
  boosts: BoostMagnitudes;
  synonyms: readonly SynonymRule[];
}

export const cosineSimilarity = (left: readonly number[], right: readonly number[]): number => {
  if (left.length === 0 || left.length !== right.length) {
    return 0;
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;

  for (let index = 0; index < left.length; index += 1) {
    const a = left[index] ?? 0;
    const b = right[index] ?? 0;
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }

  return Math.max(-1, Math.min(1, dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm))));
};

export const activitySourceKey = (activity: Pick<ActivityRecord, 'id'>): string => `activity:${activity.id}`;

export class SimilaritySearchEngine {
  private readonly options: SimilaritySearchOptions;

  public constructor(
    private readonly library: ActivityLibrary,
    private readonly cache: EmbeddingCacheStore,
    options: Partial<SimilaritySearchOptions> = {},
  ) {
    this.options = {
      boosts: options.boosts ?? DEFAULT_BOOST_MAGNITUDES,
      synonyms: options.synonyms ?? DEFAULT_SYNONYM_TABLE,
    };
  }

  /**
   * Ranks the whole library for one request. Returns an empty list when the
   * library is empty or the request cannot be embedded; callers then generate
   * without reference material.
   */
  public async findTopK(requestText: string, k: number): Promise<RankedActivity[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new AppError(400, 'k must be a positive integer.', 'INVALID_TOP_K', { k });
    }

    const activities = await this.library.list();
    if (activities.length === 0) {
      return [];
    }

    const request = normalizeRequest(requestText, this.options.synonyms);
    let requestVector: readonly number[];

    try {
      requestVector = await this.cache.getOrCompute(request.text);
    } catch (error: unknown) {
      if (error instanceof EmbeddingUnavailableError) {
        logger.warn('similarity_search_degraded', { reason: 'request_embedding_unavailable' });
        return [];
      }
      throw error;
    }

    const ranked: Array<RankedActivity & { order: number }> = [];

    for (const [order, activity] of activities.entries()) {
      let activityVector: readonly number[];
      try {
        activityVector = await this.cache.getOrCompute(activity.sourceText, {
          sourceKey: activitySourceKey(activity),
        });
      } catch (error: unknown) {
        if (!(error instanceof EmbeddingUnavailableError)) {
          throw error;
        }
        logger.warn('similarity_search_record_skipped', {
          activityId: activity.id,
          error: describeError(error),
        });
        continue;
      }

      if (activityVector.length !== requestVector.length) {
        logger.warn('similarity_dimension_mismatch', {
          activityId: activity.id,
          requestDimensions: requestVector.length,
          activityDimensions: activityVector.length,
        });
      }

      const cosine = cosineSimilarity(requestVector, activityVector);
      const boosts = evaluateBoosts(request, activity, this.options.boosts);
      const score = boosts.reduce((total, boost) => total + boost.magnitude, cosine);

      ranked.push({ activity, cosine, boosts, score, order });
    }

    ranked.sort((left, right) => right.score - left.score || left.order - right.order);

    return ranked.slice(0, k).map(({ activity, cosine, boosts, score }) => ({
      activity,
      cosine,
      boosts,
      score,
    }));
  }
}
