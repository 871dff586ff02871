import { env } from './config/env';
import { buildPlannerConfig, type PlannerConfig } from './config/planner-config';
import { DatabaseCacheStorage } from './core/embeddings/databaseCacheStorage';
import type { EmbeddingCacheStorage } from './core/embeddings/embeddingCacheStorage';
import { EmbeddingCacheStore } from './core/embeddings/embeddingCacheStore';
import {
  HashingEmbeddingProvider,
  OpenAiEmbeddingProvider,
  type EmbeddingProvider,
} from './core/embeddings/embeddingProvider';
import { FileCacheStorage } from './core/embeddings/fileCacheStorage';
import { FeedbackClassifier } from './core/feedback/feedbackClassifier';
import { GroupingOptimizer } from './core/grouping/groupingOptimizer';
import { ActivityLibrary } from './core/library/activityLibrary';
import { PlanningMemory } from './core/memory/planningMemory';
import { PlanningOrchestrator } from './core/orchestrator';
import { DatabaseRosterSource } from './core/roster/databaseRosterSource';
import { FileRosterSource, type RosterSource } from './core/roster/rosterSource';
import { SimilaritySearchEngine, activitySourceKey } from './core/search/similaritySearch';
import { describeError, logger } from './core/shared/logger';
import { createLlmTool } from './core/tools/llm';
import { createOpenAiClient } from './core/tools/openaiClient';
import { AppDataSource } from './database/data-source';

export interface PlannerContainer {
  config: PlannerConfig;
  library: ActivityLibrary;
  cache: EmbeddingCacheStore;
  search: SimilaritySearchEngine;
  optimizer: GroupingOptimizer;
  rosterSource: RosterSource;
  orchestrator: PlanningOrchestrator;
  /** Loads the cache and embeds every library activity not cached yet. */
  warmUp(): Promise<void>;
}

export const createPlannerContainer = (config: PlannerConfig): PlannerContainer => {
  const client = config.provider ? createOpenAiClient(config.provider, config.retry.timeoutMs) : undefined;

  const embeddingProvider: EmbeddingProvider =
    client && config.provider
      ? new OpenAiEmbeddingProvider(client, config.provider.embeddingModel, config.embedding.dimensions)
      : new HashingEmbeddingProvider(config.embedding.dimensions);

  const storage: EmbeddingCacheStorage =
    config.storageDriver === 'postgres'
      ? new DatabaseCacheStorage(AppDataSource)
      : new FileCacheStorage(config.paths.embeddingCachePath);

  const rosterSource: RosterSource =
    config.storageDriver === 'postgres'
      ? new DatabaseRosterSource(AppDataSource)
      : new FileRosterSource(config.paths.rosterPath);

  const library = ActivityLibrary.fromDirectory(config.paths.libraryDir);
  const cache = new EmbeddingCacheStore(embeddingProvider, storage, config.retry);
  const search = new SimilaritySearchEngine(library, cache, { boosts: config.search.boosts });
  const optimizer = new GroupingOptimizer(config.grouping.tuning);

  const orchestrator = new PlanningOrchestrator(
    {
      llmTool: createLlmTool(client, config.provider),
      search,
      optimizer,
      classifier: new FeedbackClassifier(),
      rosterSource,
      memory: new PlanningMemory(),
    },
    {
      topK: config.search.topK,
      defaultGroupSize: config.grouping.defaultGroupSize,
      maxCompletionTokens: config.generation.maxCompletionTokens,
      retry: config.retry,
    },
  );

  const warmUp = async (): Promise<void> => {
    await cache.init();
    const activities = await library.list();
    let failed = 0;

    for (const activity of activities) {
      try {
        await cache.getOrCompute(activity.sourceText, { sourceKey: activitySourceKey(activity) });
      } catch (error: unknown) {
        failed += 1;
        logger.warn('library_warmup_failed', {
          activityId: activity.id,
          error: describeError(error),
        });
      }
    }

    logger.info('library_warmed', {
      activities: activities.length,
      failed,
      cached: cache.size,
      embeddingModel: embeddingProvider.model,
    });
  };

  return { config, library, cache, search, optimizer, rosterSource, orchestrator, warmUp };
};

export const plannerContainer = createPlannerContainer(buildPlannerConfig(env));
