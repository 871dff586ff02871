import { resolve } from 'node:path';

import type { GroupingTuning } from '../core/grouping/groupingOptimizer';
import type { BoostMagnitudes } from '../core/search/boostTable';
import type { RetryPolicy } from '../core/shared/retry';
import type { Env } from './env';

export interface ProviderCredentials {
  kind: 'azure_openai' | 'openai';
  apiKey: string;
  baseUrl?: string;
  chatModel: string;
  embeddingModel: string;
}

export interface PlannerConfig {
  storageDriver: Env['STORAGE_DRIVER'];
  provider: ProviderCredentials | undefined;
  retry: RetryPolicy;
  generation: { maxCompletionTokens: number };
  embedding: { dimensions: number };
  search: { topK: number; boosts: BoostMagnitudes };
  grouping: { defaultGroupSize: number; tuning: GroupingTuning };
  paths: { libraryDir: string; rosterPath: string; embeddingCachePath: string };
}

const resolveProvider = (env: Env): ProviderCredentials | undefined => {
  if (env.AZURE_OPENAI_API_KEY && env.AZURE_OPENAI_ENDPOINT && env.AZURE_OPENAI_DEPLOYMENT) {
    return {
      kind: 'azure_openai',
      apiKey: env.AZURE_OPENAI_API_KEY,
      baseUrl: env.AZURE_OPENAI_ENDPOINT,
      chatModel: env.AZURE_OPENAI_DEPLOYMENT,
      embeddingModel: env.AZURE_OPENAI_EMBEDDING_DEPLOYMENT ?? env.EMBEDDING_MODEL,
    };
  }

  if (env.OPENAI_API_KEY) {
    return {
      kind: 'openai',
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      chatModel: env.LLM_MODEL,
      embeddingModel: env.EMBEDDING_MODEL,
    };
  }

  return undefined;
};

export const buildPlannerConfig = (env: Env, cwd: string = process.cwd()): PlannerConfig => ({
  storageDriver: env.STORAGE_DRIVER,
  provider: resolveProvider(env),
  retry: {
    timeoutMs: env.PROVIDER_TIMEOUT_MS,
    retries: 1,
    backoffMs: env.PROVIDER_RETRY_BACKOFF_MS,
  },
  generation: { maxCompletionTokens: env.GENERATION_MAX_TOKENS },
  embedding: { dimensions: env.EMBEDDING_DIMENSIONS },
  search: {
    topK: env.SEARCH_TOP_K,
    boosts: {
      subjectKeyword: env.BOOST_SUBJECT_KEYWORD,
      titleTerm: env.BOOST_TITLE_TERM,
      groupingModeMatch: env.BOOST_GROUPING_MODE_MATCH,
      groupingModeMismatch: env.BOOST_GROUPING_MODE_MISMATCH,
    },
  },
  grouping: {
    defaultGroupSize: env.DEFAULT_GROUP_SIZE,
    tuning: { zpdStep: 1, zpdMaxGap: 2 },
  },
  paths: {
    libraryDir: resolve(cwd, env.ACTIVITY_LIBRARY_DIR),
    rosterPath: resolve(cwd, env.ROSTER_PATH),
    embeddingCachePath: resolve(cwd, env.EMBEDDING_CACHE_PATH),
  },
});
