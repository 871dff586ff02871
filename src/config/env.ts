import 'dotenv/config';

import { z } from 'zod';

const optionalNonEmptyString = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().min(1).optional());

const optionalUrl = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().url().optional());

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(3001),
    STORAGE_DRIVER: z.enum(['file', 'postgres']).default('file'),

    LLM_MODEL: z.string().trim().min(1).default('gpt-5-mini'),
    EMBEDDING_MODEL: z.string().trim().min(1).default('text-embedding-3-small'),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().min(8).max(3072).default(256),
    AZURE_OPENAI_API_KEY: optionalNonEmptyString,
    AZURE_OPENAI_ENDPOINT: optionalUrl,
    AZURE_OPENAI_DEPLOYMENT: optionalNonEmptyString,
    AZURE_OPENAI_EMBEDDING_DEPLOYMENT: optionalNonEmptyString,
    OPENAI_API_KEY: optionalNonEmptyString,
    OPENAI_BASE_URL: optionalUrl,

    PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    PROVIDER_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
    GENERATION_MAX_TOKENS: z.coerce.number().int().min(256).max(16_000).default(2_000),

    ACTIVITY_LIBRARY_DIR: z.string().trim().min(1).default('data/activities'),
    ROSTER_PATH: z.string().trim().min(1).default('data/roster.json'),
    EMBEDDING_CACHE_PATH: z.string().trim().min(1).default('.cache/embeddings.json'),

    SEARCH_TOP_K: z.coerce.number().int().min(1).max(20).default(2),
    DEFAULT_GROUP_SIZE: z.coerce.number().int().min(2).max(10).default(4),
    BOOST_SUBJECT_KEYWORD: z.coerce.number().default(0.15),
    BOOST_TITLE_TERM: z.coerce.number().default(0.05),
    BOOST_GROUPING_MODE_MATCH: z.coerce.number().default(0.05),
    BOOST_GROUPING_MODE_MISMATCH: z.coerce.number().default(-0.1),

    DB_HOST: optionalNonEmptyString,
    DB_PORT: z.coerce.number().int().positive().default(5432),
    DB_USERNAME: optionalNonEmptyString,
    DB_PASSWORD: optionalNonEmptyString,
    DB_NAME: optionalNonEmptyString,
    DB_LOGGING: booleanFlag,
  })
  .superRefine((values, context) => {
    if (values.STORAGE_DRIVER !== 'postgres') {
      return;
    }

    for (const key of ['DB_HOST', 'DB_USERNAME', 'DB_PASSWORD', 'DB_NAME'] as const) {
      if (!values[key]) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when STORAGE_DRIVER=postgres.`,
        });
      }
    }
  });

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
