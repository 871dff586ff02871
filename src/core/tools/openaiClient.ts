import OpenAI from 'openai';

import type { ProviderCredentials } from '../../config/planner-config';

const normalizeAzureBaseUrl = (endpoint: string): string => {
  const trimmed = endpoint.trim().replace(/\/+$/, '');
  if (/\/openai\/v1$/i.test(trimmed)) {
    return `${trimmed}/`;
  }

  return `${trimmed}/openai/v1/`;
};

/**
 * Azure resources are reached through their OpenAI-compatible v1 surface, so one
 * SDK client covers both providers. SDK retries are off: callers own the retry budget.
 */
export const createOpenAiClient = (credentials: ProviderCredentials, timeoutMs: number): OpenAI => {
  if (credentials.kind === 'azure_openai' && credentials.baseUrl) {
    return new OpenAI({
      apiKey: credentials.apiKey,
      baseURL: normalizeAzureBaseUrl(credentials.baseUrl),
      defaultHeaders: { 'api-key': credentials.apiKey },
      timeout: timeoutMs,
      maxRetries: 0,
    });
  }

  return new OpenAI({
    apiKey: credentials.apiKey,
    baseURL: credentials.baseUrl,
    timeout: timeoutMs,
    maxRetries: 0,
  });
};
