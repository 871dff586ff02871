import type OpenAI from 'openai';
import type { ChatCompletion } from 'openai/resources/chat/completions';

import type { ProviderCredentials } from '../../config/planner-config';
import { MalformedResponseError, ProviderUnavailableError } from '../shared/errors/planner-errors';
import { logger } from '../shared/logger';

export interface GenerateChatCompletionInput {
  systemPrompt: string;
  userPrompt: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface GenerateChatCompletionOutput {
  text: string;
  model: string;
  provider: 'openai' | 'azure_openai';
}

export interface LlmTool {
  readonly available: boolean;
  generateChatCompletion(input: GenerateChatCompletionInput): Promise<GenerateChatCompletionOutput>;
}

const DEFAULT_COMPLETION_TOKENS = 2_000;
const MIN_COMPLETION_TOKENS = 256;
const MAX_COMPLETION_TOKENS = 16_000;

const clampCompletionTokens = (requested?: number): number => {
  if (typeof requested !== 'number' || !Number.isFinite(requested)) {
    return DEFAULT_COMPLETION_TOKENS;
  }

  return Math.max(MIN_COMPLETION_TOKENS, Math.min(MAX_COMPLETION_TOKENS, Math.floor(requested)));
};

/** Reasoning models can spend the whole budget before answering; the retry gets 1.5x. */
const calculateRetryTokens = (baseMaxTokens: number): number => {
  return Math.min(MAX_COMPLETION_TOKENS, Math.max(baseMaxTokens + 500, Math.floor(baseMaxTokens * 1.5)));
};

class OpenAiLlmTool implements LlmTool {
  public readonly available = true;

  public constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly provider: GenerateChatCompletionOutput['provider'],
  ) {}

  public async generateChatCompletion(
    input: GenerateChatCompletionInput,
  ): Promise<GenerateChatCompletionOutput> {
    const baseMaxTokens = clampCompletionTokens(input.maxTokens);

    let completion = await this.complete(input, baseMaxTokens);
    let text = completion.choices[0]?.message.content?.trim() ?? '';

    if (!text && completion.choices[0]?.finish_reason === 'length') {
      const retryMaxTokens = calculateRetryTokens(baseMaxTokens);
      logger.warn('llm_completion_truncated_retry', {
        provider: this.provider,
        model: this.model,
        baseMaxTokens,
        retryMaxTokens,
      });

      completion = await this.complete(input, retryMaxTokens);
      text = completion.choices[0]?.message.content?.trim() ?? '';
    }

    if (!text) {
      throw new MalformedResponseError('The generation provider returned an empty completion.', {
        finishReason: completion.choices[0]?.finish_reason ?? null,
      });
    }

    return {
      text,
      model: completion.model.trim() || this.model,
      provider: this.provider,
    };
  }

  private complete(input: GenerateChatCompletionInput, maxTokens: number): Promise<ChatCompletion> {
    return this.client.chat.completions.create(
      {
        model: this.model,
        max_completion_tokens: maxTokens,
        messages: [
          { role: 'system', content: input.systemPrompt },
          { role: 'user', content: input.userPrompt },
        ],
        ...(input.temperature !== undefined ? { temperature: input.temperature } : {}),
      },
      { signal: input.signal },
    );
  }
}

/** Stand-in when no credentials are configured: every call fails fast so callers take their fallback. */
class OfflineLlmTool implements LlmTool {
  public readonly available = false;

  public generateChatCompletion(): Promise<GenerateChatCompletionOutput> {
    return Promise.reject(new ProviderUnavailableError('No generation provider is configured.'));
  }
}

export const createLlmTool = (client: OpenAI | undefined, credentials: ProviderCredentials | undefined): LlmTool => {
  if (!client || !credentials) {
    logger.warn('llm_provider_not_configured', { fallback: 'templated_drafts' });
    return new OfflineLlmTool();
  }

  return new OpenAiLlmTool(client, credentials.chatModel, credentials.kind);
};
