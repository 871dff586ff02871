import type OpenAI from 'openai';

import { MalformedResponseError } from '../shared/errors/planner-errors';
import { stableHash, tokenize } from '../shared/text';

export interface EmbeddingProvider {
  /** Identifies the vector space; entries from different models never mix. */
  readonly model: string;
  readonly dimensions: number | undefined;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  public constructor(
    private readonly client: OpenAI,
    public readonly model: string,
    public readonly dimensions: number | undefined,
  ) {}

  public async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const response = await this.client.embeddings.create(
      {
        model: this.model,
        input: text,
        ...(this.dimensions !== undefined ? { dimensions: this.dimensions } : {}),
      },
      { signal },
    );

    const vector = response.data[0]?.embedding;
    if (!Array.isArray(vector) || vector.length === 0) {
      throw new MalformedResponseError('Embedding response did not contain a vector.', {
        model: this.model,
      });
    }

    return vector;
  }
}

/**
 * Offline embedder: feature hashing over word tokens and their character trigrams,
 * L2-normalized. Deterministic, so cached vectors stay valid across runs.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  public readonly model: string;

  public constructor(public readonly dimensions: number = 256) {
    this.model = `local-hashing-${dimensions}`;
  }

  public embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (const token of tokenize(text)) {
      this.accumulate(vector, `w:${token}`, 1);

      const padded = `^${token}$`;
      for (let index = 0; index + 3 <= padded.length; index += 1) {
        this.accumulate(vector, `c:${padded.slice(index, index + 3)}`, 0.5);
      }
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return Promise.resolve(norm === 0 ? vector : vector.map((value) => value / norm));
  }

  private accumulate(vector: number[], feature: string, weight: number): void {
    const hash = stableHash(feature);
    const slot = hash % this.dimensions;
    const sign = stableHash(`${feature}#`) % 2 === 0 ? 1 : -1;
    vector[slot] = (vector[slot] ?? 0) + sign * weight;
  }
}
