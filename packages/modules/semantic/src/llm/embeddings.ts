import OpenAI from 'openai';
import { EMBEDDING_DIMENSIONS } from '@geoinsight/db';
import { UpstreamUnavailableError } from '@geoinsight/shared';

export interface EmbedOptions {
  signal?: AbortSignal;
}

export interface EmbeddingProvider {
  embed(text: string, options?: EmbedOptions): Promise<number[]>;
}

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
  client?: OpenAI;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor({ apiKey, model, timeoutMs, client }: OpenAIEmbeddingOptions) {
    this.model = model;
    this.client = client ?? new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });
  }

  async embed(text: string, { signal }: EmbedOptions = {}): Promise<number[]> {
    const response = await this.client.embeddings.create(
      { model: this.model, input: text, dimensions: EMBEDDING_DIMENSIONS },
      { signal },
    );
    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new UpstreamUnavailableError('embeddings', 'rejected', 'embedding response was empty');
    }
    return embedding;
  }
}

export class UnavailableEmbeddingProvider implements EmbeddingProvider {
  async embed(): Promise<number[]> {
    throw new UpstreamUnavailableError('embeddings', 'unreachable', 'embeddings are not configured');
  }
}
