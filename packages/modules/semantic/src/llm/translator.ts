import { createHash } from 'node:crypto';
import OpenAI from 'openai';
import { UpstreamUnavailableError } from '@geoinsight/shared';
import { STRUCTURED_QUERY_SCHEMA_VERSION } from '../structured-query';

export interface TranslateOptions {
  signal?: AbortSignal;
}

/**
 * Turns free text into a candidate structured query. The result is
 * untrusted: callers validate it against the structured-query schema.
 */
export interface QueryTranslator {
  /** Provider, model and prompt identity; part of every cache fingerprint. */
  readonly parserId: string;
  translate(text: string, options?: TranslateOptions): Promise<unknown>;
}

export const TRANSLATOR_PROMPT = `You convert analytical questions about regional activity into JSON.
Reply with a single JSON object and nothing else. Choose one "operation":

- "compare_domains": { "region", "periodFrom", "periodTo", "domains", "level" }
- "get_rankings": { "metric", "period", "topK", "level" }
- "detect_anomaly": { "region", "domain", "period", "zThreshold", "level" }
- "get_advanced_insight": { "region", "period", "domains", "level" }

Rules:
- "domain" is "population" or "sales"; "domains" is a list of those.
- "metric" is "foot_traffic", "activity_volume" or "sales".
- Periods are "YYYY", "YYYY-MM" or "YYYY-MM-DD".
- "level" is "finest", "intermediate" or "coarsest"; omit it when the question does not say.
- Use null for anything the question does not mention.
Schema version: ${STRUCTURED_QUERY_SCHEMA_VERSION}`;

export function promptHash(prompt: string): string {
  return createHash('sha256').update(prompt).digest('hex').slice(0, 12);
}

export interface OpenAITranslatorOptions {
  apiKey: string;
  model: string;
  /** Client-level request timeout; the cache applies its own deadline too. */
  timeoutMs?: number;
  client?: OpenAI;
}

/** Chat completion in JSON mode. */
export class OpenAITranslator implements QueryTranslator {
  readonly parserId: string;
  private readonly client: OpenAI;
  private readonly model: string;

  constructor({ apiKey, model, timeoutMs, client }: OpenAITranslatorOptions) {
    this.model = model;
    this.client = client ?? new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });
    this.parserId = `openai:${model}:${promptHash(TRANSLATOR_PROMPT)}`;
  }

  async translate(text: string, { signal }: TranslateOptions = {}): Promise<unknown> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: 0,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: TRANSLATOR_PROMPT },
          { role: 'user', content: text },
        ],
      },
      { signal },
    );
    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new UpstreamUnavailableError('translator', 'rejected', 'translator returned no content');
    }
    try {
      return JSON.parse(content);
    } catch {
      throw new UpstreamUnavailableError('translator', 'rejected', 'translator returned malformed JSON');
    }
  }
}

/** Stands in when no credential is configured; every call fails as unavailable. */
export class UnavailableTranslator implements QueryTranslator {
  readonly parserId: string;

  constructor(model: string) {
    this.parserId = `openai:${model}:${promptHash(TRANSLATOR_PROMPT)}`;
  }

  async translate(): Promise<unknown> {
    throw new UpstreamUnavailableError('translator', 'unreachable', 'translator is not configured');
  }
}
