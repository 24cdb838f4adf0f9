import { InternalError } from '@geoinsight/shared';
import { logger, errorField, withDeadline, toUpstreamError } from '@geoinsight/core';
import {
  DEFAULT_STRUCTURED_QUERY,
  STRUCTURED_QUERY_SCHEMA_VERSION,
  parseStructuredQuery,
} from '../structured-query';
import type { StructuredQuery } from '../structured-query';
import type { QueryTranslator } from '../llm/translator';
import type { EmbeddingProvider } from '../llm/embeddings';
import { normalizeRequestText, requestFingerprint } from './fingerprint';
import type { QueryMappingEntry, QueryMappingStore } from './query-mapping-store';
import type { VectorIndex, VectorMatch } from './vector-index';

export type CacheOutcome = 'exact-hit' | 'near-hit' | 'miss' | 'fallback';

export interface CacheLookup {
  outcome: CacheOutcome;
  query: StructuredQuery;
  requestHash: string;
  /** Entry a near-hit reused. */
  matchedHash: string | null;
  similarity: number | null;
  /** True when the default query stands in for an untranslatable request. */
  fallback: boolean;
}

export interface SemanticQueryCacheOptions {
  /** Minimum cosine similarity for a near-hit. */
  similarityThreshold: number;
  topK: number;
  /** Deadline for embedding plus similarity search. */
  lookupTimeoutMs: number;
  translatorTimeoutMs: number;
  schemaVersion?: string;
}

export interface SemanticQueryCacheDeps {
  store: QueryMappingStore;
  index: VectorIndex;
  translator: QueryTranslator;
  embeddings: EmbeddingProvider;
}

export interface ResolveOptions {
  signal?: AbortSignal;
}

type CacheState = 'created' | 'ready' | 'closed';

const OPERATION = 'query-cache.resolve';

/** A caller that cancelled gets the aborted error, not a degraded answer. */
function rethrowIfCancelled(err: unknown, signal?: AbortSignal): void {
  if (signal?.aborted) throw err;
}

/**
 * Maps free-text requests to structured queries.
 *
 * A request first looks for its exact fingerprint, then for a stored
 * request whose embedding is at least `similarityThreshold` similar, and
 * only then calls the translator. A near-hit is recorded as an alias of
 * the entry it matched without translating again. When translation fails
 * the default structured query is returned with `fallback: true`.
 *
 * Lifecycle: `init` before the first `resolve`; `teardown` waits for alias
 * writes still in flight and refuses further lookups.
 */
export class SemanticQueryCache {
  private state: CacheState = 'created';
  private readonly pending = new Set<Promise<void>>();
  private readonly schemaVersion: string;

  constructor(
    private readonly deps: SemanticQueryCacheDeps,
    private readonly options: SemanticQueryCacheOptions,
  ) {
    this.schemaVersion = options.schemaVersion ?? STRUCTURED_QUERY_SCHEMA_VERSION;
  }

  async init(): Promise<void> {
    if (this.state === 'closed') throw new InternalError('query cache has been torn down');
    this.state = 'ready';
    logger.info('Query cache ready', {
      operation: 'query-cache.init',
      parserId: this.deps.translator.parserId,
      schemaVersion: this.schemaVersion,
      similarityThreshold: this.options.similarityThreshold,
    });
  }

  async teardown(): Promise<void> {
    this.state = 'closed';
    let flushed = 0;
    while (this.pending.size > 0) {
      flushed += this.pending.size;
      await Promise.all([...this.pending]);
    }
    logger.info('Query cache closed', { operation: 'query-cache.teardown', flushed });
  }

  get pendingWrites(): number {
    return this.pending.size;
  }

  async resolve(text: string, { signal }: ResolveOptions = {}): Promise<CacheLookup> {
    if (this.state !== 'ready') {
      throw new InternalError(`query cache is ${this.state === 'created' ? 'not initialized' : 'closed'}`);
    }
    const start = Date.now();
    const requestText = normalizeRequestText(text);
    const parserId = this.deps.translator.parserId;
    const requestHash = requestFingerprint({
      text: requestText,
      parserId,
      schemaVersion: this.schemaVersion,
    });

    const exact = await this.lookupExact(requestHash, signal);
    if (exact) {
      return this.finish(start, {
        outcome: 'exact-hit',
        query: exact.query,
        requestHash,
        matchedHash: null,
        similarity: null,
        fallback: false,
      });
    }

    const embedding = await this.embed(requestText, signal);
    if (embedding) {
      const near = await this.findNear(embedding, parserId, signal);
      if (near) {
        this.recordAlias(requestHash, requestText, near.requestHash, near.query, embedding);
        return this.finish(start, {
          outcome: 'near-hit',
          query: near.query,
          requestHash,
          matchedHash: near.requestHash,
          similarity: near.similarity,
          fallback: false,
        });
      }
    }

    const translated = await this.translate(text, signal);
    if (!translated) {
      return this.finish(start, {
        outcome: 'fallback',
        query: DEFAULT_STRUCTURED_QUERY,
        requestHash,
        matchedHash: null,
        similarity: null,
        fallback: true,
      });
    }

    const stored = await this.store(requestHash, requestText, translated, embedding);
    return this.finish(start, {
      outcome: 'miss',
      query: stored,
      requestHash,
      matchedHash: null,
      similarity: null,
      fallback: false,
    });
  }

  // ── Steps ──

  private async lookupExact(requestHash: string, signal?: AbortSignal): Promise<QueryMappingEntry | null> {
    try {
      return await withDeadline('query-cache', () => this.deps.store.get(requestHash), {
        timeoutMs: this.options.lookupTimeoutMs,
        signal,
      });
    } catch (err) {
      rethrowIfCancelled(err, signal);
      logger.warn('Exact lookup failed; continuing without it', {
        operation: OPERATION,
        requestHash,
        error: errorField(err),
      });
      return null;
    }
  }

  private async embed(requestText: string, signal?: AbortSignal): Promise<number[] | null> {
    try {
      return await withDeadline(
        'embeddings',
        (deadline) => this.deps.embeddings.embed(requestText, { signal: deadline }),
        { timeoutMs: this.options.lookupTimeoutMs, signal },
      );
    } catch (err) {
      rethrowIfCancelled(err, signal);
      // without an embedding the request can still be translated and stored
      logger.warn('Request embedding unavailable; skipping similarity lookup', {
        operation: OPERATION,
        error: errorField(err),
      });
      return null;
    }
  }

  private async findNear(
    embedding: number[],
    parserId: string,
    signal?: AbortSignal,
  ): Promise<{ requestHash: string; query: StructuredQuery; similarity: number } | null> {
    let matches: VectorMatch[];
    try {
      matches = await withDeadline(
        'vector-index',
        () =>
          this.deps.index.search({
            embedding,
            parserId,
            schemaVersion: this.schemaVersion,
            topK: this.options.topK,
          }),
        { timeoutMs: this.options.lookupTimeoutMs, signal },
      );
    } catch (err) {
      rethrowIfCancelled(err, signal);
      logger.warn('Similarity lookup failed; treating as a miss', {
        operation: OPERATION,
        error: errorField(err),
      });
      return null;
    }

    try {
      return await withDeadline(
        'query-cache',
        async () => {
          for (const match of matches) {
            if (match.similarity < this.options.similarityThreshold) break;
            const entry = await this.deps.store.get(match.requestHash);
            if (entry && entry.schemaVersion === this.schemaVersion && entry.parserId === parserId) {
              return { requestHash: entry.requestHash, query: entry.query, similarity: match.similarity };
            }
          }
          return null;
        },
        { timeoutMs: this.options.lookupTimeoutMs, signal },
      );
    } catch (err) {
      rethrowIfCancelled(err, signal);
      logger.warn('Reading similar entries failed; treating as a miss', {
        operation: OPERATION,
        error: errorField(err),
      });
      return null;
    }
  }

  private async translate(text: string, signal?: AbortSignal): Promise<StructuredQuery | null> {
    try {
      const raw = await withDeadline(
        'translator',
        async (deadline) => {
          try {
            return await this.deps.translator.translate(text, { signal: deadline });
          } catch (err) {
            throw toUpstreamError('translator', err);
          }
        },
        { timeoutMs: this.options.translatorTimeoutMs, signal },
      );
      const query = parseStructuredQuery(raw);
      if (!query) {
        logger.warn('Translator output is not a valid structured query', {
          operation: OPERATION,
          outcome: 'fallback',
        });
      }
      return query;
    } catch (err) {
      rethrowIfCancelled(err, signal);
      logger.warn('Translator unavailable; using the default query', {
        operation: OPERATION,
        outcome: 'fallback',
        error: errorField(err),
      });
      return null;
    }
  }

  /** Stores a fresh translation; returns the query the store kept. */
  private async store(
    requestHash: string,
    requestText: string,
    query: StructuredQuery,
    embedding: number[] | null,
  ): Promise<StructuredQuery> {
    const parserId = this.deps.translator.parserId;
    try {
      const stored = await this.deps.store.put({
        requestHash,
        requestText,
        parserId,
        schemaVersion: this.schemaVersion,
        query,
        aliasOf: null,
      });
      if (embedding) {
        await this.deps.index.add({ requestHash, parserId, schemaVersion: this.schemaVersion, embedding });
      }
      return stored.query;
    } catch (err) {
      // the caller still gets its translation; only reuse is lost
      logger.error('Failed to store translated query', {
        operation: 'query-cache.store',
        requestHash,
        error: errorField(err),
      });
      return query;
    }
  }

  private recordAlias(
    requestHash: string,
    requestText: string,
    aliasOf: string,
    query: StructuredQuery,
    embedding: number[],
  ): void {
    // a lookup that finishes after teardown still answers but writes nothing
    if (this.state !== 'ready') return;
    const parserId = this.deps.translator.parserId;
    const write = (async () => {
      await this.deps.store.put({
        requestHash,
        requestText,
        parserId,
        schemaVersion: this.schemaVersion,
        query,
        aliasOf,
      });
      await this.deps.index.add({ requestHash, parserId, schemaVersion: this.schemaVersion, embedding });
    })()
      .catch((err: unknown) => {
        logger.error('Failed to record query alias', {
          operation: 'query-cache.store',
          requestHash,
          aliasOf,
          error: errorField(err),
        });
      })
      .finally(() => {
        this.pending.delete(write);
      });
    this.pending.add(write);
  }

  private finish(start: number, lookup: CacheLookup): CacheLookup {
    logger.info(`Query cache ${lookup.outcome}`, {
      operation: OPERATION,
      outcome: lookup.outcome,
      requestHash: lookup.requestHash,
      matchedHash: lookup.matchedHash ?? undefined,
      similarity: lookup.similarity ?? undefined,
      durationMs: Date.now() - start,
    });
    return lookup;
  }
}

