import { LOCK_KEYS, generateUlid, isAppError, nowUTC } from '@geoinsight/shared';
import type { SpatialLevel } from '@geoinsight/shared';
import { singleFlight } from '@geoinsight/db';
import { logger, errorField, withDeadline, toUpstreamError } from '@geoinsight/core';
import type { RefreshLock } from '@geoinsight/core';
import type { FactStore } from '../facts/fact-store';
import type { ResolutionRules } from '../spatial/strategies';
import { loadInsightCandidates } from '../candidates/load-candidates';
import { computeAdvancedInsights } from './advanced-aggregator';
import type { AdvancedInsightRepository, CurrentInsight } from './repository';
import type { AdvancedInsightGeneration } from '../types';

export interface AdvancedInsightServiceDeps {
  factStore: FactStore;
  repository: AdvancedInsightRepository;
  /** Single-writer guard; in-process or distributed. */
  lock: RefreshLock;
  rules: ResolutionRules;
  refreshTimeoutMs: number;
}

export interface RefreshOptions {
  signal?: AbortSignal;
  trigger?: string;
}

export type RefreshResult =
  | { status: 'published'; generation: AdvancedInsightGeneration }
  | { status: 'skipped'; reason: 'refresh_in_progress' };

/**
 * Owns the advanced insight batch. Reads are served from the last
 * published generation; `refresh` recomputes from a fresh fact snapshot
 * and publishes a new one. Concurrent refreshes in one process share the
 * in-flight run; a refresh that loses the lock to another process is
 * skipped. A failed refresh publishes nothing, so the previous generation
 * keeps serving reads.
 */
export class AdvancedInsightService {
  private readonly flightKey = `${LOCK_KEYS.ADVANCED_INSIGHT_REFRESH}:${generateUlid()}`;

  constructor(private readonly deps: AdvancedInsightServiceDeps) {}

  /**
   * Each caller waits on the shared run under its own signal: an aborted
   * caller stops waiting, the run goes on for the others.
   */
  refresh({ signal, trigger = 'manual' }: RefreshOptions = {}): Promise<RefreshResult> {
    return withDeadline(
      'advanced-insight-refresh',
      () => singleFlight(this.flightKey, () => this.runRefresh(trigger)),
      { timeoutMs: this.deps.refreshTimeoutMs, signal },
    );
  }

  async getCurrent(level: SpatialLevel, spatialLabel: string): Promise<CurrentInsight | null> {
    return this.deps.repository.findCurrent(level, spatialLabel);
  }

  async currentGeneration(): Promise<AdvancedInsightGeneration | null> {
    return this.deps.repository.currentGeneration();
  }

  private async runRefresh(trigger: string): Promise<RefreshResult> {
    const { lock, repository, factStore, rules, refreshTimeoutMs } = this.deps;
    const start = Date.now();
    logger.info('Advanced insight refresh started', {
      operation: 'advanced-insight.refresh',
      outcome: 'start',
      trigger,
    });

    try {
      const outcome = await lock.run(LOCK_KEYS.ADVANCED_INSIGHT_REFRESH, async () => {
        const collection = await withDeadline(
          'fact-store',
          async (deadline) => {
            try {
              return await loadInsightCandidates(factStore, { rules, signal: deadline });
            } catch (err) {
              // invariant violations stay as they are; anything else is the data source
              if (isAppError(err)) throw err;
              throw toUpstreamError('fact-store', err);
            }
          },
          { timeoutMs: refreshTimeoutMs },
        );

        const rows = computeAdvancedInsights(collection.candidates);
        const generation: AdvancedInsightGeneration = {
          id: generateUlid(),
          refreshedAt: nowUTC(),
          candidateCount: collection.candidates.length,
          rowCount: rows.length,
          durationMs: Date.now() - start,
        };
        await repository.publish(generation, rows);
        return generation;
      });

      if (!outcome.acquired) {
        logger.info('Advanced insight refresh skipped; another writer holds the lock', {
          operation: 'advanced-insight.refresh',
          outcome: 'lock_contended',
          trigger,
        });
        return { status: 'skipped', reason: 'refresh_in_progress' };
      }

      logger.info('Advanced insight generation published', {
        operation: 'advanced-insight.refresh',
        outcome: 'published',
        trigger,
        generationId: outcome.value.id,
        rowCount: outcome.value.rowCount,
        durationMs: Date.now() - start,
      });
      return { status: 'published', generation: outcome.value };
    } catch (err) {
      logger.error('Advanced insight refresh failed; previous generation still serving', {
        operation: 'advanced-insight.refresh',
        outcome: 'failed',
        trigger,
        durationMs: Date.now() - start,
        error: errorField(err),
      });
      throw err;
    }
  }
}
