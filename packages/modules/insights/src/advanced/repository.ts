import type { SpatialLevel } from '@geoinsight/shared';
import type { AdvancedInsight, AdvancedInsightGeneration } from '../types';

export interface CurrentInsight {
  generation: AdvancedInsightGeneration;
  insight: AdvancedInsight | null;
}

/**
 * Storage for advanced insight generations. `publish` must make the new
 * generation visible atomically: a reader sees the previous generation or
 * the new one, never part of either.
 */
export interface AdvancedInsightRepository {
  publish(generation: AdvancedInsightGeneration, rows: readonly AdvancedInsight[]): Promise<void>;
  currentGeneration(): Promise<AdvancedInsightGeneration | null>;
  /** Null when nothing has been published yet. */
  findCurrent(level: SpatialLevel, spatialLabel: string): Promise<CurrentInsight | null>;
}

interface PublishedGeneration {
  generation: AdvancedInsightGeneration;
  rows: ReadonlyMap<string, AdvancedInsight>;
}

function rowKey(level: SpatialLevel, spatialLabel: string): string {
  return `${level}\u0000${spatialLabel}`;
}

/** Keeps generations in memory; publishing swaps one reference. */
export class InMemoryAdvancedInsightRepository implements AdvancedInsightRepository {
  private current: PublishedGeneration | null = null;

  async publish(
    generation: AdvancedInsightGeneration,
    rows: readonly AdvancedInsight[],
  ): Promise<void> {
    const index = new Map<string, AdvancedInsight>();
    for (const row of rows) index.set(rowKey(row.level, row.spatialLabel), { ...row });
    this.current = { generation: { ...generation }, rows: index };
  }

  async currentGeneration(): Promise<AdvancedInsightGeneration | null> {
    return this.current?.generation ?? null;
  }

  async findCurrent(level: SpatialLevel, spatialLabel: string): Promise<CurrentInsight | null> {
    const published = this.current;
    if (!published) return null;
    return {
      generation: published.generation,
      insight: published.rows.get(rowKey(level, spatialLabel)) ?? null,
    };
  }
}
