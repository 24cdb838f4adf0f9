import { and, eq, ne, lt } from 'drizzle-orm';
import {
  db,
  guardedQuery,
  insightAdvanced,
  insightAdvancedGenerations,
  insightRefreshState,
} from '@geoinsight/db';
import type { Database } from '@geoinsight/db';
import { SPATIAL_LEVELS } from '@geoinsight/shared';
import type { SpatialLevel } from '@geoinsight/shared';
import type { AdvancedInsightRepository, CurrentInsight } from './repository';
import type { AdvancedInsight, AdvancedInsightGeneration } from '../types';

const INSERT_CHUNK_SIZE = 500;
const CURRENT_STATE_ID = 'current';

type GenerationRow = typeof insightAdvancedGenerations.$inferSelect;
type InsightRow = typeof insightAdvanced.$inferSelect;

function toGeneration(row: GenerationRow): AdvancedInsightGeneration {
  return {
    id: row.id,
    refreshedAt: row.refreshedAt.toISOString(),
    candidateCount: row.candidateCount,
    rowCount: row.rowCount,
    durationMs: row.durationMs,
  };
}

function toInsight(row: InsightRow): AdvancedInsight | null {
  const level = SPATIAL_LEVELS.find((l) => l === row.level);
  if (!level) return null;
  return {
    level,
    spatialLabel: row.spatialLabel,
    pairCount: row.pairCount,
    corrSalesFootTraffic: row.corrSalesFootTraffic,
    salesImpactSlope: row.salesImpactSlope,
    salesImpactScore: row.salesImpactScore,
    footTrafficImpactScore: row.footTrafficImpactScore,
  };
}

/**
 * Postgres-backed generations. A publish writes the generation's rows and
 * moves the `insight_refresh_state` pointer in one transaction, then prunes
 * generations older than the one it replaced.
 */
export class DrizzleAdvancedInsightRepository implements AdvancedInsightRepository {
  constructor(
    private readonly database: Database = db,
    private readonly publishTimeoutMs = 60_000,
  ) {}

  async publish(
    generation: AdvancedInsightGeneration,
    rows: readonly AdvancedInsight[],
  ): Promise<void> {
    await guardedQuery(
      'insights.advanced.publish',
      () =>
        this.database.transaction(async (tx) => {
          const refreshedAt = new Date(generation.refreshedAt);
          await tx.insert(insightAdvancedGenerations).values({ ...generation, refreshedAt });

          for (let i = 0; i < rows.length; i += INSERT_CHUNK_SIZE) {
            const chunk = rows.slice(i, i + INSERT_CHUNK_SIZE);
            await tx
              .insert(insightAdvanced)
              .values(chunk.map((row) => ({ ...row, generationId: generation.id })));
          }

          const [previous] = await tx
            .select({ generationId: insightRefreshState.generationId })
            .from(insightRefreshState)
            .where(eq(insightRefreshState.id, CURRENT_STATE_ID));

          await tx
            .insert(insightRefreshState)
            .values({ id: CURRENT_STATE_ID, generationId: generation.id, refreshedAt })
            .onConflictDoUpdate({
              target: insightRefreshState.id,
              set: { generationId: generation.id, refreshedAt },
            });

          // keep the new generation and the one it replaced
          const keep = previous?.generationId ?? generation.id;
          await tx
            .delete(insightAdvanced)
            .where(and(ne(insightAdvanced.generationId, generation.id), lt(insightAdvanced.generationId, keep)));
          await tx
            .delete(insightAdvancedGenerations)
            .where(
              and(
                ne(insightAdvancedGenerations.id, generation.id),
                lt(insightAdvancedGenerations.id, keep),
              ),
            );
        }),
      { timeoutMs: this.publishTimeoutMs },
    );
  }

  async currentGeneration(): Promise<AdvancedInsightGeneration | null> {
    const [row] = await guardedQuery('insights.advanced.currentGeneration', () =>
      this.database
        .select({ generation: insightAdvancedGenerations })
        .from(insightRefreshState)
        .innerJoin(
          insightAdvancedGenerations,
          eq(insightAdvancedGenerations.id, insightRefreshState.generationId),
        )
        .where(eq(insightRefreshState.id, CURRENT_STATE_ID)),
    );
    return row ? toGeneration(row.generation) : null;
  }

  async findCurrent(level: SpatialLevel, spatialLabel: string): Promise<CurrentInsight | null> {
    // one statement, so the pointer and the rows come from the same snapshot
    const rows = await guardedQuery('insights.advanced.findCurrent', () =>
      this.database
        .select({ generation: insightAdvancedGenerations, insight: insightAdvanced })
        .from(insightRefreshState)
        .innerJoin(
          insightAdvancedGenerations,
          eq(insightAdvancedGenerations.id, insightRefreshState.generationId),
        )
        .leftJoin(
          insightAdvanced,
          and(
            eq(insightAdvanced.generationId, insightRefreshState.generationId),
            eq(insightAdvanced.level, level),
            eq(insightAdvanced.spatialLabel, spatialLabel),
          ),
        )
        .where(eq(insightRefreshState.id, CURRENT_STATE_ID))
        .limit(1),
    );
    const [row] = rows;
    if (!row) return null;
    return {
      generation: toGeneration(row.generation),
      insight: row.insight ? toInsight(row.insight) : null,
    };
  }
}
