import { eq } from 'drizzle-orm';
import {
  db,
  guardedQuery,
  dimSpatial,
  adminIntermediate,
  adminCoarsest,
  goldActivity,
  goldDemographics,
} from '@geoinsight/db';
import type { Database } from '@geoinsight/db';
import type { FactStore, LoadFactsOptions } from './fact-store';
import type { FactSnapshot, SpatialDirectorySnapshot } from '../types';

/** Fact store over the `gold_*` tables and the administrative directories. */
export class DrizzleFactStore implements FactStore {
  constructor(
    private readonly database: Database = db,
    private readonly queryTimeoutMs?: number,
  ) {}

  async loadDirectory({ signal }: { signal?: AbortSignal } = {}): Promise<SpatialDirectorySnapshot> {
    const options = { timeoutMs: this.queryTimeoutMs, signal };
    const [finest, intermediate, coarsest] = await Promise.all([
      guardedQuery(
        'insights.loadDirectory.finest',
        () =>
          this.database
            .select({
              spatialKey: dimSpatial.spatialKey,
              spatialLabel: dimSpatial.spatialLabel,
              spatialType: dimSpatial.spatialType,
              code: dimSpatial.code,
            })
            .from(dimSpatial),
        options,
      ),
      guardedQuery(
        'insights.loadDirectory.intermediate',
        () => this.database.select().from(adminIntermediate),
        options,
      ),
      guardedQuery(
        'insights.loadDirectory.coarsest',
        () => this.database.select().from(adminCoarsest),
        options,
      ),
    ]);
    return { finest, intermediate, coarsest };
  }

  async loadFacts({ granularity, signal }: LoadFactsOptions): Promise<FactSnapshot> {
    // an aborted caller stops waiting; postgres.js still finishes the statement
    const options = { timeoutMs: this.queryTimeoutMs, signal };
    const [activity, demographics] = await Promise.all([
      guardedQuery(
        'insights.loadFacts.activity',
        () => this.database.select().from(goldActivity).where(eq(goldActivity.granularity, granularity)),
        options,
      ),
      guardedQuery(
        'insights.loadFacts.demographics',
        () =>
          this.database
            .select()
            .from(goldDemographics)
            .where(eq(goldDemographics.granularity, granularity)),
        options,
      ),
    ]);
    return { activity, demographics };
  }
}
