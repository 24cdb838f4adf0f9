import type { FactStore, LoadFactsOptions } from './fact-store';
import type {
  ActivityFact,
  DemographicFact,
  FactSnapshot,
  SpatialDirectorySnapshot,
} from '../types';

/** Fact store over arrays held in memory. Used by tests and local tooling. */
export class InMemoryFactStore implements FactStore {
  private activity: ActivityFact[] = [];
  private demographics: DemographicFact[] = [];
  private directory: SpatialDirectorySnapshot = { finest: [], intermediate: [], coarsest: [] };

  constructor(init: Partial<FactSnapshot & { directory: SpatialDirectorySnapshot }> = {}) {
    if (init.activity) this.activity = [...init.activity];
    if (init.demographics) this.demographics = [...init.demographics];
    if (init.directory) this.directory = init.directory;
  }

  addActivity(...facts: ActivityFact[]): void {
    this.activity.push(...facts);
  }

  addDemographics(...facts: DemographicFact[]): void {
    this.demographics.push(...facts);
  }

  setDirectory(directory: SpatialDirectorySnapshot): void {
    this.directory = directory;
  }

  async loadDirectory({ signal }: { signal?: AbortSignal } = {}): Promise<SpatialDirectorySnapshot> {
    signal?.throwIfAborted();
    return {
      finest: [...this.directory.finest],
      intermediate: [...this.directory.intermediate],
      coarsest: [...this.directory.coarsest],
    };
  }

  async loadFacts({ granularity, signal }: LoadFactsOptions): Promise<FactSnapshot> {
    signal?.throwIfAborted();
    return {
      activity: this.activity.filter((f) => f.granularity === granularity),
      demographics: this.demographics.filter((f) => f.granularity === granularity),
    };
  }
}
