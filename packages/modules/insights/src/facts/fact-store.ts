import type { FactSnapshot, SpatialDirectorySnapshot } from '../types';

export interface LoadFactsOptions {
  granularity: string;
  signal?: AbortSignal;
}

/**
 * Read-only access to the normalized facts and spatial directories the
 * ingestion pipeline maintains. The engine never writes through it.
 */
export interface FactStore {
  loadDirectory(options?: { signal?: AbortSignal }): Promise<SpatialDirectorySnapshot>;
  loadFacts(options: LoadFactsOptions): Promise<FactSnapshot>;
}
