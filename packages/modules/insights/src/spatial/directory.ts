import type {
  CoarsestDirectoryEntry,
  FinestDirectoryEntry,
  IntermediateDirectoryEntry,
  SpatialDirectorySnapshot,
} from '../types';

function indexFirst<T>(entries: T[], keyOf: (entry: T) => string | null): Map<string, T> {
  const index = new Map<string, T>();
  for (const entry of entries) {
    const key = keyOf(entry);
    if (key !== null && !index.has(key)) index.set(key, entry);
  }
  return index;
}

/**
 * Lookup indexes over the three administrative directories.
 *
 * When several entries share a name or label the one with the smallest
 * key wins, so lookups do not depend on the order rows were loaded in.
 */
export class SpatialDirectory {
  private readonly finest: Map<string, FinestDirectoryEntry>;
  private readonly finestLabels: Map<string, FinestDirectoryEntry>;
  private readonly intermediateCodes: Map<string, IntermediateDirectoryEntry>;
  private readonly intermediateNames: Map<string, IntermediateDirectoryEntry>;
  private readonly coarsestCodes: Map<string, CoarsestDirectoryEntry>;
  private readonly coarsestNames: Map<string, CoarsestDirectoryEntry>;

  constructor(snapshot: SpatialDirectorySnapshot) {
    const finest = [...snapshot.finest].sort((a, b) => compareKeys(a.spatialKey, b.spatialKey));
    const intermediate = [...snapshot.intermediate].sort((a, b) => compareKeys(a.code, b.code));
    const coarsest = [...snapshot.coarsest].sort((a, b) => compareKeys(a.code, b.code));

    this.finest = indexFirst(finest, (e) => e.spatialKey);
    this.finestLabels = indexFirst(finest, (e) => e.spatialLabel);
    this.intermediateCodes = indexFirst(intermediate, (e) => e.code);
    this.intermediateNames = indexFirst(intermediate, (e) => e.name);
    this.coarsestCodes = indexFirst(coarsest, (e) => e.code);
    this.coarsestNames = indexFirst(coarsest, (e) => e.name);
  }

  static empty(): SpatialDirectory {
    return new SpatialDirectory({ finest: [], intermediate: [], coarsest: [] });
  }

  finestByKey(spatialKey: string): FinestDirectoryEntry | undefined {
    return this.finest.get(spatialKey);
  }

  finestByLabel(label: string): FinestDirectoryEntry | undefined {
    return this.finestLabels.get(label);
  }

  intermediateByCode(code: string): IntermediateDirectoryEntry | undefined {
    return this.intermediateCodes.get(code);
  }

  intermediateByName(name: string): IntermediateDirectoryEntry | undefined {
    return this.intermediateNames.get(name);
  }

  coarsestByCode(code: string): CoarsestDirectoryEntry | undefined {
    return this.coarsestCodes.get(code);
  }

  coarsestByName(name: string): CoarsestDirectoryEntry | undefined {
    return this.coarsestNames.get(name);
  }
}

export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
