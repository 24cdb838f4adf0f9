/**
 * Spatial levels, finest first. Each level nests inside the next
 * (e.g. neighborhood → district → province).
 */
export const SPATIAL_LEVELS = ['finest', 'intermediate', 'coarsest'] as const;

export type SpatialLevel = (typeof SPATIAL_LEVELS)[number];

export const DEFAULT_SPATIAL_LEVEL: SpatialLevel = 'intermediate';

/** Administrative names accepted at the boundary. */
export const LEVEL_ALIASES: Readonly<Record<string, SpatialLevel>> = {
  norm: 'finest',
  emd: 'finest',
  sig: 'intermediate',
  sido: 'coarsest',
};

/** Canonical level for a lowercase name or alias; only own keys count. */
export function levelForName(name: string): SpatialLevel | undefined {
  const canonical = SPATIAL_LEVELS.find((level) => level === name);
  if (canonical) return canonical;
  return Object.hasOwn(LEVEL_ALIASES, name) ? LEVEL_ALIASES[name] : undefined;
}

/** Temporal granularity of the facts the engine reads. */
export const MONTHLY_GRANULARITY = 'month';
