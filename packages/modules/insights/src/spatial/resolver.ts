import { SPATIAL_LEVELS } from '@geoinsight/shared';
import type { SpatialLevel } from '@geoinsight/shared';
import { SpatialDirectory } from './directory';
import { DEFAULT_STRATEGIES } from './strategies';
import type { ResolutionRules, ResolverStrategy, ResolutionInput } from './strategies';
import type { ResolvedSpatialUnit } from '../types';

const NUMERIC_CODE = /^\d+$/;

export const DEFAULT_RESOLUTION_RULES: ResolutionRules = {
  codePrefixLength: 5,
  coarsestPrefixLength: 2,
};

/**
 * Reconciles raw spatial keys against the administrative directories.
 *
 * Each level runs its own strategy chain, so a key may resolve at one
 * level and not at another. Never throws: an unresolvable key keeps its
 * raw value as its label.
 */
export class SpatialResolver {
  private readonly cache = new Map<string, ResolvedSpatialUnit>();

  constructor(
    private readonly directory: SpatialDirectory,
    private readonly rules: ResolutionRules = DEFAULT_RESOLUTION_RULES,
    private readonly strategies: Readonly<
      Record<SpatialLevel, readonly ResolverStrategy[]>
    > = DEFAULT_STRATEGIES,
  ) {}

  resolve(rawKey: string): ResolvedSpatialUnit {
    const cached = this.cache.get(rawKey);
    if (cached) return cached;

    const entry = this.directory.finestByKey(rawKey) ?? this.directory.finestByLabel(rawKey);
    const code = entry?.code ?? (NUMERIC_CODE.test(rawKey) ? rawKey : null);
    const input: ResolutionInput = { rawKey, entry, code, directory: this.directory };

    const unit: ResolvedSpatialUnit = {
      rawKey,
      code,
      finest: this.runChain('finest', input),
      intermediate: this.runChain('intermediate', input),
      coarsest: this.runChain('coarsest', input),
    };
    this.cache.set(rawKey, unit);
    return unit;
  }

  /**
   * Label used to group facts at `level`: the level's own label, then the
   * finest label, then the raw key.
   */
  labelAt(rawKey: string, level: SpatialLevel): string {
    const unit = this.resolve(rawKey);
    return unit[level] ?? unit.finest ?? unit.rawKey;
  }

  labels(rawKey: string): Record<SpatialLevel, string> {
    const labels: Record<SpatialLevel, string> = { finest: '', intermediate: '', coarsest: '' };
    for (const level of SPATIAL_LEVELS) labels[level] = this.labelAt(rawKey, level);
    return labels;
  }

  private runChain(level: SpatialLevel, input: ResolutionInput): string | null {
    for (const strategy of this.strategies[level]) {
      const label = strategy.resolve(input, this.rules);
      if (label) return label;
    }
    return null;
  }
}
