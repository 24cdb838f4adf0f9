import { InternalError } from '@geoinsight/shared';
import { logger } from '@geoinsight/core';
import { compareKeys } from '../spatial/directory';
import type { ActivityFact, DemographicFact } from '../types';

export interface SourceOverlap {
  spatialKey: string;
  date: string;
  granularity: string;
  sources: string[];
}

/**
 * Two facts under one primary key mean the ingestion side admitted the same
 * record twice. Summing them would double-count, so the request fails.
 */
export function assertUniqueFactKeys(
  activity: readonly ActivityFact[],
  demographics: readonly DemographicFact[],
): void {
  const seen = new Set<string>();
  for (const f of activity) {
    const key = ['activity', f.spatialKey, f.date, f.granularity, f.source].join('\u0000');
    if (seen.has(key)) {
      throw new InternalError(
        `duplicate activity fact for ${f.spatialKey} on ${f.date} (${f.granularity}, ${f.source})`,
      );
    }
    seen.add(key);
  }
  for (const f of demographics) {
    const key = ['demographic', f.spatialKey, f.date, f.granularity, f.source, f.sex, f.ageGroup].join('\u0000');
    if (seen.has(key)) {
      throw new InternalError(
        `duplicate demographic fact for ${f.spatialKey} on ${f.date} ` +
          `(${f.granularity}, ${f.source}, ${f.sex}_${f.ageGroup})`,
      );
    }
    seen.add(key);
  }
}

/**
 * Keys fed by more than one source. Their values are still summed; the
 * overlap is reported so a double-counting feed can be spotted.
 */
export function findSourceOverlaps(activity: readonly ActivityFact[]): SourceOverlap[] {
  const byKey = new Map<string, SourceOverlap>();
  for (const f of activity) {
    const key = [f.spatialKey, f.date, f.granularity].join('\u0000');
    const entry = byKey.get(key) ?? {
      spatialKey: f.spatialKey,
      date: f.date,
      granularity: f.granularity,
      sources: [],
    };
    if (!entry.sources.includes(f.source)) entry.sources.push(f.source);
    byKey.set(key, entry);
  }

  return [...byKey.values()]
    .filter((o) => o.sources.length > 1)
    .map((o) => ({ ...o, sources: [...o.sources].sort(compareKeys) }))
    .sort((a, b) => compareKeys(a.spatialKey, b.spatialKey) || compareKeys(a.date, b.date));
}

export function describeOverlap(overlap: SourceOverlap): string {
  return `source overlap: ${overlap.spatialKey} ${overlap.date} summed from ${overlap.sources.join(', ')}`;
}

export function reportSourceOverlaps(overlaps: readonly SourceOverlap[]): string[] {
  const warnings = overlaps.map(describeOverlap);
  if (overlaps.length > 0) {
    logger.warn('Facts from several sources share a key; values were summed', {
      operation: 'insights.source-overlap',
      overlapCount: overlaps.length,
      overlaps: overlaps.slice(0, 20),
    });
  }
  return warnings;
}
