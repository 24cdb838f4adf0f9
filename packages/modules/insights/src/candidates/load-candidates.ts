import { MONTHLY_GRANULARITY } from '@geoinsight/shared';
import { SpatialDirectory } from '../spatial/directory';
import { SpatialResolver } from '../spatial/resolver';
import type { ResolutionRules } from '../spatial/strategies';
import type { FactStore } from '../facts/fact-store';
import { buildInsightCandidates } from './aggregator';
import type { CandidateCollection } from '../types';

export interface LoadCandidatesOptions {
  rules: ResolutionRules;
  signal?: AbortSignal;
}

/** Reads one fact snapshot and recomputes the candidate collection from it. */
export async function loadInsightCandidates(
  factStore: FactStore,
  { rules, signal }: LoadCandidatesOptions,
): Promise<CandidateCollection> {
  const [directory, facts] = await Promise.all([
    factStore.loadDirectory({ signal }),
    factStore.loadFacts({ granularity: MONTHLY_GRANULARITY, signal }),
  ]);
  const resolver = new SpatialResolver(new SpatialDirectory(directory), rules);
  return buildInsightCandidates(facts, resolver, MONTHLY_GRANULARITY);
}
