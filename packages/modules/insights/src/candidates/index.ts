export { buildInsightCandidates, compareCandidates } from './aggregator';
export {
  assertUniqueFactKeys,
  findSourceOverlaps,
  describeOverlap,
  reportSourceOverlaps,
} from './source-overlap';
export type { SourceOverlap } from './source-overlap';
export { loadInsightCandidates } from './load-candidates';
export type { LoadCandidatesOptions } from './load-candidates';
