export {
  present,
  sumNullable,
  mean,
  sampleStdDev,
  percentDelta,
  zScore,
  denseRanks,
  pearson,
  olsSlope,
  meanAbsolute,
} from './stats';
export type { Pair } from './stats';
export { computeWindowedMetrics, PRIOR_LAG, PRIOR_YEAR_LAG } from './windowed-metrics';
export type { AggregatedRow, WindowedRow } from './windowed-metrics';
