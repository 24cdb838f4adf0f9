export { computeDominance, dominanceKey } from './dominance';
export type { LabeledDemographic, Dominance } from './dominance';
