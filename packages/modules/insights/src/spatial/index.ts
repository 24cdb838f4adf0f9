export { SpatialDirectory, compareKeys } from './directory';
export { SpatialResolver, DEFAULT_RESOLUTION_RULES } from './resolver';
export { DEFAULT_STRATEGIES } from './strategies';
export type { ResolverStrategy, ResolutionInput, ResolutionRules } from './strategies';
