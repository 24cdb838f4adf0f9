export type { FactStore, LoadFactsOptions } from './fact-store';
export { InMemoryFactStore } from './in-memory-fact-store';
export { DrizzleFactStore } from './drizzle-fact-store';
