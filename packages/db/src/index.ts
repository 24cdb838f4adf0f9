export { db, closeDb, sql, schema } from './client';
export type { Database } from './client';
export {
  guardedQuery,
  singleFlight,
  isBreakerOpen,
  isPoolExhaustion,
  resetBreaker,
  getPoolGuardStats,
  PoolGuardError,
} from './pool-guard';
export type { GuardErrorCode, GuardOptions } from './pool-guard';
export * from './schema';
