/** Keys of the `distributed_locks` rows singleton jobs hold. */
export const LOCK_KEYS = {
  ADVANCED_INSIGHT_REFRESH: 'advanced-insight-refresh',
} as const;

export type LockKey = (typeof LOCK_KEYS)[keyof typeof LOCK_KEYS];
