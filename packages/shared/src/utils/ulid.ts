import { monotonicFactory, decodeTime } from 'ulid';

const CROCKFORD_BASE32 = /^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{26}$/;

// Monotonic: ids minted within one millisecond still sort in creation order,
// so generation ids compare the same way their refresh times do.
const nextUlid = monotonicFactory();

export function generateUlid(seedTime?: number): string {
  return nextUlid(seedTime);
}

export function isValidUlid(value: string): boolean {
  return CROCKFORD_BASE32.test(value);
}

/** Milliseconds since epoch encoded in a ULID's time component. */
export function ulidTimestamp(id: string): number {
  return decodeTime(id);
}
