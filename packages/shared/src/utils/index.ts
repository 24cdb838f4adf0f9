export { generateUlid, isValidUlid, ulidTimestamp } from './ulid';
export { nowUTC } from './date';
export { parsePeriod, toDateRange, isWithinRange, daysInMonth, formatDate } from './period';
export type { ParsedPeriod, PeriodPrecision, DateRange } from './period';
