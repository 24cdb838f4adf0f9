/**
 * Period parsing. Dates are handled as `YYYY-MM-DD` strings throughout the
 * engine: they sort lexicographically in calendar order and serialize
 * without timezone drift.
 */

export type PeriodPrecision = 'year' | 'month' | 'day';

export interface ParsedPeriod {
  precision: PeriodPrecision;
  /** First day covered by the period. */
  start: string;
  /** Last day covered by the period. */
  end: string;
}

export interface DateRange {
  from: string | null;
  to: string | null;
}

const YEAR_RE = /^(\d{4})$/;
const MONTH_RE = /^(\d{4})-(\d{2})$/;
const DAY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function formatDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/** Returns null for anything that is not a valid year, year-month or calendar date. */
export function parsePeriod(raw: string): ParsedPeriod | null {
  const value = raw.trim();

  const year = YEAR_RE.exec(value);
  if (year) {
    const y = Number(year[1]);
    return { precision: 'year', start: formatDate(y, 1, 1), end: formatDate(y, 12, 31) };
  }

  const month = MONTH_RE.exec(value);
  if (month) {
    const y = Number(month[1]);
    const m = Number(month[2]);
    if (m < 1 || m > 12) return null;
    return {
      precision: 'month',
      start: formatDate(y, m, 1),
      end: formatDate(y, m, daysInMonth(y, m)),
    };
  }

  const day = DAY_RE.exec(value);
  if (day) {
    const y = Number(day[1]);
    const m = Number(day[2]);
    const d = Number(day[3]);
    if (m < 1 || m > 12 || d < 1 || d > daysInMonth(y, m)) return null;
    const date = formatDate(y, m, d);
    return { precision: 'day', start: date, end: date };
  }

  return null;
}

/**
 * Normalizes an optional from/to pair to an inclusive date range.
 * `from` takes the start of its period and `to` the end of its period;
 * a reversed pair is swapped.
 */
export function toDateRange(from?: string | null, to?: string | null): DateRange | null {
  const start = from ? parsePeriod(from) : null;
  const end = to ? parsePeriod(to) : null;
  if ((from && !start) || (to && !end)) return null;

  let rangeFrom = start?.start ?? null;
  let rangeTo = end?.end ?? null;
  if (rangeFrom && rangeTo && rangeFrom > rangeTo) {
    // Swapped inputs: keep the widest reading of both periods.
    rangeFrom = end?.start ?? null;
    rangeTo = start?.end ?? null;
  }
  return { from: rangeFrom, to: rangeTo };
}

export function isWithinRange(date: string, range: DateRange): boolean {
  if (range.from && date < range.from) return false;
  if (range.to && date > range.to) return false;
  return true;
}
