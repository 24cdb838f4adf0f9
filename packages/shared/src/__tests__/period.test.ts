import { describe, it, expect } from 'vitest';
import { parsePeriod, toDateRange, isWithinRange, daysInMonth } from '../utils/period';

describe('period utilities', () => {
  describe('parsePeriod', () => {
    it('parses a bare year to the whole calendar year', () => {
      expect(parsePeriod('2024')).toEqual({ precision: 'year', start: '2024-01-01', end: '2024-12-31' });
    });

    it('parses a year-month to the whole month', () => {
      expect(parsePeriod('2024-02')).toEqual({ precision: 'month', start: '2024-02-01', end: '2024-02-29' });
      expect(parsePeriod('2023-02')).toEqual({ precision: 'month', start: '2023-02-01', end: '2023-02-28' });
    });

    it('parses a full date to a single day', () => {
      expect(parsePeriod(' 2024-12-31 ')).toEqual({ precision: 'day', start: '2024-12-31', end: '2024-12-31' });
    });

    it('rejects malformed or impossible periods', () => {
      expect(parsePeriod('24')).toBeNull();
      expect(parsePeriod('2024-13')).toBeNull();
      expect(parsePeriod('2024-02-30')).toBeNull();
      expect(parsePeriod('2024/01')).toBeNull();
      expect(parsePeriod('')).toBeNull();
    });
  });

  describe('toDateRange', () => {
    it('takes the start of `from` and the end of `to`', () => {
      expect(toDateRange('2023', '2024-06')).toEqual({ from: '2023-01-01', to: '2024-06-30' });
    });

    it('leaves open ends as null', () => {
      expect(toDateRange('2024-03', null)).toEqual({ from: '2024-03-01', to: null });
      expect(toDateRange(undefined, undefined)).toEqual({ from: null, to: null });
    });

    it('swaps a reversed range', () => {
      expect(toDateRange('2024-12', '2024-01')).toEqual({ from: '2024-01-01', to: '2024-12-31' });
    });

    it('returns null when either bound is malformed', () => {
      expect(toDateRange('2024-99', '2024')).toBeNull();
    });
  });

  describe('isWithinRange', () => {
    it('is inclusive on both ends', () => {
      const range = { from: '2024-01-01', to: '2024-01-31' };
      expect(isWithinRange('2024-01-01', range)).toBe(true);
      expect(isWithinRange('2024-01-31', range)).toBe(true);
      expect(isWithinRange('2024-02-01', range)).toBe(false);
    });
  });

  it('daysInMonth handles leap years', () => {
    expect(daysInMonth(2000, 2)).toBe(29);
    expect(daysInMonth(1900, 2)).toBe(28);
  });
});
