import { describe, it, expect } from 'vitest';
import { computeWindowedMetrics } from '../metrics/windowed-metrics';
import type { AggregatedRow } from '../metrics/windowed-metrics';
import { month } from './fixtures';

function row(spatialLabel: string, date: string, footTraffic: number | null): AggregatedRow {
  return { spatialLabel, date, values: { foot_traffic: footTraffic, sales: null, sales_count: null } };
}

describe('computeWindowedMetrics', () => {
  const rows = [
    row('B', month(2024, 1), 30),
    row('A', month(2024, 4), 40),
    row('A', month(2024, 1), 10),
    row('A', month(2024, 3), null),
    row('A', month(2024, 2), 20),
  ];
  const result = computeWindowedMetrics(rows);
  const at = (label: string, date: string) => {
    const found = result.find((r) => r.spatialLabel === label && r.date === date);
    if (!found) throw new Error(`no row ${label} ${date}`);
    return found.metrics.foot_traffic;
  };

  it('orders rows by label then date', () => {
    expect(result.map((r) => `${r.spatialLabel} ${r.date}`)).toEqual([
      'A 2024-01-01',
      'A 2024-02-01',
      'A 2024-03-01',
      'A 2024-04-01',
      'B 2024-01-01',
    ]);
  });

  it('computes month-over-month change from the previous row', () => {
    expect(at('A', month(2024, 1))).toMatchObject({ prior: null, momPct: null });
    expect(at('A', month(2024, 2))).toMatchObject({ value: 20, prior: 10, momPct: 1 });
  });

  it('lags by observed rows, so an absent value blocks the next change', () => {
    expect(at('A', month(2024, 3))).toMatchObject({ value: null, prior: 20, momPct: null, zScore: null });
    expect(at('A', month(2024, 4))).toMatchObject({ value: 40, prior: null, momPct: null });
  });

  it('takes mean and std-dev over the whole series', () => {
    const window = at('A', month(2024, 4));
    expect(window.seriesMean).toBeCloseTo(70 / 3, 10);
    expect(window.seriesStdDev).toBeCloseTo(Math.sqrt(700 / 3), 10);
    expect(window.zScore).toBeCloseTo((40 - 70 / 3) / Math.sqrt(700 / 3), 10);
  });

  it('leaves std-dev and z-score empty for a single observation', () => {
    expect(at('B', month(2024, 1))).toMatchObject({ seriesMean: 30, seriesStdDev: null, zScore: null });
  });

  it('ranks and averages across units on the same date', () => {
    expect(at('A', month(2024, 1))).toMatchObject({ crossSectionalMean: 20, rank: 2 });
    expect(at('B', month(2024, 1))).toMatchObject({ crossSectionalMean: 20, rank: 1 });
    expect(at('A', month(2024, 3))).toMatchObject({ crossSectionalMean: null, rank: 1 });
  });

  it('compares with the row twelve observations back for year-over-year', () => {
    const series = Array.from({ length: 13 }, (_, i) =>
      row('C', i < 12 ? month(2023, i + 1) : month(2024, 1), i === 12 ? 150 : 100),
    );
    const last = computeWindowedMetrics(series).at(-1);
    expect(last?.metrics.foot_traffic).toMatchObject({ priorYear: 100, yoyPct: 0.5, prior: 100, momPct: 0.5 });
  });

  it('computes each metric independently', () => {
    const [only] = computeWindowedMetrics([
      { spatialLabel: 'D', date: month(2024, 1), values: { foot_traffic: 1, sales: 2, sales_count: null } },
    ]);
    expect(only?.metrics.foot_traffic.value).toBe(1);
    expect(only?.metrics.sales.value).toBe(2);
    expect(only?.metrics.sales_count.value).toBeNull();
  });
});
