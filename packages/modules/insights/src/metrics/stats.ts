/**
 * Null-aware statistics. `null` stands for an absent value throughout:
 * inputs that are null are skipped, and a statistic that is undefined for
 * the input comes back as null rather than 0 or NaN.
 */

export function present(values: ReadonlyArray<number | null>): number[] {
  return values.filter((v): v is number => v !== null && Number.isFinite(v));
}

/** Sum of present values; null when none are present. */
export function sumNullable(values: ReadonlyArray<number | null>): number | null {
  const xs = present(values);
  if (xs.length === 0) return null;
  return xs.reduce((acc, x) => acc + x, 0);
}

export function mean(values: ReadonlyArray<number | null>): number | null {
  const xs = present(values);
  if (xs.length === 0) return null;
  return xs.reduce((acc, x) => acc + x, 0) / xs.length;
}

/** Sample standard deviation (n − 1); null below two observations. */
export function sampleStdDev(values: ReadonlyArray<number | null>): number | null {
  const xs = present(values);
  if (xs.length < 2) return null;
  const m = xs.reduce((acc, x) => acc + x, 0) / xs.length;
  const squares = xs.reduce((acc, x) => acc + (x - m) ** 2, 0);
  return Math.sqrt(squares / (xs.length - 1));
}

/** (current − prior) / prior; null when either is absent or prior is zero. */
export function percentDelta(current: number | null, prior: number | null): number | null {
  if (current === null || prior === null || prior === 0) return null;
  return (current - prior) / prior;
}

export function zScore(
  value: number | null,
  seriesMean: number | null,
  stdDev: number | null,
): number | null {
  if (value === null || seriesMean === null || stdDev === null || stdDev === 0) return null;
  return (value - seriesMean) / stdDev;
}

/**
 * Dense descending ranks. Equal values share a rank, the next distinct
 * value takes the next integer, and absent values all rank after the last
 * present one.
 */
export function denseRanks(values: ReadonlyArray<number | null>): number[] {
  const distinct = [...new Set(present(values))].sort((a, b) => b - a);
  const rankOf = new Map(distinct.map((v, i) => [v, i + 1]));
  const absentRank = distinct.length + 1;
  return values.map((v) => (v === null ? absentRank : (rankOf.get(v) ?? absentRank)));
}

export interface Pair {
  x: number;
  y: number;
}

/** Pearson correlation; null below two pairs or when either side is constant. */
export function pearson(pairs: ReadonlyArray<Pair>): number | null {
  if (pairs.length < 2) return null;
  const n = pairs.length;
  const mx = pairs.reduce((acc, p) => acc + p.x, 0) / n;
  const my = pairs.reduce((acc, p) => acc + p.y, 0) / n;
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (const { x, y } of pairs) {
    sxy += (x - mx) * (y - my);
    sxx += (x - mx) ** 2;
    syy += (y - my) ** 2;
  }
  if (sxx === 0 || syy === 0) return null;
  return sxy / Math.sqrt(sxx * syy);
}

/** Ordinary-least-squares slope of y on x; null below two pairs or constant x. */
export function olsSlope(pairs: ReadonlyArray<Pair>): number | null {
  if (pairs.length < 2) return null;
  const n = pairs.length;
  const mx = pairs.reduce((acc, p) => acc + p.x, 0) / n;
  const my = pairs.reduce((acc, p) => acc + p.y, 0) / n;
  let sxy = 0;
  let sxx = 0;
  for (const { x, y } of pairs) {
    sxy += (x - mx) * (y - my);
    sxx += (x - mx) ** 2;
  }
  if (sxx === 0) return null;
  return sxy / sxx;
}

/** Mean of |v| over present values. */
export function meanAbsolute(values: ReadonlyArray<number | null>): number | null {
  return mean(present(values).map(Math.abs));
}
