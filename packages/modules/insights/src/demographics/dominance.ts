import { compareKeys } from '../spatial/directory';
import { sumNullable } from '../metrics/stats';

export interface LabeledDemographic {
  spatialLabel: string;
  date: string;
  sex: string;
  ageGroup: string;
  value: number | null;
}

export interface Dominance {
  /** `${sex}_${ageGroup}` */
  group: string;
  value: number;
  /** Group value over the (label, date) total; null when the total is 0. */
  share: number | null;
}

export function dominanceKey(spatialLabel: string, date: string): string {
  return `${spatialLabel}\u0000${date}`;
}

/**
 * Largest demographic segment per (label, date).
 *
 * Facts are summed per `${sex}_${ageGroup}` group first; groups with no
 * present value are left out. Equal values go to the lexicographically
 * smallest group key.
 */
export function computeDominance(facts: readonly LabeledDemographic[]): Map<string, Dominance> {
  const cells = new Map<string, Map<string, Array<number | null>>>();
  for (const fact of facts) {
    const cellKey = dominanceKey(fact.spatialLabel, fact.date);
    const groups = cells.get(cellKey) ?? new Map<string, Array<number | null>>();
    const group = `${fact.sex}_${fact.ageGroup}`;
    const values = groups.get(group) ?? [];
    values.push(fact.value);
    groups.set(group, values);
    cells.set(cellKey, groups);
  }

  const result = new Map<string, Dominance>();
  for (const [cellKey, groups] of cells) {
    let total = 0;
    let best: { group: string; value: number } | null = null;
    for (const [group, values] of groups) {
      const value = sumNullable(values);
      if (value === null) continue;
      total += value;
      if (
        best === null ||
        value > best.value ||
        (value === best.value && compareKeys(group, best.group) < 0)
      ) {
        best = { group, value };
      }
    }
    if (best) {
      result.set(cellKey, { ...best, share: total === 0 ? null : best.value / total });
    }
  }
  return result;
}
