import type { SpatialLevel } from '@geoinsight/shared';
import type { SpatialDirectory } from './directory';
import type { FinestDirectoryEntry } from '../types';

export interface ResolutionInput {
  rawKey: string;
  /** Finest directory entry keyed by the raw key, or else labelled with it. */
  entry: FinestDirectoryEntry | undefined;
  /** Administrative code: the entry's code, or the raw key when it is numeric. */
  code: string | null;
  directory: SpatialDirectory;
}

export interface ResolutionRules {
  /** Leading digits of a finest code that identify its intermediate unit. */
  codePrefixLength: number;
  /** Leading digits that identify the coarsest unit. */
  coarsestPrefixLength: number;
}

/** One rule in a level's chain. Returns a label or null to fall through. */
export interface ResolverStrategy {
  name: string;
  resolve(input: ResolutionInput, rules: ResolutionRules): string | null;
}

function prefix(code: string | null, length: number): string | null {
  if (!code || code.length < length) return null;
  return code.slice(0, length);
}

// ── Finest ───────────────────────────────────────────────────────

const exactKey: ResolverStrategy = {
  name: 'exact-key',
  resolve: ({ rawKey, directory }) => directory.finestByKey(rawKey)?.spatialLabel ?? null,
};

const finestLabel: ResolverStrategy = {
  name: 'finest-label',
  resolve: ({ rawKey, directory }) => directory.finestByLabel(rawKey)?.spatialLabel ?? null,
};

// ── Intermediate ─────────────────────────────────────────────────

const intermediateCodePrefix: ResolverStrategy = {
  name: 'intermediate-code-prefix',
  resolve: ({ code, directory }, { codePrefixLength }) => {
    const key = prefix(code, codePrefixLength);
    return key ? (directory.intermediateByCode(key)?.name ?? null) : null;
  },
};

const intermediateName: ResolverStrategy = {
  name: 'intermediate-name',
  resolve: ({ rawKey, entry, directory }) =>
    directory.intermediateByName(entry?.spatialLabel ?? rawKey)?.name ?? null,
};

// ── Coarsest ─────────────────────────────────────────────────────

const coarsestCodePrefix: ResolverStrategy = {
  name: 'coarsest-code-prefix',
  resolve: ({ code, directory }, { codePrefixLength, coarsestPrefixLength }) => {
    const parentKey = prefix(code, codePrefixLength);
    const parent = parentKey ? directory.intermediateByCode(parentKey) : undefined;
    if (parent?.parentName) return parent.parentName;
    const key = prefix(code, coarsestPrefixLength);
    return key ? (directory.coarsestByCode(key)?.name ?? null) : null;
  },
};

const coarsestName: ResolverStrategy = {
  name: 'coarsest-name',
  resolve: ({ rawKey, entry, directory }) => {
    const label = entry?.spatialLabel ?? rawKey;
    const parent = directory.intermediateByName(label);
    if (parent?.parentName) return parent.parentName;
    return directory.coarsestByName(label)?.name ?? null;
  },
};

/** Rule chains per level, tried in order; the first label found wins. */
export const DEFAULT_STRATEGIES: Readonly<Record<SpatialLevel, readonly ResolverStrategy[]>> = {
  finest: [exactKey, finestLabel],
  intermediate: [intermediateCodePrefix, intermediateName],
  coarsest: [coarsestCodePrefix, coarsestName],
};
