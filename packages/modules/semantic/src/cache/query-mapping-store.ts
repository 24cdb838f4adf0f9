import { nowUTC } from '@geoinsight/shared';
import type { StructuredQuery } from '../structured-query';

export interface QueryMappingEntry {
  requestHash: string;
  /** Normalized request text. */
  requestText: string;
  parserId: string;
  schemaVersion: string;
  query: StructuredQuery;
  /** Entry whose translation this one reuses; null for translated entries. */
  aliasOf: string | null;
  createdAt: string;
  updatedAt: string;
}

export type NewQueryMappingEntry = Omit<QueryMappingEntry, 'createdAt' | 'updatedAt'>;

/**
 * Content-addressed request → structured query mappings.
 *
 * `put` is idempotent on `requestHash`: the first stored query is kept and
 * a repeat write only refreshes `updatedAt`. The stored entry is returned.
 */
export interface QueryMappingStore {
  get(requestHash: string): Promise<QueryMappingEntry | null>;
  put(entry: NewQueryMappingEntry): Promise<QueryMappingEntry>;
}

export class InMemoryQueryMappingStore implements QueryMappingStore {
  private entries = new Map<string, QueryMappingEntry>();

  async get(requestHash: string): Promise<QueryMappingEntry | null> {
    return this.entries.get(requestHash) ?? null;
  }

  async put(entry: NewQueryMappingEntry): Promise<QueryMappingEntry> {
    const now = nowUTC();
    const existing = this.entries.get(entry.requestHash);
    const stored: QueryMappingEntry = existing
      ? { ...existing, updatedAt: now }
      : { ...entry, createdAt: now, updatedAt: now };
    this.entries.set(entry.requestHash, stored);
    return stored;
  }

  get size(): number {
    return this.entries.size;
  }
}
