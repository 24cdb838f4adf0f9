import { drizzle } from 'drizzle-orm/postgres-js';
import { sql } from 'drizzle-orm';
import postgres from 'postgres';
import * as schema from './schema';

type DrizzleDB = ReturnType<typeof drizzle<typeof schema>>;

// Persist the pool on globalThis so hot reloads and repeated imports in the
// same process share one set of connections.
const globalForDb = globalThis as unknown as {
  __geoinsight_db?: DrizzleDB;
  __geoinsight_client?: postgres.Sql;
};

function getDb(): DrizzleDB {
  if (!globalForDb.__geoinsight_db) {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) {
      throw new Error('DATABASE_URL environment variable is required');
    }
    // Insight reads are a handful of wide scans per request; a small pool
    // allows Promise.all within a request without starving other processes.
    const client = postgres(connectionString, {
      max: parseInt(process.env.DB_POOL_MAX || '2', 10),
      prepare: process.env.DB_PREPARE_STATEMENTS === 'true',
      idle_timeout: 20,
      max_lifetime: 300,
      connect_timeout: 10,
      onnotice: (notice) => {
        console.warn(`[pg-notice] ${notice.severity}: ${notice.message}`);
      },
    });
    globalForDb.__geoinsight_client = client;
    globalForDb.__geoinsight_db = drizzle(client, { schema });
  }
  return globalForDb.__geoinsight_db;
}

/**
 * Lazily connected database handle. Importing this module never opens a
 * connection; the first property access does.
 */
export const db: DrizzleDB = new Proxy({} as DrizzleDB, {
  get(_target, prop, receiver) {
    const instance = getDb();
    const value = Reflect.get(instance, prop, receiver);
    if (typeof value === 'function') {
      return value.bind(instance);
    }
    return value;
  },
});

export type Database = DrizzleDB;

/** Close the shared pool (process shutdown, scripts). */
export async function closeDb(): Promise<void> {
  const client = globalForDb.__geoinsight_client;
  globalForDb.__geoinsight_client = undefined;
  globalForDb.__geoinsight_db = undefined;
  if (client) {
    await client.end({ timeout: 5 });
  }
}

export { sql, schema };
