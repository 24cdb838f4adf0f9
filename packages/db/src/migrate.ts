import dotenv from 'dotenv';

dotenv.config({ path: '../../.env.local' });
dotenv.config({ path: '../../.env' });

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import postgres from 'postgres';

const MIGRATIONS_DIR = fileURLToPath(new URL('../migrations', import.meta.url));

/**
 * Applies every `migrations/*.sql` file in name order. The files are
 * idempotent (`IF NOT EXISTS`), so re-running is safe.
 */
async function runMigrations() {
  const connectionString = process.env.DATABASE_URL_ADMIN || process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL_ADMIN or DATABASE_URL environment variable is required');
  }

  const masked = connectionString.replace(/:[^:@]+@/, ':***@');
  console.log(`Connecting to database: ${masked}`);
  const client = postgres(connectionString, { max: 1, prepare: false });

  try {
    const files = (await readdir(MIGRATIONS_DIR)).filter((f) => f.endsWith('.sql')).sort();
    for (const file of files) {
      console.log(`Applying ${file}...`);
      await client.file(join(MIGRATIONS_DIR, file));
    }
    console.log('Migrations complete.');
  } finally {
    await client.end();
  }
}

runMigrations().catch((err) => {
  console.error('Migration failed:', err);
  process.exit(1);
});
