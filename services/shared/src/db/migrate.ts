import { promises as fs } from 'fs';
import { join } from 'path';
import { closePool, withConnection, withTransaction } from './client';
import { logger } from '../utils/logger';

export const MIGRATIONS_DIR = join(__dirname, 'migrations');

/**
 * Applies every `.sql` file in `migrationsDir` not yet recorded in
 * schema_migrations, in file name order. Each file runs in its own
 * transaction together with its bookkeeping row.
 */
export async function runMigrations(migrationsDir: string = MIGRATIONS_DIR): Promise<string[]> {
     const files = await fs.readdir(migrationsDir);
     const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();

     const applied = await withConnection(async (client) => {
          await client.query(`
        CREATE TABLE IF NOT EXISTS schema_migrations (
          name TEXT PRIMARY KEY,
          applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
      `);
          const { rows } = await client.query<{ name: string }>('SELECT name FROM schema_migrations');
          return new Set(rows.map((row) => row.name));
     });

     const pending = sqlFiles.filter((file) => !applied.has(file));
     logger.info({ total: sqlFiles.length, pending: pending.length }, 'Running database migrations');

     for (const file of pending) {
          const sql = await fs.readFile(join(migrationsDir, file), 'utf-8');

          logger.info({ file }, 'Executing migration');
          await withTransaction(async (client) => {
               await client.query(sql);
               await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
          });
          logger.info({ file }, 'Migration completed');
     }

     logger.info('All migrations completed successfully');
     return pending;
}

async function main(): Promise<void> {
     try {
          await runMigrations();
     } finally {
          await closePool();
     }
}

// Run if executed directly
if (require.main === module) {
     main().catch((err: unknown) => {
          logger.fatal({ err }, 'Migration failed');
          process.exit(1);
     });
}
