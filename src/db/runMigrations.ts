/**
 * Programmatic migration runner used during server startup
 * Executes SQL files from ./migrations in name order and records them in schema_migrations
 */

import { readFileSync, readdirSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import pino from 'pino';
import type { Pool } from 'pg';

const logger = pino({
  name: 'migrations',
  level: process.env.LOG_LEVEL || 'info',
});

// Get the directory name for ES modules
const __dirname = dirname(fileURLToPath(import.meta.url));

export const MIGRATIONS_DIR = join(__dirname, 'migrations');

export interface MigrationResult {
  success: boolean;
  applied: string[];
  skipped: string[];
  error?: string;
}

async function ensureMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function isMigrationApplied(pool: Pool, version: string): Promise<boolean> {
  const result = await pool.query(
    'SELECT version FROM schema_migrations WHERE version = $1',
    [version]
  );
  return result.rowCount !== null && result.rowCount > 0;
}

/**
 * Migration files in order
 */
export function getMigrationFiles(dir: string = MIGRATIONS_DIR): string[] {
  try {
    return readdirSync(dir)
      .filter((f) => f.endsWith('.sql'))
      .sort();
  } catch {
    logger.warn({ dir }, 'No migrations directory found');
    return [];
  }
}

/**
 * Execute one migration file inside a transaction together with its bookkeeping row
 */
async function executeMigration(pool: Pool, dir: string, filename: string): Promise<boolean> {
  const version = filename.replace('.sql', '');

  if (await isMigrationApplied(pool, version)) {
    logger.debug({ version }, 'Migration already applied, skipping');
    return false;
  }

  logger.info({ version }, 'Running migration');
  const sql = readFileSync(join(dir, filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
    await client.query('COMMIT');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }

  logger.info({ version }, 'Migration completed');
  return true;
}

/**
 * Run all pending migrations. Safe to call multiple times.
 */
export async function runMigrationsOnStartup(pool: Pool, dir: string = MIGRATIONS_DIR): Promise<MigrationResult> {
  const applied: string[] = [];
  const skipped: string[] = [];

  try {
    await ensureMigrationsTable(pool);

    for (const migration of getMigrationFiles(dir)) {
      const version = migration.replace('.sql', '');
      if (await executeMigration(pool, dir, migration)) {
        applied.push(version);
      } else {
        skipped.push(version);
      }
    }

    if (applied.length > 0) {
      logger.info({ applied }, `Applied ${applied.length} migration(s)`);
    } else {
      logger.info('Database schema is up to date');
    }

    return { success: true, applied, skipped };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error({ err: error }, 'Migration failed');
    return { success: false, applied, skipped, error: errorMessage };
  }
}
