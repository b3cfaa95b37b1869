import type { Pool } from 'pg';
import { logger } from '../config/logger.js';
import { withTransaction } from '../config/database.js';

export interface Migration {
  id: string;
  description: string;
  up: string;
  down: string;
}

// Migration table creation
const createMigrationsTable = `
  CREATE TABLE IF NOT EXISTS migrations (
    id VARCHAR(255) PRIMARY KEY,
    description VARCHAR(500),
    executed_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
  );
`;

export const migrations: Migration[] = [
  {
    id: '001_create_vocabulary_table',
    description: 'Create vocabulary catalog',
    up: `
      CREATE TABLE IF NOT EXISTS vocabulary (
        id SERIAL PRIMARY KEY,
        word VARCHAR(255) UNIQUE NOT NULL,
        translation VARCHAR(255) NOT NULL,
        difficulty_level VARCHAR(10) NOT NULL DEFAULT 'A1',
        category VARCHAR(100),
        example_sentence TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_vocabulary_difficulty ON vocabulary(difficulty_level);
    `,
    down: 'DROP TABLE IF EXISTS vocabulary CASCADE;'
  },
  {
    id: '002_create_review_progress_table',
    description: 'Create SM-2 review progress per user and word',
    up: `
      CREATE TABLE IF NOT EXISTS review_progress (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL,
        item_id INTEGER NOT NULL REFERENCES vocabulary(id) ON DELETE CASCADE,
        repetitions INTEGER NOT NULL DEFAULT 0 CHECK (repetitions >= 0),
        easiness_factor DOUBLE PRECISION NOT NULL DEFAULT 2.5,
        interval_days INTEGER NOT NULL DEFAULT 0 CHECK (interval_days >= 0),
        next_review_time TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        last_quality INTEGER NOT NULL DEFAULT 0 CHECK (last_quality BETWEEN 0 AND 5),
        last_reviewed TIMESTAMPTZ,
        times_reviewed INTEGER NOT NULL DEFAULT 0,
        times_correct INTEGER NOT NULL DEFAULT 0,
        times_wrong INTEGER NOT NULL DEFAULT 0,
        srs_stage INTEGER NOT NULL DEFAULT 0 CHECK (srs_stage BETWEEN 0 AND 5),
        UNIQUE(user_id, item_id)
      );

      CREATE INDEX IF NOT EXISTS idx_review_progress_due ON review_progress(user_id, next_review_time);
    `,
    down: 'DROP TABLE IF EXISTS review_progress CASCADE;'
  },
  {
    id: '003_create_exposure_stats_table',
    description: 'Create flashcard exposure statistics per user and word',
    up: `
      CREATE TABLE IF NOT EXISTS exposure_stats (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL,
        item_id INTEGER NOT NULL REFERENCES vocabulary(id) ON DELETE CASCADE,
        know_count INTEGER NOT NULL DEFAULT 0 CHECK (know_count >= 0),
        dont_know_count INTEGER NOT NULL DEFAULT 0 CHECK (dont_know_count >= 0),
        last_shown TIMESTAMPTZ,
        priority_score DOUBLE PRECISION NOT NULL DEFAULT 100.0,
        created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
        UNIQUE(user_id, item_id)
      );

      CREATE INDEX IF NOT EXISTS idx_exposure_stats_user ON exposure_stats(user_id);
    `,
    down: 'DROP TABLE IF EXISTS exposure_stats CASCADE;'
  }
];

// Check if migration has been executed
export const isMigrationExecuted = async (pool: Pool, migrationId: string): Promise<boolean> => {
  const result = await pool.query('SELECT id FROM migrations WHERE id = $1', [migrationId]);
  return result.rows.length > 0;
};

// Execute a single migration
export const executeMigration = async (pool: Pool, migration: Migration): Promise<boolean> => {
  try {
    await withTransaction(pool, async (client) => {
      await client.query(migration.up);
      await client.query(
        'INSERT INTO migrations (id, description) VALUES ($1, $2)',
        [migration.id, migration.description]
      );
    });
    logger.info(`Migration executed successfully: ${migration.id}`);
    return true;
  } catch (error) {
    logger.error(`Migration failed: ${migration.id}`, error);
    return false;
  }
};

// Run all pending migrations, stopping at the first failure
export const runMigrations = async (pool: Pool, pending: Migration[] = migrations): Promise<boolean> => {
  await pool.query(createMigrationsTable);
  logger.info('Migrations table ready');

  for (const migration of pending) {
    if (await isMigrationExecuted(pool, migration.id)) {
      logger.debug(`Migration already executed: ${migration.id}`);
      continue;
    }

    logger.info(`Running migration: ${migration.id}`);
    if (!(await executeMigration(pool, migration))) {
      return false;
    }
  }

  logger.info('All migrations completed successfully');
  return true;
};

// Rollback a specific migration
export const rollbackMigration = async (pool: Pool, migration: Migration): Promise<boolean> => {
  try {
    await withTransaction(pool, async (client) => {
      await client.query(migration.down);
      await client.query('DELETE FROM migrations WHERE id = $1', [migration.id]);
    });
    logger.info(`Migration rolled back successfully: ${migration.id}`);
    return true;
  } catch (error) {
    logger.error(`Migration rollback failed: ${migration.id}`, error);
    return false;
  }
};

export default { runMigrations, isMigrationExecuted, executeMigration, rollbackMigration };
