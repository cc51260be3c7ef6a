import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { loadDatabaseConfig } from '../config';
import { closePool, createPool } from '../db/client';
import { logger } from '../utils/logger';

// Compiled output has no copy of the SQL file, so also look in the sources
const SCHEMA_CANDIDATES = [
  join(__dirname, '../db/schema.sql'),
  join(__dirname, '../../src/db/schema.sql'),
];

/**
 * Database migration script
 * Runs the schema.sql file to set up the database
 */
async function migrate(): Promise<void> {
  const schemaPath = SCHEMA_CANDIDATES.find(candidate => existsSync(candidate));
  if (!schemaPath) {
    throw new Error(`schema.sql not found, looked in: ${SCHEMA_CANDIDATES.join(', ')}`);
  }

  const config = loadDatabaseConfig();
  const pool = createPool({ databaseUrl: config.databaseUrl, ssl: config.databaseSsl });

  try {
    logger.info('Starting database migration...', { schemaPath });
    await pool.query(readFileSync(schemaPath, 'utf-8'));
    logger.info('Database migration completed successfully');
  } finally {
    await closePool(pool);
  }
}

migrate().then(
  () => process.exit(0),
  (error: unknown) => {
    logger.error('Database migration failed', error);
    process.exit(1);
  }
);
