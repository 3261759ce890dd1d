/**
 * Applies the SQL files in migrations/ in name order.
 * Run with: npm run migrate
 */

import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { pool } from '../src/config/database';
import { logger } from '../src/utils/logger';

const MIGRATIONS_DIR = path.resolve(__dirname, '..', 'migrations');

async function migrate(): Promise<void> {
  const files = (await readdir(MIGRATIONS_DIR)).filter(file => file.endsWith('.sql')).sort();
  const client = await pool.connect();

  try {
    for (const file of files) {
      logger.info(`▶️  Applying ${file}`);
      const sql = await readFile(path.join(MIGRATIONS_DIR, file), 'utf8');
      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
    }
    logger.info(`✅ Applied ${files.length} migrations`);
  } finally {
    client.release();
    await pool.end();
  }
}

migrate().catch(error => {
  logger.error('❌ Migration failed:', error);
  process.exit(1);
});
