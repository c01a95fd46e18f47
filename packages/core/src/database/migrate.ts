/**
 * Applies the SQL files under migrations/ in name order.
 * Every statement is idempotent, so running them on each start is safe.
 */
import { readdir, readFile } from 'node:fs/promises';
import type pg from 'pg';
import { createChildLogger } from '../observability/logger.js';

const log = createChildLogger({ component: 'migrate' });

const MIGRATIONS_DIR = new URL('./migrations/', import.meta.url);

export async function applyMigrations(pool: pg.Pool, directory: URL = MIGRATIONS_DIR): Promise<string[]> {
  const files = (await readdir(directory)).filter((file) => file.endsWith('.sql')).sort();

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    for (const file of files) {
      const sql = await readFile(new URL(file, directory), 'utf8');
      await client.query(sql);
      log.info({ file }, 'Migration applied');
    }
    await client.query('COMMIT');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
  return files;
}
