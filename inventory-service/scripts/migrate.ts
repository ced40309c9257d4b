import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { closePools, getWriterPool } from '../shared/db';
import { createServiceLogger } from '../shared/logger';

const log = createServiceLogger('migrate');

// dist/inventory-service/scripts -> inventory-service/sql
const SCHEMA_PATH = join(__dirname, '..', '..', '..', 'inventory-service', 'sql', 'schema.sql');

async function migrate(): Promise<void> {
  const sql = readFileSync(process.env.SCHEMA_PATH ?? SCHEMA_PATH, 'utf8');
  const pool = await getWriterPool();
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('COMMIT');
    log.info('Schema applied');
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

migrate()
  .then(closePools)
  .catch(async (err: unknown) => {
    log.error('Migration failed', { error: err });
    await closePools();
    process.exitCode = 1;
  });
