import 'dotenv/config';
import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Pool, PoolClient } from 'pg';

import { consoleLogger, describeError } from '../logger.js';
import { closePool, getPool } from './client.js';

const MIGRATIONS_DIR = fileURLToPath(new URL('../../drizzle/', import.meta.url));
const LEDGER_TABLE = '__match_watch_migrations';

const positiveIntFromEnv = (name: string, fallback: number) => {
  const parsed = Number.parseInt(process.env[name] ?? '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

const CONNECT_ATTEMPTS = positiveIntFromEnv('DB_MIGRATE_RETRIES', 10);
const CONNECT_BACKOFF_MS = positiveIntFromEnv('DB_MIGRATE_RETRY_DELAY_MS', 5_000);

// Postgres is often still starting when this runs next to it in compose.
const connect = async (pool: Pool): Promise<PoolClient> => {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await pool.connect();
    } catch (err) {
      if (attempt >= CONNECT_ATTEMPTS) throw err;
      const delayMs = CONNECT_BACKOFF_MS * attempt;
      consoleLogger.warn('db_connect_retry', { attempt, attempts: CONNECT_ATTEMPTS, delayMs, ...describeError(err) });
      await sleep(delayMs);
    }
  }
};

const pendingMigrations = async (client: PoolClient) => {
  await client.query(
    `CREATE TABLE IF NOT EXISTS ${LEDGER_TABLE} (
       name TEXT PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`
  );
  const { rows } = await client.query<{ name: string }>(`SELECT name FROM ${LEDGER_TABLE}`);
  const applied = new Set(rows.map((row) => row.name));

  return readdirSync(MIGRATIONS_DIR)
    .filter((file) => file.endsWith('.sql') && !applied.has(file))
    .sort();
};

const applyMigration = async (client: PoolClient, file: string) => {
  const sql = readFileSync(join(MIGRATIONS_DIR, file), 'utf8');
  await client.query('BEGIN');
  try {
    await client.query(sql);
    await client.query(`INSERT INTO ${LEDGER_TABLE} (name) VALUES ($1)`, [file]);
    await client.query('COMMIT');
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  }
};

const main = async () => {
  const client = await connect(getPool());
  try {
    const pending = await pendingMigrations(client);
    for (const file of pending) {
      consoleLogger.info('migration_applying', { file });
      await applyMigration(client, file);
    }
    consoleLogger.info('migrations_up_to_date', { applied: pending.length });
  } finally {
    client.release();
    await closePool().catch((err: unknown) => {
      consoleLogger.warn('db_pool_close_failed', describeError(err));
    });
  }
};

main().catch((err) => {
  consoleLogger.error('migrate_failed', describeError(err));
  process.exitCode = 1;
});
