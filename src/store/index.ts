import type { MatchStore } from './types.js';
import { MemoryStore } from './memory.js';
import { PostgresStore } from './postgres.js';
import { getDb } from '../db/client.js';

export * from './types.js';
export { MemoryStore } from './memory.js';
export { PostgresStore } from './postgres.js';

/** Postgres when a connection string is configured, otherwise an in-process store. */
export const createStore = (options: { databaseUrl: string | null }): MatchStore =>
  options.databaseUrl ? new PostgresStore(getDb(options.databaseUrl)) : new MemoryStore();
