import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';

import * as schema from './schema';

export type Database = NodePgDatabase<typeof schema>;

let database: Database | null = null;
let pool: pg.Pool | null = null;

export const createDatabase = (connectionString: string, options: { max?: number } = {}): Database => {
  pool = new pg.Pool({ connectionString, max: options.max ?? 10 });
  return drizzle(pool, { schema });
};

export const setDatabase = (db: Database): void => {
  database = db;
};

export const getDatabase = (): Database => {
  if (database) {
    return database;
  }

  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    const error = new Error('DATABASE_URL is not configured for @salesdesk/storage');
    Object.assign(error, { code: 'STORAGE_DATABASE_NOT_CONFIGURED' });
    throw error;
  }

  database = createDatabase(connectionString);
  return database;
};

export const closeDatabase = async (): Promise<void> => {
  if (pool) {
    await pool.end();
    pool = null;
  }
  database = null;
};
