import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { CategoriesDatabase } from './categories/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type CategoriesDbClient = Kysely<CategoriesDatabase>;

/**
 * Create a Kysely instance for a specific database URL
 */
const createClient = <T>(connectionString: string): Kysely<T> => {
  return new Kysely<T>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });
};

/**
 * Initialize the categories database client
 */
export const initDatabase = (config: AppConfig): CategoriesDbClient => {
  const { url } = config.database;

  if (url === undefined || url === '') {
    throw new Error('Missing configuration for Categories Database (DATABASE_URL)');
  }

  return createClient<CategoriesDatabase>(url);
};

// Re-export types
export type { Categories, CategoriesDatabase } from './categories/types.js';
