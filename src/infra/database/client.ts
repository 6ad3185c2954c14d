import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';

import type { UserDatabase } from './user/types.js';

export type UserDbClient = Kysely<UserDatabase>;

/**
 * Create a Kysely instance over a SQLite file (or ':memory:')
 */
export const createSqliteClient = <T>(filename: string): Kysely<T> => {
  const database = new Database(filename);
  // WAL lets readers proceed while another connection writes
  if (filename !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }

  return new Kysely<T>({
    dialect: new SqliteDialect({ database }),
  });
};

/**
 * Initialize the user database client
 */
export const initUserDatabase = (filename: string): UserDbClient => {
  return createSqliteClient<UserDatabase>(filename);
};

// Re-export types
export type { Users, UserDatabase } from './user/types.js';
