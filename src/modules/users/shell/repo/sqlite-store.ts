/**
 * SQLite User Store
 *
 * Kysely over better-sqlite3. Usernames carry a UNIQUE constraint and each
 * create or delete is a single statement, so concurrent sessions cannot lose
 * each other's updates.
 */

import { sql } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

import {
  createStorageCorruptError,
  createStorageIoError,
  createUsernameTakenError,
  type UserStoreError,
} from '../../core/errors.js';
import { createSeedStore } from '../../core/logic.js';
import {
  isRole,
  resolveEmail,
  toPublicUser,
  type CreateUserInput,
  type PublicUser,
  type User,
  type UserStoreSnapshot,
} from '../../core/types.js';
import { findAuthenticatedUser } from '../../core/usecases/authenticate-user.js';

import type { UserDbClient } from '../../../../infra/database/client.js';
import type { PasswordHasher, UserStore } from '../../core/ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Row type from database query.
 */
interface QueryRow {
  id: number;
  username: string;
  password_hash: string;
  role: string;
  email: string;
  created_at: string;
}

export interface SqliteUserStoreOptions {
  db: UserDbClient;
  hasher: PasswordHasher;
  seedAdminPassword: string;
  logger: Logger;
  now?: () => Date;
}

const isUniqueViolation = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE';

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

class SqliteUserStore implements UserStore {
  private readonly db: UserDbClient;
  private readonly hasher: PasswordHasher;
  private readonly seedAdminPassword: string;
  private readonly log: Logger;
  private readonly now: () => Date;
  private initialized = false;

  constructor(options: SqliteUserStoreOptions) {
    this.db = options.db;
    this.hasher = options.hasher;
    this.seedAdminPassword = options.seedAdminPassword;
    this.log = options.logger.child({ repo: 'SqliteUserStore' });
    this.now = options.now ?? (() => new Date());
  }

  async initialize(): Promise<Result<boolean, UserStoreError>> {
    if (this.initialized) {
      return ok(false);
    }

    try {
      const existing = await sql<{ name: string }>`
        SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'users'
      `.execute(this.db);
      if (existing.rows.length > 0) {
        this.initialized = true;
        return ok(false);
      }

      const seedHash = await this.hasher.hash(this.seedAdminPassword);
      const [seedAdmin] = createSeedStore(seedHash, this.now().toISOString()).users;
      if (seedAdmin === undefined) {
        return err(createStorageIoError('Seed store has no administrator'));
      }

      await this.db.transaction().execute(async (trx) => {
        await trx.schema
          .createTable('users')
          .ifNotExists()
          .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
          .addColumn('username', 'text', (col) => col.notNull().unique())
          .addColumn('password_hash', 'text', (col) => col.notNull())
          .addColumn('role', 'text', (col) => col.notNull())
          .addColumn('email', 'text', (col) => col.notNull())
          .addColumn('created_at', 'text', (col) => col.notNull())
          .execute();

        await trx
          .insertInto('users')
          .values(this.toRow(seedAdmin))
          .onConflict((oc) => oc.doNothing())
          .execute();
      });

      this.initialized = true;
      this.log.info('Created users table with seed administrator');
      return ok(true);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to initialize user store');
      return err(createStorageIoError('Failed to initialize user store', error));
    }
  }

  async load(): Promise<Result<UserStoreSnapshot, UserStoreError>> {
    const initResult = await this.initialize();
    if (initResult.isErr()) {
      return err(initResult.error);
    }

    let rows: QueryRow[];
    let sequence: number | undefined;
    try {
      rows = await this.db.selectFrom('users').selectAll().orderBy('id').execute();
      const seq = await sql<{ seq: number }>`
        SELECT seq FROM sqlite_sequence WHERE name = 'users'
      `.execute(this.db);
      sequence = seq.rows[0]?.seq;
    } catch (error) {
      this.log.error({ err: error }, 'Failed to read user store');
      return err(createStorageIoError('Failed to read user store', error));
    }

    const users: User[] = [];
    for (const row of rows) {
      const user = this.mapRowToUser(row);
      if (user === null) {
        return err(
          createStorageCorruptError('User store contains an unknown role', [
            `/users/${String(row.id)}/role: ${row.role}`,
          ])
        );
      }
      users.push(user);
    }

    const highestId = users.reduce((max, user) => Math.max(max, user.id), 0);
    return ok({ users, nextId: Math.max(sequence ?? 0, highestId) + 1 });
  }

  async save(store: UserStoreSnapshot): Promise<Result<void, UserStoreError>> {
    const initResult = await this.initialize();
    if (initResult.isErr()) {
      return err(initResult.error);
    }

    try {
      await this.db.transaction().execute(async (trx) => {
        await trx.deleteFrom('users').execute();
        if (store.users.length > 0) {
          await trx
            .insertInto('users')
            .values(store.users.map((user) => this.toRow(user)))
            .execute();
        }
        await sql`DELETE FROM sqlite_sequence WHERE name = 'users'`.execute(trx);
        await sql`
          INSERT INTO sqlite_sequence (name, seq) VALUES ('users', ${store.nextId - 1})
        `.execute(trx);
      });
      return ok(undefined);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to write user store');
      return err(createStorageIoError('Failed to write user store', error));
    }
  }

  async createUser(input: CreateUserInput): Promise<Result<User, UserStoreError>> {
    const initResult = await this.initialize();
    if (initResult.isErr()) {
      return err(initResult.error);
    }

    const passwordHash = await this.hasher.hash(input.password);

    try {
      const row = await this.db
        .insertInto('users')
        .values({
          username: input.username,
          password_hash: passwordHash,
          role: input.role,
          email: resolveEmail(input.username, input.email),
          created_at: this.now().toISOString(),
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      const user = this.mapRowToUser(row);
      if (user === null) {
        return err(createStorageCorruptError('Inserted user has an unknown role'));
      }

      this.log.info({ userId: user.id, username: user.username, role: user.role }, 'User created');
      return ok(user);
    } catch (error) {
      if (isUniqueViolation(error)) {
        return err(createUsernameTakenError(input.username));
      }
      this.log.error({ err: error, username: input.username }, 'Failed to create user');
      return err(createStorageIoError('Failed to create user', error));
    }
  }

  async authenticate(
    identifier: string,
    password: string
  ): Promise<Result<User | null, UserStoreError>> {
    const loaded = await this.load();
    if (loaded.isErr()) {
      return err(loaded.error);
    }

    return ok(
      await findAuthenticatedUser({ hasher: this.hasher }, loaded.value.users, identifier, password)
    );
  }

  async deleteUser(id: number): Promise<Result<boolean, UserStoreError>> {
    const initResult = await this.initialize();
    if (initResult.isErr()) {
      return err(initResult.error);
    }

    try {
      const result = await this.db.deleteFrom('users').where('id', '=', id).executeTakeFirst();
      const removed = result.numDeletedRows > 0n;
      if (removed) {
        this.log.info({ userId: id }, 'User deleted');
      }
      return ok(removed);
    } catch (error) {
      this.log.error({ err: error, userId: id }, 'Failed to delete user');
      return err(createStorageIoError('Failed to delete user', error));
    }
  }

  async listUsers(): Promise<Result<PublicUser[], UserStoreError>> {
    const loaded = await this.load();
    if (loaded.isErr()) {
      return err(loaded.error);
    }

    return ok(loaded.value.users.map(toPublicUser));
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Mapping
  // ─────────────────────────────────────────────────────────────────────────

  private mapRowToUser(row: QueryRow): User | null {
    if (!isRole(row.role)) {
      return null;
    }

    return {
      id: row.id,
      username: row.username,
      passwordHash: row.password_hash,
      role: row.role,
      email: row.email,
      createdAt: row.created_at,
    };
  }

  private toRow(user: User): QueryRow {
    return {
      id: user.id,
      username: user.username,
      password_hash: user.passwordHash,
      role: user.role,
      email: user.email,
      created_at: user.createdAt,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates the SQLite user store.
 */
export const makeSqliteUserStore = (options: SqliteUserStoreOptions): UserStore => {
  return new SqliteUserStore(options);
};
