/**
 * JSON File User Store
 *
 * Whole-file store at `<dataDir>/users.json`. Every write replaces the file
 * atomically. Mutations from this process are applied one at a time; separate
 * processes sharing the file remain last-write-wins.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import {
  createFileExclusive,
  pathExists,
  writeFileAtomic,
} from '../../../../infra/fs/atomic-write.js';
import {
  createStorageCorruptError,
  createStorageIoError,
  type UserStoreError,
} from '../../core/errors.js';
import { appendUser, createSeedStore, findSnapshotProblems, removeUser } from '../../core/logic.js';
import {
  toPublicUser,
  type CreateUserInput,
  type PublicUser,
  type User,
  type UserStoreSnapshot,
} from '../../core/types.js';
import { findAuthenticatedUser } from '../../core/usecases/authenticate-user.js';
import { fromPersisted, PersistedStoreSchema, serializeStore } from './persisted-schema.js';

import type { PasswordHasher, UserStore } from '../../core/ports.js';
import type { Logger } from 'pino';

const validator = TypeCompiler.Compile(PersistedStoreSchema);

/** File name of the store inside the data directory */
export const USERS_FILE_NAME = 'users.json';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface JsonFileUserStoreOptions {
  dataDir: string;
  hasher: PasswordHasher;
  /** Password of the seeded `admin` account, used only when creating the store */
  seedAdminPassword: string;
  logger: Logger;
  /** Clock for `createdAt`; defaults to the system clock */
  now?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class JsonFileUserStore implements UserStore {
  private readonly filePath: string;
  private readonly hasher: PasswordHasher;
  private readonly seedAdminPassword: string;
  private readonly log: Logger;
  private readonly now: () => Date;
  private mutationQueue: Promise<unknown> = Promise.resolve();

  constructor(options: JsonFileUserStoreOptions) {
    this.filePath = path.join(options.dataDir, USERS_FILE_NAME);
    this.hasher = options.hasher;
    this.seedAdminPassword = options.seedAdminPassword;
    this.log = options.logger.child({ repo: 'JsonFileUserStore' });
    this.now = options.now ?? (() => new Date());
  }

  async initialize(): Promise<Result<boolean, UserStoreError>> {
    try {
      if (await pathExists(this.filePath)) {
        return ok(false);
      }

      const seedHash = await this.hasher.hash(this.seedAdminPassword);
      const seed = createSeedStore(seedHash, this.now().toISOString());
      const created = await createFileExclusive(this.filePath, serializeStore(seed));

      if (created) {
        this.log.info({ file: this.filePath }, 'Created user store with seed administrator');
      }
      return ok(created);
    } catch (error) {
      this.log.error({ err: error, file: this.filePath }, 'Failed to initialize user store');
      return err(createStorageIoError(`Failed to initialize user store at ${this.filePath}`, error));
    }
  }

  async load(): Promise<Result<UserStoreSnapshot, UserStoreError>> {
    const initResult = await this.initialize();
    if (initResult.isErr()) {
      return err(initResult.error);
    }

    let contents: string;
    try {
      contents = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      this.log.error({ err: error, file: this.filePath }, 'Failed to read user store');
      return err(createStorageIoError(`Failed to read user store at ${this.filePath}`, error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (error) {
      this.log.error({ err: error, file: this.filePath }, 'User store is not valid JSON');
      return err(
        createStorageCorruptError(
          `User store at ${this.filePath} is not valid JSON`,
          undefined,
          error
        )
      );
    }

    if (!validator.Check(parsed)) {
      const details = [...validator.Errors(parsed)].map((e) => `${e.path}: ${e.message}`);
      this.log.error({ file: this.filePath, details }, 'User store does not match schema');
      return err(
        createStorageCorruptError(`User store at ${this.filePath} does not match schema`, details)
      );
    }

    const store = fromPersisted(parsed);
    const problems = findSnapshotProblems(store);
    if (problems.length > 0) {
      this.log.error({ file: this.filePath, problems }, 'User store is inconsistent');
      return err(
        createStorageCorruptError(`User store at ${this.filePath} is inconsistent`, problems)
      );
    }

    return ok(store);
  }

  async save(store: UserStoreSnapshot): Promise<Result<void, UserStoreError>> {
    try {
      await writeFileAtomic(this.filePath, serializeStore(store));
      return ok(undefined);
    } catch (error) {
      this.log.error({ err: error, file: this.filePath }, 'Failed to write user store');
      return err(createStorageIoError(`Failed to write user store at ${this.filePath}`, error));
    }
  }

  createUser(input: CreateUserInput): Promise<Result<User, UserStoreError>> {
    return this.serialize(async (): Promise<Result<User, UserStoreError>> => {
      const loaded = await this.load();
      if (loaded.isErr()) {
        return err(loaded.error);
      }

      const passwordHash = await this.hasher.hash(input.password);
      const { store, user } = appendUser(loaded.value, {
        username: input.username,
        passwordHash,
        role: input.role,
        email: input.email,
        createdAt: this.now().toISOString(),
      });

      const saved = await this.save(store);
      if (saved.isErr()) {
        return err(saved.error);
      }

      this.log.info({ userId: user.id, username: user.username, role: user.role }, 'User created');
      return ok(user);
    });
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

  deleteUser(id: number): Promise<Result<boolean, UserStoreError>> {
    return this.serialize(async (): Promise<Result<boolean, UserStoreError>> => {
      const loaded = await this.load();
      if (loaded.isErr()) {
        return err(loaded.error);
      }

      const { store, removed } = removeUser(loaded.value, id);
      if (!removed) {
        return ok(false);
      }

      const saved = await this.save(store);
      if (saved.isErr()) {
        return err(saved.error);
      }

      this.log.info({ userId: id }, 'User deleted');
      return ok(true);
    });
  }

  async listUsers(): Promise<Result<PublicUser[], UserStoreError>> {
    const loaded = await this.load();
    if (loaded.isErr()) {
      return err(loaded.error);
    }

    return ok([...loaded.value.users].sort((a, b) => a.id - b.id).map(toPublicUser));
  }

  close(): Promise<void> {
    return this.mutationQueue.then(() => undefined);
  }

  /**
   * Runs read-modify-write tasks one after another.
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.mutationQueue.then(task);
    // The queue only orders tasks; each caller still receives its own outcome through `run`
    this.mutationQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates the JSON file user store.
 */
export const makeJsonFileUserStore = (options: JsonFileUserStoreOptions): UserStore => {
  return new JsonFileUserStore(options);
};
