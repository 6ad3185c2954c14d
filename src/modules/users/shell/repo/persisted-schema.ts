/**
 * Users Module - Persisted file format
 *
 * `users.json` keeps snake_case keys; the domain uses camelCase.
 */

import { Type, type Static } from '@sinclair/typebox';

import type { UserStoreSnapshot } from '../../core/types.js';

export const PersistedUserSchema = Type.Object({
  id: Type.Integer({ minimum: 1 }),
  username: Type.String(),
  password_hash: Type.String(),
  role: Type.Union([
    Type.Literal('Investor'),
    Type.Literal('Researcher'),
    Type.Literal('Administrator'),
  ]),
  email: Type.String(),
  created_at: Type.String(),
});

export const PersistedStoreSchema = Type.Object({
  users: Type.Array(PersistedUserSchema),
  next_id: Type.Integer({ minimum: 1 }),
});

export type PersistedStore = Static<typeof PersistedStoreSchema>;

export const fromPersisted = (persisted: PersistedStore): UserStoreSnapshot => ({
  users: persisted.users.map((user) => ({
    id: user.id,
    username: user.username,
    passwordHash: user.password_hash,
    role: user.role,
    email: user.email,
    createdAt: user.created_at,
  })),
  nextId: persisted.next_id,
});

export const toPersisted = (store: UserStoreSnapshot): PersistedStore => ({
  users: store.users.map((user) => ({
    id: user.id,
    username: user.username,
    password_hash: user.passwordHash,
    role: user.role,
    email: user.email,
    created_at: user.createdAt,
  })),
  next_id: store.nextId,
});

export const serializeStore = (store: UserStoreSnapshot): string =>
  `${JSON.stringify(toPersisted(store), null, 2)}\n`;
