import { describe, it, expect } from 'vitest';

import {
  appendUser,
  createSeedStore,
  findSnapshotProblems,
  matchIdentifier,
  removeUser,
  resolveEmail,
} from '@/modules/users/index.js';

const CREATED_AT = '2024-01-01T00:00:00.000Z';

describe('users core logic', () => {
  describe('createSeedStore', () => {
    it('holds only the administrator with id 1', () => {
      const store = createSeedStore('digest', CREATED_AT);

      expect(store).toEqual({
        users: [
          {
            id: 1,
            username: 'admin',
            passwordHash: 'digest',
            role: 'Administrator',
            email: 'admin@minerals.local',
            createdAt: CREATED_AT,
          },
        ],
        nextId: 2,
      });
    });
  });

  describe('appendUser', () => {
    it('assigns nextId and advances the counter', () => {
      const seed = createSeedStore('digest', CREATED_AT);

      const { store, user } = appendUser(seed, {
        username: 'ana',
        passwordHash: 'h',
        role: 'Investor',
        createdAt: CREATED_AT,
      });

      expect(user.id).toBe(2);
      expect(user.email).toBe('ana@minerals.local');
      expect(store.nextId).toBe(3);
      expect(store.users).toHaveLength(2);
      expect(seed.users).toHaveLength(1);
    });

    it('keeps an explicit email', () => {
      const { user } = appendUser(createSeedStore('digest', CREATED_AT), {
        username: 'ana',
        passwordHash: 'h',
        role: 'Researcher',
        email: 'ana@example.org',
        createdAt: CREATED_AT,
      });

      expect(user.email).toBe('ana@example.org');
    });
  });

  describe('removeUser', () => {
    it('removes the user without touching the counter', () => {
      const { store: withAna } = appendUser(createSeedStore('digest', CREATED_AT), {
        username: 'ana',
        passwordHash: 'h',
        role: 'Investor',
        createdAt: CREATED_AT,
      });

      const { store, removed } = removeUser(withAna, 2);

      expect(removed).toBe(true);
      expect(store.users.map((u) => u.id)).toEqual([1]);
      expect(store.nextId).toBe(3);
    });

    it('reports false for an unknown id', () => {
      const { removed } = removeUser(createSeedStore('digest', CREATED_AT), 42);

      expect(removed).toBe(false);
    });
  });

  describe('matchIdentifier', () => {
    it('matches username or email exactly and in store order', () => {
      const seed = createSeedStore('digest', CREATED_AT);
      const { store } = appendUser(seed, {
        username: 'bob',
        passwordHash: 'h',
        role: 'Investor',
        email: 'admin',
        createdAt: CREATED_AT,
      });

      expect(matchIdentifier(store.users, 'admin').map((u) => u.id)).toEqual([1, 2]);
      expect(matchIdentifier(store.users, 'Admin')).toEqual([]);
      expect(matchIdentifier(store.users, 'admin@minerals.local').map((u) => u.id)).toEqual([1]);
    });
  });

  describe('findSnapshotProblems', () => {
    it('accepts a consistent store', () => {
      expect(findSnapshotProblems(createSeedStore('digest', CREATED_AT))).toEqual([]);
    });

    it('reports duplicate ids and ids at or above next_id', () => {
      const [admin] = createSeedStore('digest', CREATED_AT).users;
      if (admin === undefined) {
        throw new Error('seed store has no administrator');
      }

      const problems = findSnapshotProblems({ users: [admin, admin], nextId: 1 });

      expect(problems).toEqual([
        'user id 1 is not below next_id 1',
        'duplicate user id 1',
        'user id 1 is not below next_id 1',
      ]);
    });
  });

  describe('resolveEmail', () => {
    it('falls back to the local domain for blank emails', () => {
      expect(resolveEmail('ana', undefined)).toBe('ana@minerals.local');
      expect(resolveEmail('ana', '')).toBe('ana@minerals.local');
      expect(resolveEmail('ana', 'a@b.c')).toBe('a@b.c');
    });
  });
});
