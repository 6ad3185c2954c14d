/**
 * In-process session registry.
 *
 * Maps bearer tokens to session controllers. Entries expire after a period of
 * inactivity; reading an entry extends it. When full, the least recently used
 * session is evicted.
 */

import { randomBytes } from 'node:crypto';

import type { SessionController } from '../../core/session-controller.js';

/** Random bytes per token, before base64url encoding */
export const SESSION_TOKEN_BYTES = 32;

export const DEFAULT_MAX_SESSIONS = 10_000;

interface RegistryEntry {
  controller: SessionController;
  expiresAt: number;
}

export interface SessionRegistryOptions {
  ttlMs: number;
  maxSessions?: number;
  /** Clock in epoch milliseconds; defaults to `Date.now` */
  now?: () => number;
  generateToken?: () => string;
}

export const generateSessionToken = (): string =>
  randomBytes(SESSION_TOKEN_BYTES).toString('base64url');

export class SessionRegistry {
  private readonly store = new Map<string, RegistryEntry>();
  private readonly ttlMs: number;
  private readonly maxSessions: number;
  private readonly now: () => number;
  private readonly generateToken: () => string;

  constructor(options: SessionRegistryOptions) {
    this.ttlMs = options.ttlMs;
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
    this.now = options.now ?? Date.now;
    this.generateToken = options.generateToken ?? generateSessionToken;
  }

  /**
   * Stores the controller under a fresh token and returns the token.
   */
  issue(controller: SessionController): string {
    let token = this.generateToken();
    while (this.store.has(token)) {
      token = this.generateToken();
    }

    if (this.store.size >= this.maxSessions) {
      this.sweep();
    }
    if (this.store.size >= this.maxSessions) {
      const lruToken = this.store.keys().next().value;
      if (lruToken !== undefined) {
        this.store.delete(lruToken);
      }
    }

    this.store.set(token, { controller, expiresAt: this.now() + this.ttlMs });
    return token;
  }

  get(token: string): SessionController | undefined {
    const entry = this.store.get(token);
    if (entry === undefined) {
      return undefined;
    }

    const now = this.now();
    if (entry.expiresAt <= now) {
      this.store.delete(token);
      return undefined;
    }

    // Refresh LRU order and expiry
    this.store.delete(token);
    this.store.set(token, { controller: entry.controller, expiresAt: now + this.ttlMs });
    return entry.controller;
  }

  revoke(token: string): boolean {
    return this.store.delete(token);
  }

  /** Ends every session logged in as the user; returns how many were ended */
  revokeUser(userId: number): number {
    let removed = 0;
    for (const [token, entry] of this.store) {
      const state = entry.controller.state;
      if (state.status === 'logged-in' && state.userId === userId) {
        this.store.delete(token);
        removed++;
      }
    }
    return removed;
  }

  /** Drops every expired entry; returns how many were dropped */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [token, entry] of this.store) {
      if (entry.expiresAt <= now) {
        this.store.delete(token);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.store.size;
  }
}

export const makeSessionRegistry = (options: SessionRegistryOptions): SessionRegistry => {
  return new SessionRegistry(options);
};
