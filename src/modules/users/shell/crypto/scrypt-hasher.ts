/**
 * Users Module - Password Hasher Implementation
 *
 * scrypt (memory-hard) from Node.js crypto. Digests are self-describing:
 * `scrypt$<N>$<r>$<p>$<salt base64>$<key base64>`, so cost parameters can be
 * raised later without invalidating stored passwords.
 */

import { randomBytes, scrypt, timingSafeEqual, type ScryptOptions } from 'node:crypto';

import type { PasswordHasher } from '../../core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface ScryptHasherOptions {
  /** CPU/memory cost, a power of two. Default 16384 */
  cost?: number;
  /** Block size. Default 8 */
  blockSize?: number;
  /** Parallelization. Default 1 */
  parallelization?: number;
  /** Derived key length in bytes. Default 64 */
  keyLength?: number;
}

const PREFIX = 'scrypt';
const SALT_BYTES = 16;
const MAX_COST = 1 << 20;

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const deriveKey = (
  password: string,
  salt: Buffer,
  keyLength: number,
  options: ScryptOptions
): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    scrypt(password, salt, keyLength, options, (error, key) => {
      if (error !== null) {
        reject(error);
        return;
      }
      resolve(key);
    });
  });

const isPowerOfTwo = (value: number): boolean => value > 1 && (value & (value - 1)) === 0;

interface ParsedDigest {
  cost: number;
  blockSize: number;
  parallelization: number;
  salt: Buffer;
  key: Buffer;
}

const parseDigest = (digest: string): ParsedDigest | null => {
  const [prefix, cost, blockSize, parallelization, salt, key, ...rest] = digest.split('$');
  if (
    prefix !== PREFIX ||
    cost === undefined ||
    blockSize === undefined ||
    parallelization === undefined ||
    salt === undefined ||
    key === undefined ||
    rest.length > 0
  ) {
    return null;
  }

  const parsed = {
    cost: Number(cost),
    blockSize: Number(blockSize),
    parallelization: Number(parallelization),
    salt: Buffer.from(salt, 'base64'),
    key: Buffer.from(key, 'base64'),
  };

  if (
    !isPowerOfTwo(parsed.cost) ||
    parsed.cost > MAX_COST ||
    !Number.isInteger(parsed.blockSize) ||
    parsed.blockSize < 1 ||
    parsed.blockSize > 32 ||
    !Number.isInteger(parsed.parallelization) ||
    parsed.parallelization < 1 ||
    parsed.parallelization > 16 ||
    parsed.salt.length === 0 ||
    parsed.key.length === 0
  ) {
    return null;
  }

  return parsed;
};

const scryptOptionsFor = (cost: number, blockSize: number, parallelization: number) => ({
  N: cost,
  r: blockSize,
  p: parallelization,
  maxmem: 256 * cost * blockSize + 1024 * 1024,
});

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a scrypt-backed password hasher.
 */
export const makeScryptPasswordHasher = (options: ScryptHasherOptions = {}): PasswordHasher => {
  const cost = options.cost ?? 16384;
  const blockSize = options.blockSize ?? 8;
  const parallelization = options.parallelization ?? 1;
  const keyLength = options.keyLength ?? 64;

  if (!isPowerOfTwo(cost) || cost > MAX_COST) {
    throw new Error(`scrypt cost must be a power of two up to ${String(MAX_COST)}`);
  }

  return {
    async hash(password: string): Promise<string> {
      const salt = randomBytes(SALT_BYTES);
      const key = await deriveKey(
        password,
        salt,
        keyLength,
        scryptOptionsFor(cost, blockSize, parallelization)
      );

      return [
        PREFIX,
        String(cost),
        String(blockSize),
        String(parallelization),
        salt.toString('base64'),
        key.toString('base64'),
      ].join('$');
    },

    async verify(password: string, digest: string): Promise<boolean> {
      const parsed = parseDigest(digest);
      if (parsed === null) {
        return false;
      }

      const candidate = await deriveKey(
        password,
        parsed.salt,
        parsed.key.length,
        scryptOptionsFor(parsed.cost, parsed.blockSize, parsed.parallelization)
      );

      return timingSafeEqual(candidate, parsed.key);
    },
  };
};
