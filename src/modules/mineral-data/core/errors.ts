/**
 * Mineral Data Module - Domain Errors
 */

import type { SourceName } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Source Access Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface SourceMissingError {
  readonly type: 'SourceMissingError';
  readonly message: string;
  readonly source: SourceName;
}

export interface SourceReadError {
  readonly type: 'SourceReadError';
  readonly message: string;
  readonly cause?: unknown;
}

export interface SourceWriteError {
  readonly type: 'SourceWriteError';
  readonly message: string;
  readonly source: SourceName;
  readonly cause?: unknown;
}

/**
 * Upload name is not one of the four canonical file names.
 */
export interface InvalidSourceNameError {
  readonly type: 'InvalidSourceNameError';
  readonly message: string;
  readonly filename: string;
  readonly allowed: readonly string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Join Outcomes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One of the tables needed for a join has no rows.
 */
export interface InsufficientDataReason {
  readonly type: 'InsufficientData';
  readonly message: string;
  readonly emptySources: readonly SourceName[];
}

/**
 * A key column the join needs is absent from a table's header.
 */
export interface MissingJoinColumnError {
  readonly type: 'MissingJoinColumnError';
  readonly message: string;
  readonly source: SourceName;
  readonly column: string;
}

export type JoinSkipReason = InsufficientDataReason | MissingJoinColumnError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Unions
// ─────────────────────────────────────────────────────────────────────────────

export type SourceAccessError = SourceMissingError | SourceReadError;

export type ReplaceSourceError = InvalidSourceNameError | SourceWriteError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createSourceMissingError = (source: SourceName, file: string): SourceMissingError => ({
  type: 'SourceMissingError',
  message: `Source file ${file} does not exist`,
  source,
});

export const createSourceReadError = (message: string, cause?: unknown): SourceReadError => ({
  type: 'SourceReadError',
  message,
  ...(cause !== undefined && { cause }),
});

export const createSourceWriteError = (
  source: SourceName,
  message: string,
  cause?: unknown
): SourceWriteError => ({
  type: 'SourceWriteError',
  message,
  source,
  ...(cause !== undefined && { cause }),
});

export const createInvalidSourceNameError = (
  filename: string,
  allowed: readonly string[]
): InvalidSourceNameError => ({
  type: 'InvalidSourceNameError',
  message: `Use exact filenames: ${allowed.join(', ')}`,
  filename,
  allowed,
});

export const createInsufficientDataReason = (
  emptySources: readonly SourceName[]
): InsufficientDataReason => ({
  type: 'InsufficientData',
  message: `No rows in: ${emptySources.join(', ')}`,
  emptySources,
});

export const createMissingJoinColumnError = (
  source: SourceName,
  column: string
): MissingJoinColumnError => ({
  type: 'MissingJoinColumnError',
  message: `Column ${column} is missing from ${source}`,
  source,
  column,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const REPLACE_SOURCE_ERROR_HTTP_STATUS: Record<ReplaceSourceError['type'], number> = {
  InvalidSourceNameError: 400,
  SourceWriteError: 500,
};
