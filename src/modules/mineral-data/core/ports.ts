/**
 * Mineral Data Module - Port Interfaces
 */

import type {
  ReplaceSourceError,
  SourceAccessError,
  SourceReadError,
  SourceWriteError,
} from './errors.js';
import type { DataSnapshot, SourceName } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Raw access to the four source files.
 */
export interface SourceFileStore {
  /** Whole file as text; `SourceMissingError` when it does not exist */
  read(source: SourceName): Promise<Result<string, SourceAccessError>>;
  /** Replaces the file with `bytes` unchanged */
  write(source: SourceName, bytes: Uint8Array): Promise<Result<void, SourceWriteError>>;
  /** Whether the directory holding the sources is readable */
  checkAccess(): Promise<Result<void, SourceReadError>>;
}

/**
 * Loads, joins and caches the source tables.
 *
 * `load` never fails: sources that cannot be read come back as empty tables
 * whose status says why.
 */
export interface MineralDataRepository {
  load(): Promise<DataSnapshot>;
  /** Drops the cached snapshot; the next `load` reads the files again */
  invalidate(): void;
  reload(): Promise<DataSnapshot>;
  replaceSource(
    filename: string,
    bytes: Uint8Array
  ): Promise<Result<SourceName, ReplaceSourceError>>;
  checkHealth(): Promise<Result<void, SourceReadError>>;
}
