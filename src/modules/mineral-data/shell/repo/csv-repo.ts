/**
 * CSV Mineral Data Repository
 *
 * Reads the four source files, joins them, and caches the frozen snapshot
 * until invalidated. Concurrent loads share one read.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidSourceNameError,
  type ReplaceSourceError,
  type SourceReadError,
} from '../../core/errors.js';
import { buildSourceTable, emptySourceTable } from '../../core/parse-tables.js';
import { buildSnapshot } from '../../core/snapshot.js';
import {
  resolveSourceName,
  SOURCE_FILES,
  SOURCE_NAMES,
  type DataSnapshot,
  type JoinedView,
  type SourceName,
  type SourceTable,
  type SourceTables,
} from '../../core/types.js';
import { decodeCsv } from './csv-decoder.js';

import type { MineralDataRepository, SourceFileStore } from '../../core/ports.js';
import type { Logger } from 'pino';

export interface CsvMineralDataRepoOptions {
  files: SourceFileStore;
  logger: Logger;
  /** Clock for `loadedAt`; defaults to the system clock */
  now?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class CsvMineralDataRepo implements MineralDataRepository {
  private readonly files: SourceFileStore;
  private readonly log: Logger;
  private readonly now: () => Date;
  private snapshotPromise: Promise<DataSnapshot> | null = null;

  constructor(options: CsvMineralDataRepoOptions) {
    this.files = options.files;
    this.log = options.logger.child({ repo: 'CsvMineralDataRepo' });
    this.now = options.now ?? (() => new Date());
  }

  load(): Promise<DataSnapshot> {
    this.snapshotPromise ??= this.readSnapshot();
    return this.snapshotPromise;
  }

  invalidate(): void {
    this.snapshotPromise = null;
  }

  reload(): Promise<DataSnapshot> {
    this.invalidate();
    return this.load();
  }

  async replaceSource(
    filename: string,
    bytes: Uint8Array
  ): Promise<Result<SourceName, ReplaceSourceError>> {
    const source = resolveSourceName(filename);
    if (source === null) {
      this.log.warn({ filename }, 'Rejected upload with non-canonical file name');
      return err(createInvalidSourceNameError(filename, Object.values(SOURCE_FILES)));
    }

    const written = await this.files.write(source, bytes);
    if (written.isErr()) {
      this.log.error({ err: written.error.cause, source }, 'Failed to replace source file');
      return err(written.error);
    }

    this.log.info({ source, bytes: bytes.byteLength }, 'Source file replaced');
    return ok(source);
  }

  checkHealth(): Promise<Result<void, SourceReadError>> {
    return this.files.checkAccess();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Loading
  // ─────────────────────────────────────────────────────────────────────────

  private async readSnapshot(): Promise<DataSnapshot> {
    const loadedAt = this.now().toISOString();
    const [countries, minerals, production, sites] = await Promise.all([
      this.readTable('countries'),
      this.readTable('minerals'),
      this.readTable('production'),
      this.readTable('sites'),
    ]);

    const tables: SourceTables = { countries, minerals, production, sites };
    const snapshot = buildSnapshot(tables, loadedAt);

    this.logView('production', snapshot.views.production);
    this.logView('sites', snapshot.views.sites);
    this.log.debug(
      Object.fromEntries(SOURCE_NAMES.map((name) => [name, tables[name].rows.length])),
      'Loaded source tables'
    );

    return snapshot;
  }

  private async readTable<S extends SourceName>(source: S): Promise<SourceTable<S>> {
    const content = await this.files.read(source);
    if (content.isErr()) {
      const error = content.error;
      if (error.type === 'SourceMissingError') {
        this.log.debug({ source }, 'Source file not found');
        return emptySourceTable(source, { kind: 'missing' });
      }
      this.log.warn({ err: error.cause, source }, 'Source file could not be read');
      return emptySourceTable(source, { kind: 'unreadable', reason: error.message });
    }

    const decoded = decodeCsv(content.value);
    if (decoded.isErr()) {
      this.log.warn({ source, reason: decoded.error }, 'Source file is not valid CSV');
      return emptySourceTable(source, { kind: 'malformed', reason: decoded.error });
    }

    const table = buildSourceTable(source, decoded.value);
    if (table.status.kind === 'malformed') {
      this.log.warn({ source, reason: table.status.reason }, 'Source file is malformed');
    }
    return table;
  }

  private logView<J, R>(view: string, value: JoinedView<J, R>): void {
    if (value.kind === 'joined') {
      return;
    }
    if (value.reason.type === 'MissingJoinColumnError') {
      this.log.warn({ view, reason: value.reason }, 'Join failed, serving unjoined rows');
    } else {
      this.log.debug({ view, emptySources: value.reason.emptySources }, 'Not enough data to join');
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates the CSV-backed mineral data repository.
 */
export const makeCsvMineralDataRepo = (
  options: CsvMineralDataRepoOptions
): MineralDataRepository => {
  return new CsvMineralDataRepo(options);
};
