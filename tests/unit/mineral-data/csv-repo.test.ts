import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, it, expect, afterEach } from 'vitest';

import {
  joinedRows,
  makeCsvMineralDataRepo,
  makeFsSourceStore,
  type MineralDataRepository,
} from '@/modules/mineral-data/index.js';

import { makeSourceCsvs } from '../../fixtures/builders.js';
import {
  makeInMemorySourceStore,
  makeSilentLogger,
  type InMemorySourceStore,
} from '../../fixtures/fakes.js';

const makeRepo = (files: InMemorySourceStore): MineralDataRepository =>
  makeCsvMineralDataRepo({
    files,
    logger: makeSilentLogger(),
    now: () => new Date('2024-05-01T08:00:00.000Z'),
  });

const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

describe('CsvMineralDataRepo', () => {
  describe('load', () => {
    it('reads each source once and serves the cached snapshot', async () => {
      const files = makeInMemorySourceStore(makeSourceCsvs());
      const repo = makeRepo(files);

      const first = await repo.load();
      const second = await repo.load();

      expect(second).toBe(first);
      expect(files.reads()).toBe(4);
      expect(first.loadedAt).toBe('2024-05-01T08:00:00.000Z');
    });

    it('shares one read between concurrent loads', async () => {
      const files = makeInMemorySourceStore(makeSourceCsvs());
      const repo = makeRepo(files);

      const [a, b] = await Promise.all([repo.load(), repo.load()]);

      expect(a).toBe(b);
      expect(files.reads()).toBe(4);
    });

    it('reads again after invalidate', async () => {
      const files = makeInMemorySourceStore(makeSourceCsvs());
      const repo = makeRepo(files);

      const first = await repo.load();
      repo.invalidate();
      const second = await repo.load();

      expect(second).not.toBe(first);
      expect(files.reads()).toBe(8);
    });

    it('distinguishes missing, unreadable and malformed sources', async () => {
      const files = makeInMemorySourceStore(
        { countries: 'CountryID,CountryName\n1,Zed', minerals: '', production: 'x' },
        { unreadable: ['production'] }
      );

      const { tables } = await makeRepo(files).load();

      expect(tables.countries.status).toEqual({ kind: 'loaded' });
      expect(tables.minerals.status).toEqual({
        kind: 'malformed',
        reason: 'File has no header row',
      });
      expect(tables.production.status).toEqual({
        kind: 'unreadable',
        reason: 'Permission denied: production_stats.csv',
      });
      expect(tables.sites.status).toEqual({ kind: 'missing' });
      expect(tables.sites.rows).toEqual([]);
    });

    it('marks a source that is not valid CSV as malformed', async () => {
      const files = makeInMemorySourceStore({ sites: 'SiteID,SiteName\n1,"North' });

      const { tables } = await makeRepo(files).load();

      expect(tables.sites.status.kind).toBe('malformed');
      expect(tables.sites.rows).toEqual([]);
    });

    it('loads with every source missing', async () => {
      const snapshot = await makeRepo(makeInMemorySourceStore()).load();

      expect(snapshot.views.production.kind).toBe('unjoined');
      expect(snapshot.views.sites.rows).toEqual([]);
    });
  });

  describe('replaceSource', () => {
    it('rejects a non-canonical name without touching files or the cache', async () => {
      const files = makeInMemorySourceStore(makeSourceCsvs());
      const repo = makeRepo(files);
      const before = await repo.load();

      const result = await repo.replaceSource('evil.csv', bytes('CountryID\n99'));

      expect(result._unsafeUnwrapErr()).toEqual({
        type: 'InvalidSourceNameError',
        message:
          'Use exact filenames: countries.csv, minerals.csv, production_stats.csv, sites.csv',
        filename: 'evil.csv',
        allowed: ['countries.csv', 'minerals.csv', 'production_stats.csv', 'sites.csv'],
      });
      expect([...files.files.keys()]).toEqual(['countries', 'minerals', 'production', 'sites']);
      expect(await repo.load()).toBe(before);
      expect(files.reads()).toBe(4);
    });

    it('writes the file and the next reload sees it', async () => {
      const files = makeInMemorySourceStore(makeSourceCsvs());
      const repo = makeRepo(files);
      await repo.load();

      const result = await repo.replaceSource(
        'countries.csv',
        bytes('CountryID,CountryName\n1,Zambezia\n2,Aland')
      );
      const snapshot = await repo.reload();

      expect(result._unsafeUnwrap()).toBe('countries');
      expect(files.files.get('countries')).toBe('CountryID,CountryName\n1,Zambezia\n2,Aland');
      expect(joinedRows(snapshot.views.production)[0]?.countryName).toBe('Zambezia');
    });

    it('reports a failed write', async () => {
      const files = makeInMemorySourceStore({}, { failWrites: true });

      const result = await makeRepo(files).replaceSource('sites.csv', bytes('SiteID\n1'));

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'SourceWriteError',
        source: 'sites',
      });
    });
  });

  describe('checkHealth', () => {
    it('passes through the store access check', async () => {
      const healthy = makeRepo(makeInMemorySourceStore());
      const broken = makeRepo(makeInMemorySourceStore({}, { inaccessible: true }));

      expect((await healthy.checkHealth()).isOk()).toBe(true);
      expect((await broken.checkHealth())._unsafeUnwrapErr().type).toBe('SourceReadError');
    });
  });
});

describe('FsSourceStore', () => {
  let dataDir: string | undefined;

  afterEach(async () => {
    if (dataDir !== undefined) {
      await fs.rm(dataDir, { recursive: true, force: true });
      dataDir = undefined;
    }
  });

  it('reads, writes and reports missing files in the data directory', async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'minerals-'));
    const store = makeFsSourceStore({ dataDir });

    const missing = await store.read('production');
    expect(missing._unsafeUnwrapErr()).toEqual({
      type: 'SourceMissingError',
      message: 'Source file production_stats.csv does not exist',
      source: 'production',
    });

    expect((await store.write('production', bytes('CountryID\n1'))).isOk()).toBe(true);
    expect((await store.read('production'))._unsafeUnwrap()).toBe('CountryID\n1');
    expect(await fs.readdir(dataDir)).toEqual(['production_stats.csv']);
    expect((await store.checkAccess()).isOk()).toBe(true);
  });

  it('fails the access check for an absent directory', async () => {
    const store = makeFsSourceStore({ dataDir: path.join(os.tmpdir(), 'minerals-absent-dir-x') });

    expect((await store.checkAccess())._unsafeUnwrapErr().type).toBe('SourceReadError');
  });
});
