import { describe, it, expect } from 'vitest';

import { joinedRows } from '@/modules/mineral-data/index.js';

import { makeSourceCsvs } from '../../fixtures/builders.js';
import { makeSnapshot } from '../../fixtures/fakes.js';

describe('joined views', () => {
  it('joins a production record to its country and mineral', () => {
    const snapshot = makeSnapshot({
      countries: 'CountryID,CountryName\n1,Zed',
      minerals: 'MineralID,MineralName\n1,Cobalt',
      production: 'CountryID,MineralID,Production_tonnes\n1,1,100',
    });

    expect(snapshot.views.production).toEqual({
      kind: 'joined',
      rows: [
        {
          countryId: 1,
          countryName: 'Zed',
          gdpBillionUsd: null,
          miningRevenueBillionUsd: null,
          keyProjects: null,
          mineralId: 1,
          mineralName: 'Cobalt',
          description: null,
          productionTonnes: 100,
          exportValueBillionUsd: null,
        },
      ],
    });
  });

  it('keeps left-table order and drops unmatched records', () => {
    const snapshot = makeSnapshot(
      makeSourceCsvs({
        production: 'CountryID,MineralID,Production_tonnes\n2,2,5\n9,1,7\n1,1,3\n1,,4',
      })
    );

    const rows = joinedRows(snapshot.views.production);

    expect(rows.map((r) => [r.countryName, r.mineralName, r.productionTonnes])).toEqual([
      ['Aland', 'Lithium', 5],
      ['Zed', 'Cobalt', 3],
    ]);
  });

  it('produces one row per match for duplicate ids', () => {
    const snapshot = makeSnapshot(
      makeSourceCsvs({
        countries: 'CountryID,CountryName\n1,Zed\n1,Zed North',
        production: 'CountryID,MineralID,Production_tonnes\n1,1,10',
      })
    );

    expect(joinedRows(snapshot.views.production).map((r) => r.countryName)).toEqual([
      'Zed',
      'Zed North',
    ]);
  });

  it('does not match countries without a name', () => {
    const snapshot = makeSnapshot(
      makeSourceCsvs({
        countries: 'CountryID,CountryName\n1,\n2,Aland',
        production: 'CountryID,MineralID,Production_tonnes\n1,1,10\n2,1,20',
      })
    );

    expect(joinedRows(snapshot.views.production).map((r) => r.countryName)).toEqual(['Aland']);
  });

  it('joins sites with coordinates', () => {
    const snapshot = makeSnapshot(makeSourceCsvs());

    expect(joinedRows(snapshot.views.sites)[0]).toEqual({
      countryId: 1,
      countryName: 'Zed',
      gdpBillionUsd: 10,
      miningRevenueBillionUsd: 2,
      keyProjects: 'Copperbelt',
      mineralId: 1,
      mineralName: 'Cobalt',
      description: 'Battery metal',
      siteId: 1,
      siteName: 'North Pit',
      latitude: -10,
      longitude: 20,
      productionTonnes: 100,
    });
  });

  it('serves unjoined rows when a key column is missing', () => {
    const snapshot = makeSnapshot(makeSourceCsvs({ countries: 'ID,CountryName\n1,Zed' }));

    const view = snapshot.views.production;

    expect(view.kind).toBe('unjoined');
    expect(view.kind === 'unjoined' && view.reason).toEqual({
      type: 'MissingJoinColumnError',
      message: 'Column CountryID is missing from countries',
      source: 'countries',
      column: 'CountryID',
    });
    expect(view.rows).toHaveLength(3);
    expect(joinedRows(view)).toEqual([]);
  });

  it('reports which sources are empty', () => {
    const snapshot = makeSnapshot({
      countries: 'CountryID,CountryName\n1,Zed',
      production: 'CountryID,MineralID\n1,1',
    });

    expect(snapshot.views.production).toEqual({
      kind: 'unjoined',
      rows: [{ countryId: 1, mineralId: 1, productionTonnes: null, exportValueBillionUsd: null }],
      reason: {
        type: 'InsufficientData',
        message: 'No rows in: minerals',
        emptySources: ['minerals'],
      },
    });
    expect(snapshot.views.sites.kind === 'unjoined' && snapshot.views.sites.reason).toMatchObject({
      emptySources: ['minerals', 'sites'],
    });
  });

  it('freezes the snapshot', () => {
    const snapshot = makeSnapshot(makeSourceCsvs());

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.tables.countries.rows)).toBe(true);
    expect(Object.isFrozen(joinedRows(snapshot.views.sites)[0])).toBe(true);
  });
});
